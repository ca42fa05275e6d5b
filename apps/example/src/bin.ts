#!/usr/bin/env node

/**
 * Example entry point.
 *
 *   termkit-example [--example <n>] [--custom] [--test] [--more] [--config <path>] [--console]
 */

import { ConsoleMode, TermkitError } from "@termkit/sdk";
import { ExampleProgram } from "./program.js";

async function main(): Promise<number> {
  const program = new ExampleProgram();

  try {
    await program.init(process.argv.slice(2));
  } catch (err) {
    if (err instanceof TermkitError) {
      console.error(err.message);
      return 1;
    }
    throw err;
  }

  if (program.isFlagSet("--console")) {
    program.registerCommands();
    await program.consoleStart(ConsoleMode.INHERIT);
  }
  return 0;
}

// CLI entry point
main()
  .then(exitCode => process.exit(exitCode))
  .catch(err => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
