/**
 * ExampleProgram -- a small program showing how to build on ConsoleProgram.
 *
 * Startup flags:
 *   --example, -e <integer>   counted by the default handler
 *   --custom, -c              bound to its own handler
 *   --test, --more/-m         quick flags on the default handler
 *   --config <path>           load console settings from a JSON file
 *   --console                 open the interactive console after startup
 */

import { InputType } from "@termkit/sdk";
import { ConsoleProgram, loadConsoleConfig } from "@termkit/core";
import type { Command, ConsoleProgramOptions } from "@termkit/core";

export class ExampleProgram extends ConsoleProgram {
  private readonly notes: string[] = [];

  constructor(options: ConsoleProgramOptions = {}) {
    super({ name: "termkit-example", ...options });
  }

  protected terminalInit(): void {
    this.terminalAddFlag(
      "--example",
      "-e",
      "Awkwardly long terminal flag, long enough to need a description",
      { input: InputType.INTEGER, default: 0 },
    );
    // Leading dashes are optional for both the long and the short name
    this.terminalAddFlag("custom", "c", "This flag supplies its own handler", {
      input: InputType.IGNORE,
      handler: () => this.customFlag(),
    });
    this.terminalQuickAddFlags(["test", "more"], "?m");
    this.terminalAddFlag("--config", undefined, "Load console settings from a JSON file", {
      input: InputType.STRING,
      handler: (path) => this.applyConfig(loadConsoleConfig(path)),
    });
    this.terminalAddFlag("--console", undefined, "Open the interactive console after startup");
  }

  protected defaultFlagHandler(flagName: string, value: string | number | undefined): void {
    this.display.info("Default flag handler for flag '%s', with input: %s", flagName, value ?? "none");
  }

  private customFlag(): void {
    this.display.info("Custom flag handler for flag '--custom'");
  }

  /** Commands available inside the console. */
  registerCommands(): Command[] {
    const example = this.consoleAddCommand(
      "example",
      (_value, remaining) => {
        const [input = "-", output = "-"] = remaining.filter((token) => !token.startsWith("-"));
        const suffix = example.isFlagSet("example-flag") ? " (with example flag)" : "";
        this.display.info("Custom command handler for 'example': %s -> %s%s", input, output, suffix);
      },
      "My in-program command",
      "<input_file> <output_file>",
    );
    example.addFlag("example-flag", "f", "Mark the run");

    const note = this.consoleAddCommand("note", {
      input: InputType.STRING,
      description: "Remember a word",
      usage: "<word>",
      handler: (word) => {
        this.notes.push(word);
        this.display.verbose("noted %s", word);
      },
    });

    const notes = this.consoleAddCommand(
      "notes",
      () => this.display.info("%s", this.notes.length > 0 ? this.notes.join(", ") : "(none)"),
      "List remembered words",
    );

    const scale = this.consoleAddCommand("scale", {
      input: InputType.FLOAT,
      description: "Multiply the --example value",
      usage: "<factor>",
      handler: (factor) => {
        const base = this.flagValue("--example");
        this.display.info("%s", (typeof base === "number" ? base : 0) * factor);
      },
    });

    return [example, note, notes, scale];
  }
}
