import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { ConsoleMode, ConfigError } from "@termkit/sdk";
import { createCapturedOutput, createTerminal } from "@termkit/sdk/testing";
import type { CapturedOutput } from "@termkit/sdk/testing";
import { ExampleProgram } from "../src/program.js";

describe("ExampleProgram startup", () => {
  let output: CapturedOutput;
  let program: ExampleProgram;

  beforeEach(() => {
    output = createCapturedOutput();
    program = new ExampleProgram({ output });
  });

  it("routes --example through the default handler", async () => {
    await program.init(["-e", "7"]);

    expect(output.lines()).toEqual(["Default flag handler for flag '--example', with input: 7"]);
    expect(program.flagValue("example")).toBe(7);
  });

  it("runs the custom handler for -c", async () => {
    await program.init(["-c"]);

    expect(output.lines()).toEqual(["Custom flag handler for flag '--custom'"]);
  });

  it("handles quick flags by their long and short names", async () => {
    await program.init(["--test", "-m"]);

    expect(output.lines()).toEqual([
      "Default flag handler for flag '--test', with input: none",
      "Default flag handler for flag '--more', with input: none",
    ]);
  });

  it("does not fire flags that are absent", async () => {
    await program.init(["notes.txt"]);

    expect(output.text()).toBe("");
    expect(program.flagValue("--example")).toBe(0);
    expect(program.isFlagSet("--console")).toBe(false);
  });

  it("rejects a non-numeric --example", async () => {
    await expect(program.init(["--example", "seven"])).rejects.toMatchObject({
      kind: "BAD_INTEGER_FORMAT",
      message: '--example: expected an integer, got "seven"',
    });
  });
});

describe("ExampleProgram --config", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "termkit-example-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("applies the prompt from a config file", async () => {
    const path = join(dir, "console.json");
    writeFileSync(path, JSON.stringify({ prompt: "ex> " }));
    const program = new ExampleProgram({ output: createCapturedOutput() });

    await program.init(["--config", path]);
    program.registerCommands();
    const term = createTerminal(["notes", "exit"]);
    await program.consoleStart(ConsoleMode.INHERIT, term);

    expect(term.output.text()).toBe("ex> (none)\nex> ");
  });

  it("surfaces an unreadable config file", async () => {
    const program = new ExampleProgram({ output: createCapturedOutput() });

    await expect(program.init(["--config", join(dir, "missing.json")])).rejects.toBeInstanceOf(ConfigError);
  });
});

describe("ExampleProgram console", () => {
  it("runs commands with their flags and typed arguments", async () => {
    const program = new ExampleProgram({ output: createCapturedOutput() });
    await program.init(["-e", "4"]);
    program.registerCommands();
    const term = createTerminal([
      "example -f in.txt out.txt",
      "note alpha",
      "note beta",
      "notes",
      "scale 2.5",
      "exit",
    ]);

    await program.consoleStart(ConsoleMode.INHERIT, term);

    expect(term.output.lines()).toEqual([
      "> Custom command handler for 'example': in.txt -> out.txt (with example flag)",
      "> > > alpha, beta",
      "> 10",
      "> ",
    ]);
  });

  it("keeps the session quiet in IGNORE mode", async () => {
    const program = new ExampleProgram({ output: createCapturedOutput() });
    program.registerCommands();
    const term = createTerminal(["notes", "example a b", "exit"]);

    await program.consoleStart(ConsoleMode.IGNORE, term);

    expect(term.output.text()).toBe("> > > ");
  });
});
