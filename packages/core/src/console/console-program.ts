/**
 * ConsoleProgram -- base class for command-line programs.
 *
 * Subclasses declare startup flags in `terminalInit`, call `init()` to parse
 * the process arguments, and may open an interactive console whose commands
 * reuse the same dispatch contract as the flags.
 *
 * @example
 * ```typescript
 * class Tool extends ConsoleProgram {
 *   protected terminalInit(): void {
 *     this.terminalAddFlag("--count", "-c", "Items to process", {
 *       input: InputType.INTEGER,
 *       default: 0,
 *     });
 *   }
 * }
 *
 * const tool = new Tool();
 * await tool.init();
 * tool.flagValue("count");
 * ```
 */

import { ConsoleMode, DISPLAY_CATEGORIES, DisplayLevel, InputType } from "@termkit/sdk";
import type {
  CommandOptions,
  CommandSpec,
  FlagOptions,
  FlagSpec,
  FlagValue,
  Handler,
  HandlerResult,
  LogSink,
  OutputStream,
} from "@termkit/sdk";
import { createLogger } from "@termkit/shared";
import { createCommandRegistry } from "../infrastructure/command-registry.js";
import type { CommandRegistry } from "../infrastructure/command-registry.js";
import { createFlagRegistry, normalizeFlagName } from "../infrastructure/flag-registry.js";
import type { FlagRegistry } from "../infrastructure/flag-registry.js";
import { parseFlags } from "../execution/dispatch.js";
import type { FlagParseResult } from "../execution/dispatch.js";
import { DisplayInformation, createFileSink } from "../display/display-information.js";
import { ConsoleSession } from "../session/console-session.js";
import type { ConsoleConfig } from "../config/loader.js";
import { Command } from "./command.js";
import { buildFlagSpec } from "./flag-spec.js";
import { formatCommandDetail, formatCommandHelp, formatFlagHelp } from "./help.js";

const logger = createLogger("ConsoleProgram");

const DEFAULT_PROMPT = "> ";
const DEFAULT_EXIT_COMMANDS = ["exit", "quit"];
const NO_SHORT_FLAG = "?";

export interface ConsoleProgramOptions extends ConsoleConfig {
  /** Program output for help and relayed messages. Default: process.stdout */
  output?: OutputStream;
  /** Log sink; takes precedence over `logFile` */
  sink?: LogSink;
  /** Shown in the help banner */
  name?: string;
}

export interface ConsoleStartOptions {
  /** Default: process.stdin */
  input?: NodeJS.ReadableStream;
  /** Default: the program output */
  output?: OutputStream;
  /** Ends the session when aborted */
  signal?: AbortSignal;
}

export abstract class ConsoleProgram {
  readonly flags: FlagRegistry = createFlagRegistry();
  readonly commands: CommandRegistry = createCommandRegistry();

  protected readonly output: OutputStream;
  private readonly programDisplay: DisplayInformation;
  private readonly programName: string;
  private prompt = DEFAULT_PROMPT;
  private exitCommands = DEFAULT_EXIT_COMMANDS;
  private helpFlag = true;
  private initialized = false;

  private session?: ConsoleSession;
  private sessionDisplay?: DisplayInformation;
  private sessionOutput?: OutputStream;

  constructor(options: ConsoleProgramOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.programName = options.name ?? "";
    this.programDisplay = new DisplayInformation({
      levels: { info: DisplayLevel.STDOUT, warning: DisplayLevel.STDOUT, error: DisplayLevel.STDOUT },
      output: this.output,
      sink: options.sink,
    });
    this.applyConfig(options.sink ? { ...options, logFile: undefined } : options);
  }

  /**
   * Display routing in effect: the session's while a console session runs,
   * the program's otherwise.
   */
  get display(): DisplayInformation {
    return this.sessionDisplay ?? this.programDisplay;
  }

  /** True while `consoleStart` is running. */
  get inConsole(): boolean {
    return this.session !== undefined;
  }

  /** Override to declare startup flags; runs once from `init`. */
  protected terminalInit(): void {}

  /**
   * Bound to every flag declared without its own handler. Override to handle them.
   */
  protected defaultFlagHandler(
    flagName: string,
    value: string | number | undefined,
    remaining: string[],
  ): HandlerResult {
    this.display.verbose("Flag %s fired with %s (%d tokens remaining)", flagName, value ?? "no input", remaining.length);
  }

  /**
   * Declare a startup flag. Names work with or without their leading dashes.
   * Without options the flag is an IGNORE switch bound to `defaultFlagHandler`.
   */
  terminalAddFlag(name: string, short?: string, description = "", options?: FlagOptions): FlagSpec {
    const flagName = normalizeFlagName(name);
    return this.flags.register(
      buildFlagSpec({ name, short, description, options }, (value, remaining) =>
        this.defaultFlagHandler(flagName, value, remaining),
      ),
    );
  }

  /**
   * Declare several IGNORE flags bound to `defaultFlagHandler`.
   * `shorts[i]` is the alias of `names[i]`; `?` or a missing character means none.
   */
  terminalQuickAddFlags(names: string[], shorts = "", description = ""): FlagSpec[] {
    return names.map((name, i) => {
      const short = shorts.charAt(i);
      return this.terminalAddFlag(name, short && short !== NO_SHORT_FLAG ? short : undefined, description);
    });
  }

  /**
   * Declare flags, then parse `argv`. Errors propagate; the caller decides
   * whether to abort.
   */
  async init(argv: string[] = process.argv.slice(2)): Promise<FlagParseResult> {
    if (!this.initialized) {
      this.initialized = true;
      this.terminalInit();
      if (this.helpFlag && !this.flags.lookup("--help")) {
        this.terminalAddFlag("--help", this.flags.lookup("-h") ? undefined : "-h", "Show this help message", {
          input: InputType.IGNORE,
          handler: () => this.printHelp(),
        });
      }
    }

    const result = await parseFlags(argv, this.flags);
    logger.debug("Parsed startup flags", { fired: result.fired, unmatched: result.unmatched });
    return result;
  }

  /** Value a startup flag fired with, or its default. */
  flagValue(name: string): FlagValue {
    return this.flags.value(name);
  }

  isFlagSet(name: string): boolean {
    return this.flags.isSet(name);
  }

  /** Register a console command that takes no typed argument. */
  consoleAddCommand(name: string, handler: Handler<typeof InputType.IGNORE>, description?: string, usage?: string): Command;
  /** Register a console command whose first argument is coerced to `options.input`. */
  consoleAddCommand(name: string, options: CommandOptions): Command;
  consoleAddCommand(
    name: string,
    handlerOrOptions: Handler<typeof InputType.IGNORE> | CommandOptions,
    description = "",
    usage = "",
  ): Command {
    const spec: CommandSpec =
      typeof handlerOrOptions === "function"
        ? { name, description, usage, input: InputType.IGNORE, handler: handlerOrOptions }
        : {
            ...handlerOrOptions,
            name,
            description: handlerOrOptions.description ?? "",
            usage: handlerOrOptions.usage ?? "",
          };
    return new Command(this.commands.register(spec));
  }

  /**
   * Apply a loaded configuration file (or the same fields given to the constructor).
   * A `logFile` replaces the current sink; a running session keeps the sink it started with.
   */
  applyConfig(config: ConsoleConfig): void {
    if (config.prompt !== undefined) this.prompt = config.prompt;
    if (config.exitCommands) this.exitCommands = [...config.exitCommands];
    if (config.helpFlag !== undefined) this.helpFlag = config.helpFlag;
    if (config.logFile) {
      if (this.programDisplay.sink) logger.debug("Replacing log sink", { logFile: config.logFile });
      this.programDisplay.sink = createFileSink(config.logFile);
    }
    for (const category of DISPLAY_CATEGORIES) {
      const level = config.display?.[category];
      if (level) this.programDisplay.setLevel(category, level);
    }
  }

  /**
   * Run the interactive console until an exit command, end of input, or the
   * signal aborts. IGNORE starts the session with every display category
   * silent; INHERIT copies the program's current levels.
   */
  async consoleStart(mode: ConsoleMode = ConsoleMode.INHERIT, options: ConsoleStartOptions = {}): Promise<void> {
    if (this.session) {
      throw new Error("A console session is already running");
    }

    this.registerBuiltinCommands();
    const output = options.output ?? this.output;
    const session = new ConsoleSession({
      commands: this.commands,
      input: options.input ?? process.stdin,
      output,
      prompt: this.prompt,
      signal: options.signal,
    });

    this.session = session;
    this.sessionOutput = output;
    this.sessionDisplay = this.programDisplay.fork(mode, output);
    try {
      await session.run();
    } finally {
      this.session = undefined;
      this.sessionOutput = undefined;
      this.sessionDisplay = undefined;
    }
  }

  /** End the running console session after the current line. */
  consoleStop(): void {
    this.session?.stop();
  }

  /** Write the startup flag listing to the program output. */
  printHelp(): void {
    const lines = [
      this.programName ? `Usage: ${this.programName} [options]` : "Usage: [options]",
      "",
      "Options:",
      ...formatFlagHelp(this.flags.list()),
    ];
    this.output.write(`${lines.join("\n")}\n`);
  }

  private registerBuiltinCommands(): void {
    if (!this.commands.has("help")) {
      this.consoleAddCommand("help", (_value, remaining) => this.printCommandHelp(remaining[0]), "List commands, or describe one", "[command]");
    }
    for (const name of this.exitCommands) {
      if (!this.commands.has(name)) {
        this.consoleAddCommand(name, () => this.consoleStop(), "Leave the console");
      }
    }
  }

  private printCommandHelp(name?: string): void {
    const output = this.sessionOutput ?? this.output;
    if (name === undefined) {
      output.write(`${formatCommandHelp(this.commands.list()).join("\n")}\n`);
      return;
    }
    const command = this.commands.lookup(name);
    if (!command) {
      output.write(`No such command: ${name}\n`);
      return;
    }
    output.write(`${formatCommandDetail(command).join("\n")}\n`);
  }
}
