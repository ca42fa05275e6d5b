// Coercion & dispatch
export { coerce, coerceInteger, coerceFloat } from "./execution/coerce.js";
export { dispatch, resolve, parseFlags, resolveFlags, applyFlags } from "./execution/dispatch.js";
export type {
  SpecLookup,
  FlagLookup,
  Invocation,
  DispatchOutcome,
  FlagParseResult,
  FlagPlan,
} from "./execution/dispatch.js";

// Registries
export {
  createFlagRegistry,
  normalizeFlagName,
  normalizeShortFlag,
  createCommandRegistry,
} from "./infrastructure/index.js";
export type { FlagRegistry, CommandRegistry, RegisteredCommand } from "./infrastructure/index.js";

// Display
export { DisplayInformation, createFileSink } from "./display/display-information.js";
export type { DisplayLevels, DisplayInformationOptions } from "./display/display-information.js";

// Console
export { ConsoleProgram } from "./console/console-program.js";
export type { ConsoleProgramOptions, ConsoleStartOptions } from "./console/console-program.js";
export { Command } from "./console/command.js";
export { tokenize } from "./console/tokenize.js";
export { formatFlagHelp, formatCommandHelp, formatCommandDetail } from "./console/help.js";
export { ConsoleSession } from "./session/console-session.js";
export type { ConsoleSessionOptions } from "./session/console-session.js";

// Config
export { loadConsoleConfig } from "./config/loader.js";
export type { ConsoleConfig } from "./config/loader.js";
