// Types
export { InputType } from "./types/input.js";
export type { InputValue, FlagValue } from "./types/input.js";

export { DisplayLevel, ConsoleMode, DISPLAY_CATEGORIES } from "./types/display.js";
export type { DisplayCategory, LogSink, OutputStream } from "./types/display.js";

export type {
  Handler,
  HandlerResult,
  TypedSpec,
  FlagFields,
  CommandFields,
  FlagSpec,
  CommandSpec,
  DispatchSpec,
  FlagOptions,
  CommandOptions,
} from "./types/spec.js";

// Errors
export {
  TermkitError,
  InputError,
  CallError,
  ConfigError,
  isRecoverableError,
} from "./errors/base.js";

export { ErrorCode } from "./errors/codes.js";
export type { InputErrorKind, CallErrorKind } from "./errors/codes.js";
