/**
 * Error hierarchy for flag parsing and command dispatch.
 */

import type { CallErrorKind, ErrorCode, InputErrorKind } from "./codes.js";

export class TermkitError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: Error },
  ) {
    super(message, options);
    this.name = "TermkitError";
  }
}

/**
 * A flag or command argument was malformed or missing.
 */
export class InputError extends TermkitError {
  constructor(
    public readonly kind: InputErrorKind,
    /** Flag or command name the argument belongs to, when known */
    public readonly target: string,
    message: string,
    public readonly token?: string,
  ) {
    super(message, kind);
    this.name = "InputError";
  }
}

/**
 * A name could not be resolved, or a registration was rejected.
 */
export class CallError extends TermkitError {
  constructor(
    public readonly kind: CallErrorKind,
    public readonly target: string,
    message: string,
  ) {
    super(message, kind);
    this.name = "CallError";
  }
}

export class ConfigError extends TermkitError {
  constructor(
    message: string,
    options?: { cause?: Error; code?: typeof ErrorCode.CONFIG_ERROR | typeof ErrorCode.CONFIG_READ_ERROR },
  ) {
    super(message, options?.code ?? "CONFIG_ERROR", options);
    this.name = "ConfigError";
  }
}

/** True for the errors an interactive session reports and survives. */
export function isRecoverableError(err: unknown): err is InputError | CallError {
  return err instanceof InputError || err instanceof CallError;
}
