/**
 * Error codes carried by every TermkitError.
 */
export const ErrorCode = {
  // Argument coercion
  BAD_INTEGER_FORMAT: "BAD_INTEGER_FORMAT",
  BAD_FLOAT_FORMAT: "BAD_FLOAT_FORMAT",
  MISSING_ARGUMENT: "MISSING_ARGUMENT",

  // Name resolution and registration
  UNKNOWN_COMMAND: "UNKNOWN_COMMAND",
  DUPLICATE_NAME: "DUPLICATE_NAME",
  INVALID_SPEC: "INVALID_SPEC",

  // Configuration
  CONFIG_ERROR: "CONFIG_ERROR",
  CONFIG_READ_ERROR: "CONFIG_READ_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export type InputErrorKind =
  | typeof ErrorCode.BAD_INTEGER_FORMAT
  | typeof ErrorCode.BAD_FLOAT_FORMAT
  | typeof ErrorCode.MISSING_ARGUMENT;

export type CallErrorKind =
  | typeof ErrorCode.UNKNOWN_COMMAND
  | typeof ErrorCode.DUPLICATE_NAME
  | typeof ErrorCode.INVALID_SPEC;
