/**
 * Input types a flag or command argument can be coerced to.
 */

export const InputType = {
  /** No argument is consumed; the handler receives `undefined`. */
  IGNORE: "ignore",
  STRING: "string",
  INTEGER: "integer",
  FLOAT: "float",
} as const;

export type InputType = (typeof InputType)[keyof typeof InputType];

/** Value a handler receives for a given input type. */
export type InputValue<T extends InputType> = T extends typeof InputType.IGNORE
  ? undefined
  : T extends typeof InputType.STRING
    ? string
    : number;

/** Value a flag reports when queried: the coerced argument, or its default. */
export type FlagValue = string | number | boolean | undefined;
