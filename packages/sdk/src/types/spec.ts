/**
 * Flag and command specifications.
 *
 * Flags and commands share one dispatch contract: a handler written once
 * receives the same `(value, remaining)` pair whether it fired from the
 * process arguments or from a line typed into the interactive console.
 */

import type { FlagValue, InputType, InputValue } from "./input.js";

export type HandlerResult = void | Promise<void>;

/**
 * Handler bound to a flag or command.
 * `remaining` holds the raw tokens left after the name and its argument.
 */
export type Handler<T extends InputType = InputType> = (
  value: InputValue<T>,
  remaining: string[],
) => HandlerResult;

/**
 * One member per input type, so `input` discriminates the handler's value type.
 */
export type TypedSpec<Fields> = {
  [K in InputType]: Fields & { input: K; handler: Handler<K> };
}[InputType];

export interface FlagFields {
  /** Normalised long name, e.g. `--count` */
  name: string;
  /** Normalised short alias, e.g. `-c` */
  short?: string;
  description: string;
  /** Reported by `value()` while the flag has not fired */
  default?: FlagValue;
}

export interface CommandFields {
  name: string;
  description: string;
  /** Argument synopsis shown by `help`, e.g. `<input_file> <output_file>` */
  usage: string;
}

export type FlagSpec = TypedSpec<FlagFields>;
export type CommandSpec = TypedSpec<CommandFields>;

/** Anything the dispatch engine can resolve and invoke. */
export type DispatchSpec = TypedSpec<{ name: string }>;

/** Options accepted when declaring a flag. `input` defaults to IGNORE. */
export type FlagOptions = {
  [K in InputType]: { input: K; default?: FlagValue; handler?: Handler<K> };
}[InputType];

/** Options accepted when declaring a command. */
export type CommandOptions = {
  [K in InputType]: { input: K; handler: Handler<K>; description?: string; usage?: string };
}[InputType];
