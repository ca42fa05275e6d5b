/**
 * Coercion of raw argument tokens into typed values.
 */

import { InputError, InputType } from "@termkit/sdk";

const INTEGER_LITERAL = /^[+-]?\d+$/;
const FLOAT_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse a base-10 integer literal.
 * @param target - Flag or command name, used in the error message
 */
export function coerceInteger(raw: string, target = ""): number {
  const token = raw.trim();
  if (INTEGER_LITERAL.test(token)) {
    const value = Number(token);
    if (Number.isSafeInteger(value)) return value;
  }
  throw new InputError(
    "BAD_INTEGER_FORMAT",
    target,
    `${prefix(target)}expected an integer, got "${raw}"`,
    raw,
  );
}

/**
 * Parse a decimal literal (with optional fraction and exponent).
 * @param target - Flag or command name, used in the error message
 */
export function coerceFloat(raw: string, target = ""): number {
  const token = raw.trim();
  if (FLOAT_LITERAL.test(token)) {
    const value = Number(token);
    if (Number.isFinite(value)) return value;
  }
  throw new InputError(
    "BAD_FLOAT_FORMAT",
    target,
    `${prefix(target)}expected a number, got "${raw}"`,
    raw,
  );
}

/**
 * Convert a raw token according to `type`. IGNORE and STRING return the token unchanged.
 */
export function coerce(raw: string, type: InputType, target = ""): string | number {
  switch (type) {
    case InputType.IGNORE:
    case InputType.STRING:
      return raw;
    case InputType.INTEGER:
      return coerceInteger(raw, target);
    case InputType.FLOAT:
      return coerceFloat(raw, target);
  }
}

function prefix(target: string): string {
  return target ? `${target}: ` : "";
}
