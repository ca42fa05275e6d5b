/**
 * Console configuration file loading.
 */

import { readFileSync } from "node:fs";
import { ConfigError } from "@termkit/sdk";
import { ConsoleConfigSchema, validateInput } from "@termkit/shared";
import type { ValidatedConsoleConfig } from "@termkit/shared";

export type ConsoleConfig = ValidatedConsoleConfig;

/**
 * Read and validate a JSON console configuration.
 *
 * @throws ConfigError CONFIG_READ_ERROR when the file is missing or not JSON,
 *   CONFIG_ERROR when it does not match the schema
 */
export function loadConsoleConfig(path: string): ConsoleConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Cannot read console config ${path}: ${err instanceof Error ? err.message : String(err)}`, {
      code: "CONFIG_READ_ERROR",
      cause: err instanceof Error ? err : undefined,
    });
  }

  const result = validateInput(ConsoleConfigSchema, raw);
  if (!result.success || result.data === undefined) {
    throw new ConfigError(`Invalid console config ${path}: ${result.error ?? "not an object"}`);
  }
  return result.data;
}
