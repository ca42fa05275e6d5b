/**
 * FlagRegistry -- startup flags (or a command's own flags) by name.
 *
 * Flags resolve by their long name (`--count`) or short alias (`-c`), exact
 * and case-sensitive. Registration accepts names with or without the leading
 * dashes; both forms land on the same flag.
 */

import { CallError, InputType } from "@termkit/sdk";
import type { FlagSpec, FlagValue } from "@termkit/sdk";
import { createLogger } from "@termkit/shared";

const logger = createLogger("FlagRegistry");

export interface FlagRegistry {
  /** @throws CallError DUPLICATE_NAME when the name or alias is taken, INVALID_SPEC when malformed */
  register(spec: FlagSpec): FlagSpec;
  /** Resolve an argv token exactly against long names and short aliases. */
  lookup(token: string): FlagSpec | undefined;
  /** Registration order. */
  list(): FlagSpec[];
  /** Store the value a flag fired with. */
  record(name: string, value: FlagValue): void;
  /** Fired value, or the registered default. Accepts any spelling `register` accepts. */
  value(name: string): FlagValue;
  isSet(name: string): boolean;
  /** Forget every fired value. */
  reset(): void;
}

/** `count`, `-count` and `--count` all become `--count`. */
export function normalizeFlagName(name: string): string {
  const bare = name.replace(/^-+/, "");
  return bare ? `--${bare}` : "";
}

/** `c` and `-c` become `-c`. */
export function normalizeShortFlag(short: string): string {
  const bare = short.replace(/^-+/, "");
  return bare ? `-${bare}` : "";
}

export function createFlagRegistry(): FlagRegistry {
  const flags = new Map<string, FlagSpec>();
  const aliases = new Map<string, string>();
  const fired = new Map<string, FlagValue>();

  function resolve(name: string): FlagSpec | undefined {
    const exact = flags.get(name) ?? flags.get(aliases.get(name) ?? "");
    if (exact) return exact;
    const long = flags.get(normalizeFlagName(name));
    if (long) return long;
    return flags.get(aliases.get(normalizeShortFlag(name)) ?? "");
  }

  return {
    register(spec: FlagSpec): FlagSpec {
      const name = normalizeFlagName(spec.name);
      const short = spec.short ? normalizeShortFlag(spec.short) : undefined;

      if (!name) {
        throw new CallError("INVALID_SPEC", spec.name, "Flag name must not be empty");
      }
      if (/\s/.test(name)) {
        throw new CallError("INVALID_SPEC", spec.name, `Invalid flag name: "${spec.name}"`);
      }
      if (typeof spec.handler !== "function") {
        throw new CallError("INVALID_SPEC", name, `Flag "${name}" has no handler`);
      }
      if (short !== undefined && short.length !== 2) {
        throw new CallError("INVALID_SPEC", name, `Short alias for "${name}" must be one character, got "${spec.short}"`);
      }
      if (flags.has(name)) {
        throw new CallError("DUPLICATE_NAME", name, `Flag "${name}" is already registered`);
      }
      if (short && aliases.has(short)) {
        throw new CallError(
          "DUPLICATE_NAME",
          short,
          `Short flag "${short}" is already used by "${aliases.get(short)}"`,
        );
      }

      const normalized: FlagSpec = { ...spec, name, short };
      flags.set(name, normalized);
      if (short) aliases.set(short, name);
      logger.debug(`Registering flag: ${name}`, short ? { short } : undefined);
      return normalized;
    },

    lookup(token: string): FlagSpec | undefined {
      return flags.get(token) ?? flags.get(aliases.get(token) ?? "");
    },

    list(): FlagSpec[] {
      return [...flags.values()];
    },

    record(name: string, value: FlagValue): void {
      const spec = resolve(name);
      if (spec) fired.set(spec.name, value);
    },

    value(name: string): FlagValue {
      const spec = resolve(name);
      if (!spec) return undefined;
      if (fired.has(spec.name)) return fired.get(spec.name);
      if (spec.default !== undefined) return spec.default;
      return spec.input === InputType.IGNORE ? false : undefined;
    },

    isSet(name: string): boolean {
      const spec = resolve(name);
      return spec !== undefined && fired.has(spec.name);
    },

    reset(): void {
      fired.clear();
    },
  };
}
