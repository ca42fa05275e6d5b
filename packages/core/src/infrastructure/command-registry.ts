/**
 * CommandRegistry -- commands available inside the interactive console.
 *
 * Exact, case-sensitive names; each command owns a FlagRegistry for the
 * flags it accepts on its own line.
 */

import { CallError } from "@termkit/sdk";
import type { CommandSpec } from "@termkit/sdk";
import { createLogger } from "@termkit/shared";
import { createFlagRegistry } from "./flag-registry.js";
import type { FlagRegistry } from "./flag-registry.js";

const logger = createLogger("CommandRegistry");

export type RegisteredCommand = CommandSpec & { flags: FlagRegistry };

export interface CommandRegistry {
  /** @throws CallError DUPLICATE_NAME when taken, INVALID_SPEC when malformed */
  register(spec: CommandSpec): RegisteredCommand;
  lookup(name: string): RegisteredCommand | undefined;
  has(name: string): boolean;
  /** Registration order. */
  list(): RegisteredCommand[];
}

export function createCommandRegistry(): CommandRegistry {
  const commands = new Map<string, RegisteredCommand>();

  return {
    register(spec: CommandSpec): RegisteredCommand {
      if (!spec.name || /\s/.test(spec.name)) {
        throw new CallError("INVALID_SPEC", spec.name, `Invalid command name: "${spec.name}"`);
      }
      if (typeof spec.handler !== "function") {
        throw new CallError("INVALID_SPEC", spec.name, `Command "${spec.name}" has no handler`);
      }
      if (commands.has(spec.name)) {
        throw new CallError("DUPLICATE_NAME", spec.name, `Command "${spec.name}" is already registered`);
      }

      logger.debug(`Registering command: ${spec.name}`);
      const command: RegisteredCommand = { ...spec, flags: createFlagRegistry() };
      commands.set(spec.name, command);
      return command;
    },

    lookup(name: string): RegisteredCommand | undefined {
      return commands.get(name);
    },

    has(name: string): boolean {
      return commands.has(name);
    },

    list(): RegisteredCommand[] {
      return [...commands.values()];
    },
  };
}
