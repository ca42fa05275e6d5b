/**
 * Command -- handle returned by `consoleAddCommand` for declaring the flags a
 * command accepts on its own line.
 */

import type { FlagOptions, FlagSpec, FlagValue, InputType } from "@termkit/sdk";
import type { RegisteredCommand } from "../infrastructure/command-registry.js";
import { buildFlagSpec } from "./flag-spec.js";

export class Command {
  constructor(private readonly registered: RegisteredCommand) {}

  get name(): string {
    return this.registered.name;
  }

  get description(): string {
    return this.registered.description;
  }

  get usage(): string {
    return this.registered.usage;
  }

  get input(): InputType {
    return this.registered.input;
  }

  /**
   * Declare a flag for this command. Without a handler the flag only records
   * its value, readable through `flagValue` while the command runs.
   */
  addFlag(name: string, short?: string, description = "", options?: FlagOptions): FlagSpec {
    return this.registered.flags.register(
      buildFlagSpec({ name, short, description, options }, () => undefined),
    );
  }

  /** Value of a command flag on the current invocation, or its default. */
  flagValue(name: string): FlagValue {
    return this.registered.flags.value(name);
  }

  isFlagSet(name: string): boolean {
    return this.registered.flags.isSet(name);
  }

  flags(): FlagSpec[] {
    return this.registered.flags.list();
  }
}
