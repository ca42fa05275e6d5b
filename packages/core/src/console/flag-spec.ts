import { InputType } from "@termkit/sdk";
import type { FlagOptions, FlagSpec, Handler } from "@termkit/sdk";

export interface FlagDeclaration {
  name: string;
  short?: string;
  description: string;
  options?: FlagOptions;
}

/**
 * Build a FlagSpec, binding `fallback` when the options carry no handler.
 * Without options the flag is an IGNORE switch.
 */
export function buildFlagSpec(declaration: FlagDeclaration, fallback: Handler): FlagSpec {
  const { name, short, description } = declaration;
  const options: FlagOptions = declaration.options ?? { input: InputType.IGNORE };
  const base = { name, short, description, default: options.default };

  switch (options.input) {
    case InputType.IGNORE:
      return { ...base, input: options.input, handler: options.handler ?? fallback };
    case InputType.STRING:
      return { ...base, input: options.input, handler: options.handler ?? fallback };
    case InputType.INTEGER:
      return { ...base, input: options.input, handler: options.handler ?? fallback };
    case InputType.FLOAT:
      return { ...base, input: options.input, handler: options.handler ?? fallback };
  }
}
