/**
 * Dispatch engine -- resolves the leading token against a registry, coerces
 * its argument and invokes the bound handler with `(value, remaining)`.
 *
 * Flags and console commands go through the same path, so a handler sees the
 * same remaining slice in both contexts.
 */

import { CallError, InputError, InputType } from "@termkit/sdk";
import type { DispatchSpec, FlagValue, HandlerResult } from "@termkit/sdk";
import { createLogger } from "@termkit/shared";
import { coerceFloat, coerceInteger } from "./coerce.js";

const logger = createLogger("Dispatch");

export interface SpecLookup<S extends DispatchSpec> {
  lookup(name: string): S | undefined;
}

/** A resolved call, ready to run. */
export interface Invocation<S extends DispatchSpec> {
  spec: S;
  /** Coerced argument; `undefined` for IGNORE */
  value: string | number | undefined;
  /** Tokens after the name and its argument */
  remaining: string[];
  run(): HandlerResult;
}

export interface DispatchOutcome<S extends DispatchSpec> {
  spec: S;
  value: string | number | undefined;
  remaining: string[];
  /** Whatever the handler returned */
  result: HandlerResult;
}

export interface FlagParseResult {
  /** Flags that fired, in argv order */
  fired: string[];
  /** Tokens that matched no flag and were not consumed as an argument */
  unmatched: string[];
}

/**
 * Resolve `tokens[0]` and coerce its argument without invoking anything.
 *
 * @throws CallError UNKNOWN_COMMAND when the name is not registered
 * @throws InputError MISSING_ARGUMENT or a bad-format kind for the argument
 */
export function resolve<S extends DispatchSpec>(
  tokens: readonly string[],
  registry: SpecLookup<S>,
): Invocation<S> {
  const name = tokens[0];
  const spec = name === undefined ? undefined : registry.lookup(name);
  if (name === undefined || spec === undefined) {
    throw new CallError("UNKNOWN_COMMAND", name ?? "", `Unknown command: ${name ?? "(empty)"}`);
  }

  const target: DispatchSpec = spec;
  if (target.input === InputType.IGNORE) {
    const remaining = tokens.slice(1);
    return { spec, value: undefined, remaining, run: () => target.handler(undefined, remaining) };
  }

  const raw = tokens[1];
  if (raw === undefined) {
    throw new InputError("MISSING_ARGUMENT", name, `${name}: missing <${target.input}> argument`);
  }
  const remaining = tokens.slice(2);

  switch (target.input) {
    case InputType.STRING:
      return { spec, value: raw, remaining, run: () => target.handler(raw, remaining) };
    case InputType.INTEGER: {
      const value = coerceInteger(raw, name);
      return { spec, value, remaining, run: () => target.handler(value, remaining) };
    }
    case InputType.FLOAT: {
      const value = coerceFloat(raw, name);
      return { spec, value, remaining, run: () => target.handler(value, remaining) };
    }
  }
}

/**
 * Resolve `tokens[0]` and invoke its handler synchronously.
 * Returns the handler's result untouched; a returned promise is the caller's to await.
 */
export function dispatch<S extends DispatchSpec>(
  tokens: readonly string[],
  registry: SpecLookup<S>,
): DispatchOutcome<S> {
  const invocation = resolve(tokens, registry);
  logger.debug(`Dispatching ${invocation.spec.name}`, { remaining: invocation.remaining.length });
  return {
    spec: invocation.spec,
    value: invocation.value,
    remaining: invocation.remaining,
    result: invocation.run(),
  };
}

/** Storage for fired flag values; FlagRegistry implements it. */
export interface FlagLookup<S extends DispatchSpec> extends SpecLookup<S> {
  record(name: string, value: FlagValue): void;
}

/** Every flag in an argv, resolved and coerced but not yet fired. */
export interface FlagPlan<S extends DispatchSpec> {
  invocations: Invocation<S>[];
  unmatched: string[];
}

/**
 * Walk `argv` left to right and resolve every token that names a flag.
 *
 * Nothing runs here: a malformed argument anywhere throws before any
 * handler fires, so an argv is applied whole or not at all.
 */
export function resolveFlags<S extends DispatchSpec>(
  argv: readonly string[],
  registry: SpecLookup<S>,
): FlagPlan<S> {
  const invocations: Invocation<S>[] = [];
  const unmatched: string[] = [];

  let i = 0;
  while (i < argv.length) {
    const token = argv[i];
    if (registry.lookup(token) === undefined) {
      unmatched.push(token);
      i++;
      continue;
    }

    const tokens = argv.slice(i);
    const invocation = resolve(tokens, registry);
    invocations.push(invocation);
    i += tokens.length - invocation.remaining.length;
  }

  return { invocations, unmatched };
}

/** Record and fire a resolved plan in argv order, awaiting each handler. */
export async function applyFlags<S extends DispatchSpec>(
  plan: FlagPlan<S>,
  registry: FlagLookup<S>,
): Promise<FlagParseResult> {
  const fired: string[] = [];
  for (const invocation of plan.invocations) {
    logger.debug(`Dispatching ${invocation.spec.name}`, { remaining: invocation.remaining.length });
    registry.record(invocation.spec.name, invocation.value ?? true);
    fired.push(invocation.spec.name);
    await invocation.run();
  }
  return { fired, unmatched: plan.unmatched };
}

/**
 * Resolve every flag in `argv`, then fire them in order.
 *
 * Each flag's handler gets the tokens after its own argument. Tokens that
 * name no flag are skipped. A malformed argument rejects the whole argv;
 * no flag fires.
 */
export async function parseFlags<S extends DispatchSpec>(
  argv: readonly string[],
  registry: FlagLookup<S>,
): Promise<FlagParseResult> {
  return applyFlags(resolveFlags(argv, registry), registry);
}
