/**
 * Help listings for flags and commands, in registration order.
 */

import { InputType } from "@termkit/sdk";
import type { FlagSpec } from "@termkit/sdk";
import type { RegisteredCommand } from "../infrastructure/command-registry.js";

const GUTTER = 2;

function argument(input: InputType): string {
  return input === InputType.IGNORE ? "" : ` <${input}>`;
}

function columns(rows: Array<[string, string]>, indent: string): string[] {
  const width = Math.max(...rows.map(([left]) => left.length)) + GUTTER;
  return rows.map(([left, right]) => `${indent}${left.padEnd(width)}${right}`.trimEnd());
}

/**
 * @example
 * ```
 *   --count, -c <integer>  Items to process (default: 0)
 * ```
 */
export function formatFlagHelp(flags: FlagSpec[], indent = "  "): string[] {
  if (flags.length === 0) return [];
  return columns(
    flags.map((flag) => {
      const names = flag.short ? `${flag.name}, ${flag.short}` : flag.name;
      const fallback = flag.default !== undefined ? ` (default: ${String(flag.default)})` : "";
      return [`${names}${argument(flag.input)}`, `${flag.description}${fallback}`];
    }),
    indent,
  );
}

export function commandSynopsis(command: RegisteredCommand): string {
  const usage = command.usage ? ` ${command.usage}` : "";
  return `${command.name}${argument(command.input)}${usage}`;
}

export function formatCommandHelp(commands: RegisteredCommand[]): string[] {
  if (commands.length === 0) return ["No commands registered."];
  return [
    "Commands:",
    ...columns(
      commands.map((command) => [commandSynopsis(command), command.description]),
      "  ",
    ),
  ];
}

/** Usage line, description and flags of one command. */
export function formatCommandDetail(command: RegisteredCommand): string[] {
  const lines = [`Usage: ${commandSynopsis(command)}`];
  if (command.description) lines.push(`  ${command.description}`);
  const flags = formatFlagHelp(command.flags.list(), "    ");
  if (flags.length > 0) lines.push("  Flags:", ...flags);
  return lines;
}
