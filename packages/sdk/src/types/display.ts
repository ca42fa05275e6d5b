/**
 * DisplayInformation routing types.
 */

/** Where a relayed message goes. */
export const DisplayLevel = {
  IGNORE: "ignore",
  STDOUT: "stdout",
  LOG: "log",
  STDOUT_LOG: "stdout_log",
} as const;

export type DisplayLevel = (typeof DisplayLevel)[keyof typeof DisplayLevel];

/** Message categories with an independent level each. */
export const DISPLAY_CATEGORIES = ["verbose", "info", "warning", "error"] as const;

export type DisplayCategory = (typeof DISPLAY_CATEGORIES)[number];

/** How an interactive session seeds its own display levels. */
export const ConsoleMode = {
  /** Every category starts at IGNORE until reconfigured. */
  IGNORE: "ignore",
  /** Copy the caller's current levels. */
  INHERIT: "inherit",
} as const;

export type ConsoleMode = (typeof ConsoleMode)[keyof typeof ConsoleMode];

/** Append-only line destination. */
export interface LogSink {
  append(line: string): void;
}

/** The subset of a writable stream DisplayInformation and sessions write to. */
export interface OutputStream {
  write(chunk: string): unknown;
}
