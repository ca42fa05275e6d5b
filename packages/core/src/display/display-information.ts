/**
 * DisplayInformation -- routes program messages per category to stdout, a
 * log sink, both, or neither.
 */

import { appendFileSync } from "node:fs";
import { format } from "node:util";
import { ConsoleMode, DISPLAY_CATEGORIES, DisplayLevel } from "@termkit/sdk";
import type { DisplayCategory, LogSink, OutputStream } from "@termkit/sdk";

export type DisplayLevels = Record<DisplayCategory, DisplayLevel>;

export interface DisplayInformationOptions {
  /** Per-category levels; unspecified categories start at IGNORE */
  levels?: Partial<DisplayLevels>;
  /** Default: process.stdout */
  output?: OutputStream;
  sink?: LogSink;
}

export class DisplayInformation {
  private readonly routing: DisplayLevels;
  private readonly output: OutputStream;
  private logSink?: LogSink;

  constructor(options: DisplayInformationOptions = {}) {
    this.routing = uniformLevels(DisplayLevel.IGNORE);
    for (const category of DISPLAY_CATEGORIES) {
      const level = options.levels?.[category];
      if (level) this.routing[category] = level;
    }
    this.output = options.output ?? process.stdout;
    this.logSink = options.sink;
  }

  /**
   * Format the message and write it wherever `category` is routed.
   * `format` takes printf-style placeholders filled from `args` in order.
   */
  relay(category: DisplayCategory, message: string, ...args: unknown[]): void {
    const level = this.routing[category];
    if (level === DisplayLevel.IGNORE) return;

    const line = format(message, ...args);
    if (level === DisplayLevel.STDOUT || level === DisplayLevel.STDOUT_LOG) {
      this.output.write(`${line}\n`);
    }
    if (level === DisplayLevel.LOG || level === DisplayLevel.STDOUT_LOG) {
      this.logSink?.append(line);
    }
  }

  verbose(message: string, ...args: unknown[]): void {
    this.relay("verbose", message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.relay("info", message, ...args);
  }

  warning(message: string, ...args: unknown[]): void {
    this.relay("warning", message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.relay("error", message, ...args);
  }

  level(category: DisplayCategory): DisplayLevel {
    return this.routing[category];
  }

  setLevel(category: DisplayCategory, level: DisplayLevel): void {
    this.routing[category] = level;
  }

  setAll(level: DisplayLevel): void {
    for (const category of DISPLAY_CATEGORIES) this.routing[category] = level;
  }

  /** Snapshot of the current routing. */
  levels(): DisplayLevels {
    return { ...this.routing };
  }

  get sink(): LogSink | undefined {
    return this.logSink;
  }

  set sink(sink: LogSink | undefined) {
    this.logSink = sink;
  }

  /**
   * New instance sharing this one's sink, and its output unless another is given.
   * INHERIT copies the current levels; IGNORE starts every category silent.
   */
  fork(mode: ConsoleMode, output: OutputStream = this.output): DisplayInformation {
    return new DisplayInformation({
      levels: mode === ConsoleMode.INHERIT ? this.levels() : undefined,
      output,
      sink: this.logSink,
    });
  }
}

function uniformLevels(level: DisplayLevel): DisplayLevels {
  return { verbose: level, info: level, warning: level, error: level };
}

/**
 * Log sink appending whole lines to `path`. The file is created on first
 * write and never read or truncated.
 */
export function createFileSink(path: string): LogSink {
  return {
    append(line: string): void {
      appendFileSync(path, `${line}\n`, "utf-8");
    },
  };
}
