/**
 * ConsoleSession -- the interactive read/dispatch loop.
 *
 * Reads one line at a time, resolves its first token against the command
 * registry and runs the command. InputError and CallError are reported and
 * the loop goes on; anything else ends the session and propagates.
 */

import { randomUUID } from "node:crypto";
import { createInterface } from "node:readline";
import type { Interface } from "node:readline";
import { isRecoverableError } from "@termkit/sdk";
import type { OutputStream } from "@termkit/sdk";
import { createLogger } from "@termkit/shared";
import type { Logger } from "@termkit/shared";
import type { CommandRegistry } from "../infrastructure/command-registry.js";
import { applyFlags, resolve, resolveFlags } from "../execution/dispatch.js";
import { tokenize } from "../console/tokenize.js";

export interface ConsoleSessionOptions {
  commands: CommandRegistry;
  input: NodeJS.ReadableStream;
  output: OutputStream;
  prompt: string;
  signal?: AbortSignal;
}

export class ConsoleSession {
  readonly id = randomUUID();
  private readonly logger: Logger;
  private rl?: Interface;
  private stopped = false;
  private closed = false;

  constructor(private readonly options: ConsoleSessionOptions) {
    this.logger = createLogger("ConsoleSession");
    this.logger.setContext({ sessionId: this.id });
  }

  get active(): boolean {
    return this.rl !== undefined && !this.stopped;
  }

  /** End the loop after the current line. */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.close();
  }

  private close(): void {
    if (this.closed || !this.rl) return;
    this.closed = true;
    this.rl.close();
  }

  /** Resolves at an exit command, end of input, or when the signal aborts. */
  async run(): Promise<void> {
    const { input, output, prompt, signal } = this.options;
    if (signal?.aborted) return;

    const rl = createInterface({ input, terminal: false });
    this.rl = rl;
    const onAbort = () => this.stop();
    signal?.addEventListener("abort", onAbort, { once: true });
    this.logger.debug("Session started");

    try {
      output.write(prompt);
      for await (const line of rl) {
        try {
          await this.execute(line);
        } catch (err) {
          if (!isRecoverableError(err)) throw err;
          this.logger.debug(`Rejected line: ${err.message}`, { code: err.code });
          output.write(`error: ${err.message}\n`);
        }
        if (this.stopped) break;
        output.write(prompt);
      }
    } finally {
      signal?.removeEventListener("abort", onAbort);
      this.stopped = true;
      this.close();
      this.logger.debug("Session ended");
    }
  }

  /**
   * Run one console line. The command and all of its flags are resolved
   * before anything fires; then the flags fire and the command handler gets
   * every token after its argument.
   */
  async execute(line: string): Promise<void> {
    const tokens = tokenize(line);
    if (tokens.length === 0) return;

    const invocation = resolve(tokens, this.options.commands);
    const command = invocation.spec;
    const plan = resolveFlags(invocation.remaining, command.flags);

    const log = this.logger.child(command.name);
    log.setContext({ command: command.name });
    command.flags.reset();
    await applyFlags(plan, command.flags);

    const done = log.time(command.name);
    await invocation.run();
    done();
  }
}
