/**
 * Zod schema for console configuration files.
 */

import { z } from "zod";

export const DisplayLevelSchema = z.enum(["ignore", "stdout", "log", "stdout_log"]);

export const DisplayLevelsSchema = z
  .object({
    verbose: DisplayLevelSchema.optional(),
    info: DisplayLevelSchema.optional(),
    warning: DisplayLevelSchema.optional(),
    error: DisplayLevelSchema.optional(),
  })
  .strict();

export const ConsoleConfigSchema = z
  .object({
    prompt: z.string().optional(),
    exitCommands: z
      .array(z.string().min(1, "Exit command must not be empty"))
      .min(1, "At least one exit command is required")
      .optional(),
    helpFlag: z.boolean().optional(),
    logFile: z.string().min(1, "Log file path must not be empty").optional(),
    display: DisplayLevelsSchema.optional(),
  })
  .strict();

export type ValidatedConsoleConfig = z.infer<typeof ConsoleConfigSchema>;
