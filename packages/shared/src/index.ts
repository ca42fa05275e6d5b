export { createLogger } from "./logger/index.js";
export type { Logger, LogLevel, LogContext } from "./logger/index.js";

export { validateInput, formatZodError } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export { ConsoleConfigSchema, DisplayLevelSchema, DisplayLevelsSchema } from "./utils/config-schema.js";
export type { ValidatedConsoleConfig } from "./utils/config-schema.js";
