export { createFlagRegistry, normalizeFlagName, normalizeShortFlag } from "./flag-registry.js";
export type { FlagRegistry } from "./flag-registry.js";

export { createCommandRegistry } from "./command-registry.js";
export type { CommandRegistry, RegisteredCommand } from "./command-registry.js";
