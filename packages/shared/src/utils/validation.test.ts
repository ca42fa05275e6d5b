import { describe, it, expect } from "vitest";
import { ConsoleConfigSchema } from "./config-schema.js";
import { validateInput } from "./validation.js";

describe("validateInput", () => {
  it("returns parsed data for a valid console config", () => {
    const result = validateInput(ConsoleConfigSchema, {
      prompt: "app> ",
      display: { info: "stdout_log" },
    });

    expect(result.success).toBe(true);
    expect(result.data).toEqual({ prompt: "app> ", display: { info: "stdout_log" } });
  });

  it("formats issues with their path", () => {
    const result = validateInput(ConsoleConfigSchema, {
      display: { info: "loud" },
    });

    expect(result.success).toBe(false);
    expect(result.error).toMatch(/^display\.info: /);
  });

  it("rejects an empty exit command list", () => {
    const result = validateInput(ConsoleConfigSchema, { exitCommands: [] });

    expect(result.success).toBe(false);
    expect(result.error).toBe("exitCommands: At least one exit command is required");
  });

  it("rejects unknown keys", () => {
    const result = validateInput(ConsoleConfigSchema, { colour: true });

    expect(result.success).toBe(false);
  });
});
