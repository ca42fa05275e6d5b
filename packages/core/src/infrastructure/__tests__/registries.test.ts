import { describe, it, expect, vi } from "vitest";
import { CallError, InputType } from "@termkit/sdk";
import type { CommandSpec, FlagSpec } from "@termkit/sdk";
import {
  createCommandRegistry,
  createFlagRegistry,
  normalizeFlagName,
  normalizeShortFlag,
} from "../index.js";

function flag(name: string, short?: string): FlagSpec {
  return { name, short, description: "", input: InputType.IGNORE, handler: vi.fn() };
}

describe("flag name normalisation", () => {
  it("adds or trims leading dashes", () => {
    expect(normalizeFlagName("count")).toBe("--count");
    expect(normalizeFlagName("-count")).toBe("--count");
    expect(normalizeFlagName("--count")).toBe("--count");
    expect(normalizeShortFlag("c")).toBe("-c");
    expect(normalizeShortFlag("--c")).toBe("-c");
  });

  it("yields an empty name for dashes only", () => {
    expect(normalizeFlagName("--")).toBe("");
    expect(normalizeShortFlag("")).toBe("");
  });
});

describe("FlagRegistry", () => {
  it("registers names with or without dashes to the same flag", () => {
    const registry = createFlagRegistry();
    registry.register(flag("example", "e"));

    expect(registry.lookup("--example")?.name).toBe("--example");
    expect(registry.lookup("-e")?.name).toBe("--example");
    expect(registry.lookup("example")).toBeUndefined();
    expect(registry.lookup("--Example")).toBeUndefined();
  });

  it("rejects a duplicate long name", () => {
    const registry = createFlagRegistry();
    registry.register(flag("--count"));

    expect(() => registry.register(flag("count"))).toThrow(
      expect.objectContaining({ kind: "DUPLICATE_NAME", target: "--count" }),
    );
  });

  it("rejects a duplicate short alias", () => {
    const registry = createFlagRegistry();
    registry.register(flag("--count", "-c"));

    expect(() => registry.register(flag("--config", "c"))).toThrow(
      'Short flag "-c" is already used by "--count"',
    );
  });

  it("rejects empty names and multi-character aliases", () => {
    const registry = createFlagRegistry();

    expect(() => registry.register(flag("--"))).toThrow(CallError);
    expect(() => registry.register(flag("--count", "cc"))).toThrow(
      expect.objectContaining({ kind: "INVALID_SPEC" }),
    );
    expect(registry.list()).toHaveLength(0);
  });

  it("rejects names containing whitespace", () => {
    const registry = createFlagRegistry();

    expect(() => registry.register(flag("--dry run"))).toThrow(
      expect.objectContaining({ kind: "INVALID_SPEC", message: 'Invalid flag name: "--dry run"' }),
    );
    expect(registry.lookup("--dry run")).toBeUndefined();
  });

  it("rejects a spec whose handler is not a function", () => {
    const registry = createFlagRegistry();
    // Shape a plain JavaScript caller could pass
    const spec: FlagSpec = JSON.parse('{"name":"--count","description":"","input":"integer","handler":null}');

    expect(() => registry.register(spec)).toThrow(
      expect.objectContaining({ kind: "INVALID_SPEC", message: 'Flag "--count" has no handler' }),
    );
  });

  it("lists flags in registration order", () => {
    const registry = createFlagRegistry();
    registry.register(flag("zeta"));
    registry.register(flag("alpha"));
    registry.register(flag("mid"));

    expect(registry.list().map((f) => f.name)).toEqual(["--zeta", "--alpha", "--mid"]);
  });

  it("reports recorded values, defaults and resets", () => {
    const registry = createFlagRegistry();
    registry.register({ name: "--count", short: "-c", description: "", input: InputType.INTEGER, default: 0, handler: vi.fn() });

    expect(registry.value("count")).toBe(0);
    registry.record("-c", 4);
    expect(registry.value("c")).toBe(4);
    expect(registry.isSet("--count")).toBe(true);

    registry.reset();
    expect(registry.value("--count")).toBe(0);
    expect(registry.isSet("--count")).toBe(false);
  });

  it("returns undefined for unknown flags", () => {
    const registry = createFlagRegistry();

    expect(registry.value("--missing")).toBeUndefined();
    expect(registry.isSet("--missing")).toBe(false);
  });
});

describe("CommandRegistry", () => {
  it("registers and retrieves a command by exact name", () => {
    const registry = createCommandRegistry();
    const handler = vi.fn();
    const command = registry.register({ name: "load", description: "Load", usage: "<file>", input: InputType.STRING, handler });

    expect(registry.lookup("load")).toBe(command);
    expect(registry.lookup("Load")).toBeUndefined();
    expect(registry.has("load")).toBe(true);
    expect(command.flags.list()).toEqual([]);
  });

  it("rejects duplicate names", () => {
    const registry = createCommandRegistry();
    registry.register({ name: "help", description: "", usage: "", input: InputType.IGNORE, handler: vi.fn() });

    expect(() =>
      registry.register({ name: "help", description: "", usage: "", input: InputType.IGNORE, handler: vi.fn() }),
    ).toThrow(expect.objectContaining({ kind: "DUPLICATE_NAME" }));
  });

  it("rejects empty names and names containing whitespace", () => {
    const registry = createCommandRegistry();

    expect(() =>
      registry.register({ name: "", description: "", usage: "", input: InputType.IGNORE, handler: vi.fn() }),
    ).toThrow(expect.objectContaining({ kind: "INVALID_SPEC" }));
    expect(() =>
      registry.register({ name: "two words", description: "", usage: "", input: InputType.IGNORE, handler: vi.fn() }),
    ).toThrow(CallError);
  });

  it("rejects a spec whose handler is not a function", () => {
    const registry = createCommandRegistry();
    const spec: CommandSpec = JSON.parse('{"name":"deploy","description":"","usage":"","input":"ignore"}');

    expect(() => registry.register(spec)).toThrow(
      expect.objectContaining({ kind: "INVALID_SPEC", message: 'Command "deploy" has no handler' }),
    );
    expect(registry.has("deploy")).toBe(false);
  });

  it("keeps a separate flag registry per command", () => {
    const registry = createCommandRegistry();
    const a = registry.register({ name: "a", description: "", usage: "", input: InputType.IGNORE, handler: vi.fn() });
    const b = registry.register({ name: "b", description: "", usage: "", input: InputType.IGNORE, handler: vi.fn() });
    a.flags.register(flag("--force", "-f"));

    expect(a.flags.lookup("-f")).toBeDefined();
    expect(b.flags.lookup("-f")).toBeUndefined();
    expect(registry.list().map((c) => c.name)).toEqual(["a", "b"]);
  });
});
