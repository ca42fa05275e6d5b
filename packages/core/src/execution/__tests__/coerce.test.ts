import { describe, it, expect } from "vitest";
import { InputError, InputType } from "@termkit/sdk";
import { coerce, coerceFloat, coerceInteger } from "../coerce.js";

describe("coerceInteger", () => {
  it("parses signed base-10 literals", () => {
    expect(coerceInteger("5")).toBe(5);
    expect(coerceInteger("-12")).toBe(-12);
    expect(coerceInteger("+7")).toBe(7);
    expect(coerceInteger(" 42 ")).toBe(42);
  });

  it.each(["five", "5.0", "0x10", "1e3", "", "12abc"])("rejects %j", (raw) => {
    expect(() => coerceInteger(raw)).toThrow(InputError);
  });

  it("rejects literals beyond the safe integer range", () => {
    expect(() => coerceInteger("99999999999999999999")).toThrow(InputError);
  });

  it("names the target in the error", () => {
    try {
      coerceInteger("five", "--count");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InputError);
      expect(err).toMatchObject({
        kind: "BAD_INTEGER_FORMAT",
        target: "--count",
        token: "five",
        message: '--count: expected an integer, got "five"',
      });
    }
  });
});

describe("coerceFloat", () => {
  it("parses decimal literals", () => {
    expect(coerceFloat("3.14")).toBe(3.14);
    expect(coerceFloat("-0.5")).toBe(-0.5);
    expect(coerceFloat(".5")).toBe(0.5);
    expect(coerceFloat("5.")).toBe(5);
    expect(coerceFloat("1e3")).toBe(1000);
    expect(coerceFloat("7")).toBe(7);
  });

  it.each(["abc", "1e", ".", "1.2.3", "", "1e999"])("rejects %j", (raw) => {
    expect(() => coerceFloat(raw)).toThrow(
      expect.objectContaining({ kind: "BAD_FLOAT_FORMAT" }),
    );
  });
});

describe("coerce", () => {
  it("returns the raw token for IGNORE and STRING", () => {
    expect(coerce("anything", InputType.IGNORE)).toBe("anything");
    expect(coerce("5", InputType.STRING)).toBe("5");
  });

  it("converts numeric input types", () => {
    expect(coerce("5", InputType.INTEGER)).toBe(5);
    expect(coerce("2.5", InputType.FLOAT)).toBe(2.5);
  });
});
