import { describe, it, expect } from "vitest";
import { isVchar, isWs } from "../../src/predicates";

describe("isWs", () => {
  it("accepts space and horizontal tab", () => {
    expect(isWs(" ")).toBe(true);
    expect(isWs("\t")).toBe(true);
    expect(isWs(0x20)).toBe(true);
    expect(isWs(0x09)).toBe(true);
  });

  it("rejects line breaks and other characters", () => {
    expect(isWs("\n")).toBe(false);
    expect(isWs("\r")).toBe(false);
    expect(isWs("a")).toBe(false);
    expect(isWs("\u00a0")).toBe(false);
    expect(isWs("")).toBe(false);
  });
});

describe("isVchar", () => {
  it("has an exclusive lower and inclusive upper bound", () => {
    expect(isVchar(" ")).toBe(false);
    expect(isVchar("!")).toBe(true);
    expect(isVchar("~")).toBe(true);
    expect(isVchar("\u007f")).toBe(false);
  });

  it("accepts numeric code points", () => {
    expect(isVchar(0x21)).toBe(true);
    expect(isVchar(0x7e)).toBe(true);
    expect(isVchar(0x20)).toBe(false);
    expect(isVchar(0x7f)).toBe(false);
  });

  it("rejects control, non-ASCII and non-character input", () => {
    expect(isVchar("\t")).toBe(false);
    expect(isVchar("é")).toBe(false);
    expect(isVchar("")).toBe(false);
    expect(isVchar(33.5)).toBe(false);
    expect(isVchar(Number.NaN)).toBe(false);
  });
});
