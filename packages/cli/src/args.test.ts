import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { increaseVerbosity, parseBlockCount, parseBlockNumber, parseRate } from "./args.ts";

describe("argument parsers", () => {
  it("should parse block numbers as bigint", () => {
    expect(parseBlockNumber("0")).toBe(0n);
    expect(parseBlockNumber("18000000")).toBe(18_000_000n);
  });

  it("should reject malformed block numbers", () => {
    for (const value of ["-1", "1.5", "0x10", ""]) {
      expect(() => parseBlockNumber(value)).toThrow(InvalidArgumentError);
    }
  });

  it("should require at least one block for a count", () => {
    expect(parseBlockCount("25")).toBe(25n);
    expect(() => parseBlockCount("0")).toThrow("Expected at least one block.");
  });

  it("should accept fractional positive rates", () => {
    expect(parseRate("0.5")).toBe(0.5);
    expect(() => parseRate("0")).toThrow("Expected a positive number of blocks per second.");
    expect(() => parseRate("fast")).toThrow(InvalidArgumentError);
  });

  it("should count verbosity flags", () => {
    expect(increaseVerbosity("", 0)).toBe(1);
    expect(increaseVerbosity("", 3)).toBe(4);
  });
});
