import { describe, expect, it } from "vitest";

import { parseCsvList, parseNonNegativeNumber, parsePositiveInt, requireOption } from "../src/cli/args.js";
import { DEFAULT_TEMPERATURE } from "../src/config/defaults.js";
import { ConfigurationError } from "../src/errors.js";

describe("CLI argument parsing", () => {
  it("parses positive integers strictly", () => {
    expect(parsePositiveInt("3", "--concurrency")).toBe(3);
    expect(() => parsePositiveInt("0", "--concurrency")).toThrow("Invalid --concurrency: 0");
    expect(() => parsePositiveInt("3x", "--concurrency")).toThrow(ConfigurationError);
  });

  it("parses non-negative numbers", () => {
    expect(parseNonNegativeNumber("0.7", "--temperature")).toBe(0.7);
    expect(parseNonNegativeNumber(String(DEFAULT_TEMPERATURE), "--temperature")).toBe(0);
    expect(() => parseNonNegativeNumber("-1", "--temperature")).toThrow(ConfigurationError);
    expect(() => parseNonNegativeNumber("", "--temperature")).toThrow(ConfigurationError);
  });

  it("dedupes comma-separated lists", () => {
    expect(parseCsvList(" a, b,a ,")).toEqual(["a", "b"]);
    expect(() => parseCsvList(",")).toThrow(ConfigurationError);
  });

  it("requires non-blank options", () => {
    expect(requireOption(" x ", "--input")).toBe("x");
    expect(() => requireOption(undefined, "--input")).toThrow("Missing required option --input.");
  });
});
