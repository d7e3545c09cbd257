// CHANGE: Verify environment integer parsing and defaults.
// WHY: Invalid overrides fall back to defaults instead of disabling the size ceiling.

import { describe, expect, it } from "vitest";
import { SCAN, positiveInt } from "../src/config.js";

describe("positiveInt", () => {
  it("parses positive integers", () => {
    expect(positiveInt("8", 4)).toBe(8);
  });

  it("falls back for missing, invalid and non-positive values", () => {
    expect(positiveInt(undefined, 4)).toBe(4);
    expect(positiveInt("many", 4)).toBe(4);
    expect(positiveInt("0", 4)).toBe(4);
    expect(positiveInt("-3", 4)).toBe(4);
  });
});

describe("SCAN", () => {
  it("exposes positive limits", () => {
    expect(SCAN.MAX_FILE_BYTES).toBeGreaterThan(0);
    expect(SCAN.CONCURRENCY).toBeGreaterThan(0);
  });
});
