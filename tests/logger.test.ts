// CHANGE: Verify logger respects configured log level.
// WHY: Debug output stays hidden unless requested; logs never reach stdout.

import { afterEach, describe, expect, it, vi } from "vitest";
import { debug, error, info, parseLogLevel, setLogLevel } from "../src/logger.js";

describe("logger", () => {
  afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
  });

  it("suppresses debug logs when level is info", () => {
    setLogLevel("info");
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    debug("hidden");
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("emits debug logs when level is debug", () => {
    setLogLevel("debug");
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    debug("visible");
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(String(errorSpy.mock.calls[0]?.[0])).toContain("[DEBUG] visible");
  });

  it("keeps info and error logs off stdout", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    info("summary");
    error("failure");
    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledTimes(2);
  });

  it("hides info logs when level is error", () => {
    setLogLevel("error");
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    info("quiet");
    error("loud");
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it("accepts every level name from the environment", () => {
    expect(parseLogLevel("debug")).toBe("debug");
    expect(parseLogLevel("info")).toBe("info");
    expect(parseLogLevel("error")).toBe("error");
  });

  it("falls back to info for missing or unknown level names", () => {
    expect(parseLogLevel(undefined)).toBe("info");
    expect(parseLogLevel("ERROR")).toBe("info");
    expect(parseLogLevel("verbose")).toBe("info");
  });
});
