import { afterEach, describe, expect, it, vi } from "vitest";
import { debug, error, getLogLevel, info, setLogLevel, warn } from "../src/logger.js";

describe("logger", () => {
  afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
  });

  it("suppresses debug logs when level is info", () => {
    setLogLevel("info");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    debug("hidden");
    expect(logSpy).not.toHaveBeenCalled();
  });

  it("emits debug logs when level is debug", () => {
    setLogLevel("debug");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    debug("visible");
    expect(logSpy).toHaveBeenCalledTimes(1);
  });

  it("routes warnings and errors to stderr", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    warn("mirror switch");
    error("failed");
    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(errorSpy.mock.calls[0]?.[0]).toContain("[WARN] mirror switch");
    expect(errorSpy.mock.calls[1]?.[0]).toContain("[ERROR] failed");
  });

  it("drops info below the warn level", () => {
    setLogLevel("warn");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    info("quiet");
    expect(logSpy).not.toHaveBeenCalled();
    expect(getLogLevel()).toBe("warn");
  });

  it("rejects unknown levels", () => {
    expect(() => setLogLevel("verbose")).toThrow("Unsupported log level: verbose");
  });
});
