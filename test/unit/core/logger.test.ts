/**
 * Unit tests for the scoped logger
 */

import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { createLogger, getLogLevel } from "../../../src/core/logger";

describe("getLogLevel", () => {
  beforeEach(() => {
    vi.stubEnv("DEBUG", "");
    vi.stubEnv("SEARCHRELAY_LOG_LEVEL", "");
  });

  test("defaults to info", () => {
    expect(getLogLevel()).toBe("info");
  });

  test("reads SEARCHRELAY_LOG_LEVEL case-insensitively", () => {
    vi.stubEnv("SEARCHRELAY_LOG_LEVEL", "WARN");
    expect(getLogLevel()).toBe("warn");
  });

  test("ignores unknown levels", () => {
    vi.stubEnv("SEARCHRELAY_LOG_LEVEL", "constructor");
    expect(getLogLevel()).toBe("info");
  });

  test("DEBUG=1 forces debug", () => {
    vi.stubEnv("SEARCHRELAY_LOG_LEVEL", "error");
    vi.stubEnv("DEBUG", "1");
    expect(getLogLevel()).toBe("debug");
  });
});

describe("createLogger", () => {
  const errorSpy = vi.fn();
  const warnSpy = vi.fn();

  beforeEach(() => {
    vi.stubEnv("DEBUG", "");
    console.error = errorSpy;
    console.warn = warnSpy;
  });

  afterEach(() => {
    errorSpy.mockReset();
    warnSpy.mockReset();
  });

  test("prefixes messages with the scope", () => {
    vi.stubEnv("SEARCHRELAY_LOG_LEVEL", "info");
    const log = createLogger("Test");

    log.info("hello", { n: 1 });
    log.warn("careful");

    expect(errorSpy).toHaveBeenCalledWith("[Test]", "hello", { n: 1 });
    expect(warnSpy).toHaveBeenCalledWith("[Test]", "careful");
  });

  test("drops messages below the threshold", () => {
    vi.stubEnv("SEARCHRELAY_LOG_LEVEL", "warn");
    const log = createLogger("Test");

    log.debug("hidden");
    log.info("hidden");
    log.error("shown");

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith("[Test]", "shown");
  });

  test("silent suppresses everything", () => {
    vi.stubEnv("SEARCHRELAY_LOG_LEVEL", "silent");
    const log = createLogger("Test");

    log.error("nothing");
    log.warn("nothing");

    expect(errorSpy).not.toHaveBeenCalled();
    expect(warnSpy).not.toHaveBeenCalled();
  });
});
