/**
 * Tests for logger module.
 */

import { stripVTControlCharacters } from "node:util";
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import {
  configureLogger,
  debug,
  error as logError,
  getLoggerState,
  info,
  resetLogger,
  startTimer,
  warn,
} from "../src/core/logger.js";

let consoleError: MockInstance<typeof console.error>;

function captured(): string[] {
  return consoleError.mock.calls.map((args) => stripVTControlCharacters(args.join(" ")));
}

describe("Logger", () => {
  beforeEach(() => {
    resetLogger();
    consoleError = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleError.mockRestore();
  });

  describe("configureLogger", () => {
    it("should set quiet flag", () => {
      configureLogger({ quiet: true });
      expect(getLoggerState()).toEqual({ quiet: true, debug: false });
    });

    it("should set debug flag", () => {
      configureLogger({ debug: true });
      expect(getLoggerState()).toEqual({ quiet: false, debug: true });
    });

    it("should prioritize quiet over debug", () => {
      configureLogger({ quiet: true, debug: true });
      expect(getLoggerState()).toEqual({ quiet: true, debug: false });
    });
  });

  describe("warn", () => {
    it("should output warning by default", () => {
      warn("test warning");
      expect(captured()).toEqual(["Warning: test warning"]);
    });

    it("should suppress warning with --quiet", () => {
      configureLogger({ quiet: true });
      warn("test warning");
      expect(captured()).toEqual([]);
    });
  });

  describe("info", () => {
    it("should output info by default", () => {
      info("test info");
      expect(captured()).toEqual(["test info"]);
    });

    it("should suppress info with --quiet", () => {
      configureLogger({ quiet: true });
      info("test info");
      expect(captured()).toEqual([]);
    });
  });

  describe("debug", () => {
    it("should not output debug by default", () => {
      debug("test debug");
      expect(captured()).toEqual([]);
    });

    it("should output debug with --verbose", () => {
      configureLogger({ debug: true });
      debug("test debug");
      expect(captured()).toEqual(["[debug] test debug"]);
    });

    it("should suppress debug with --quiet even if --verbose is set", () => {
      configureLogger({ quiet: true, debug: true });
      debug("test debug");
      expect(captured()).toEqual([]);
    });
  });

  describe("error", () => {
    it("should output error even with --quiet", () => {
      configureLogger({ quiet: true });
      logError("test error");
      expect(captured()).toEqual(["test error"]);
    });
  });

  describe("startTimer", () => {
    it("should log the elapsed time at debug level", () => {
      configureLogger({ debug: true });
      const stop = startTimer("Scanned");
      const elapsed = stop();

      expect(elapsed).toBeGreaterThanOrEqual(0);
      expect(captured()).toEqual([`[debug] Scanned in ${elapsed}ms`]);
    });
  });

  describe("resetLogger", () => {
    it("should reset to default state", () => {
      configureLogger({ quiet: true, debug: true });
      resetLogger();
      expect(getLoggerState()).toEqual({ quiet: false, debug: false });
    });
  });
});
