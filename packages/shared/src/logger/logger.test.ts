import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createLogger } from "./index.js";
import type { LogLevel } from "./index.js";

describe("Logger", () => {
  const originalEnv = process.env;
  let lines: Array<{ line: string; level: LogLevel }>;
  const sink = (line: string, level: LogLevel) => {
    lines.push({ line, level });
  };

  beforeEach(() => {
    lines = [];
    process.env = { ...originalEnv };
    delete process.env.LOG_FORMAT;
    delete process.env.LOG_LEVEL;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe("level filtering", () => {
    it("drops messages below the explicit level", () => {
      const logger = createLogger("test", "warn", undefined, sink);
      logger.info("hidden");
      logger.warn("shown");
      expect(lines).toHaveLength(1);
      expect(lines[0].level).toBe("warn");
      expect(lines[0].line).toContain("[WARN] [test] shown");
    });

    it("silent suppresses everything", () => {
      const logger = createLogger("test", "silent", undefined, sink);
      logger.error("nope");
      expect(lines).toEqual([]);
      expect(logger.isEnabled("error")).toBe(false);
    });

    it("falls back to LOG_LEVEL when no level is given", () => {
      process.env.LOG_LEVEL = "debug";
      const logger = createLogger("test", undefined, undefined, sink);
      expect(logger.isEnabled("debug")).toBe(true);
    });

    it("defaults to info", () => {
      const logger = createLogger("test", undefined, undefined, sink);
      expect(logger.isEnabled("debug")).toBe(false);
      expect(logger.isEnabled("info")).toBe(true);
    });
  });

  describe("output format", () => {
    it("appends data as JSON in text mode", () => {
      const logger = createLogger("test", "debug", undefined, sink);
      logger.debug("expanding", { file: "args.txt" });
      expect(lines[0].line).toMatch(/\[DEBUG\] \[test\] expanding \{"file":"args.txt"\}$/);
    });

    it("writes one JSON object per entry when LOG_FORMAT=json", () => {
      process.env.LOG_FORMAT = "json";
      const logger = createLogger("test", "info", undefined, sink);
      logger.setContext({ command: "app", traceId: "trace-1" });
      logger.info("parsed", { count: 3 });

      const parsed = JSON.parse(lines[0].line);
      expect(parsed.level).toBe("info");
      expect(parsed.module).toBe("test");
      expect(parsed.message).toBe("parsed");
      expect(parsed.command).toBe("app");
      expect(parsed.trace_id).toBe("trace-1");
      expect(parsed.count).toBe(3);
    });

    it("uses stderr when no sink is given", () => {
      const spy = vi.spyOn(console, "error").mockImplementation(() => {});
      const logger = createLogger("test", "info");
      logger.info("to stderr");
      expect(spy).toHaveBeenCalledTimes(1);
      expect(spy.mock.calls[0][0]).toContain("to stderr");
      spy.mockRestore();
    });
  });

  describe("child()", () => {
    it("inherits context, level and sink", () => {
      process.env.LOG_FORMAT = "json";
      const logger = createLogger("parent", "debug", undefined, sink);
      logger.setContext({ command: "git" });
      const child = logger.child("child");
      child.debug("child message");

      const parsed = JSON.parse(lines[0].line);
      expect(parsed.module).toBe("parent:child");
      expect(parsed.command).toBe("git");
    });
  });

  describe("time()", () => {
    it("returns a numeric duration and logs it at debug level", () => {
      process.env.LOG_FORMAT = "json";
      const logger = createLogger("test", "debug", undefined, sink);
      const stop = logger.time("parse");
      const duration = stop();

      expect(duration).toBeGreaterThanOrEqual(0);
      const parsed = JSON.parse(lines[0].line);
      expect(parsed.level).toBe("debug");
      expect(parsed.message).toBe("parse completed");
      expect(parsed.label).toBe("parse");
      expect(parsed.durationMs).toBe(duration);
    });
  });
});
