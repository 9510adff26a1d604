/**
 * Unit tests for the structured logger.
 */

import { describe, it, expect } from "vitest";
import { createLogger, errorMessage, type LogLevel } from "../../src/lib/logger";

function capture() {
  const lines: Array<{ level: LogLevel; line: string }> = [];
  return { lines, sink: (level: LogLevel, line: string) => lines.push({ level, line }) };
}

describe("createLogger", () => {
  it("writes JSON entries with the service name", () => {
    const { lines, sink } = capture();
    const logger = createLogger({ json: true, minLevel: "debug", service: "test-service", sink });

    logger.info("Archive completed", { archiveId: "a1" });

    expect(lines).toHaveLength(1);
    expect(lines[0].level).toBe("info");
    const entry: unknown = JSON.parse(lines[0].line);
    expect(entry).toMatchObject({
      archiveId: "a1",
      level: "info",
      message: "Archive completed",
      service: "test-service",
    });
  });

  it("drops entries below the minimum level", () => {
    const { lines, sink } = capture();
    const logger = createLogger({ json: true, minLevel: "warn", sink });

    logger.debug("debug");
    logger.info("info");
    logger.warn("warn");
    logger.error("error");

    expect(lines.map((l) => l.level)).toEqual(["warn", "error"]);
  });

  it("merges child context into every entry", () => {
    const { lines, sink } = capture();
    const logger = createLogger({ json: true, minLevel: "debug", sink });

    const child = logger.child({ jobId: "j1" }).child({ archiveId: "a1" });
    child.warn("Fetch failed", { reason: "http_error" });

    expect(JSON.parse(lines[0].line)).toMatchObject({
      jobId: "j1",
      archiveId: "a1",
      reason: "http_error",
    });
  });

  it("writes readable lines in development format", () => {
    const { lines, sink } = capture();
    const logger = createLogger({ json: false, minLevel: "debug", sink });

    logger.error("Claim failed", { attempt: 2 });

    expect(lines[0].line).toBe('\x1b[31m[ERROR]\x1b[0m Claim failed {"attempt":2}');
  });
});

describe("errorMessage", () => {
  it("formats errors and other thrown values", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
  });
});
