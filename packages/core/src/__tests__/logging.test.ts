import { describe, expect, it } from "vitest";
import { createLogger, createMemoryLogSink, formatLogRecord, resolveLogLevel } from "../logging.js";

describe("logging", () => {
  it("drops records below the configured level", () => {
    const memory = createMemoryLogSink();
    const logger = createLogger({ scope: "safekeep", level: "info", sink: memory.sink });

    logger.debug("hidden");
    logger.info("shown", { path: "/tmp/a" });
    logger.error("failed");

    expect(memory.records.map((record) => [record.level, record.message])).toEqual([
      ["info", "shown"],
      ["error", "failed"]
    ]);
    expect(memory.records[0]?.payload).toEqual({ path: "/tmp/a" });
  });

  it("derives scoped child loggers", () => {
    const memory = createMemoryLogSink();
    const logger = createLogger({ scope: "safekeep", level: "debug", sink: memory.sink });

    logger.child("Untitled Document 1").debug("Starting watch");

    expect(memory.records[0]?.scope).toBe("safekeep:Untitled Document 1");
  });

  it("turns on debug output through DEBUG=true", () => {
    expect(resolveLogLevel({ env: { DEBUG: "TRUE" } })).toBe("debug");
    expect(resolveLogLevel({ env: { DEBUG: "1" } })).toBe("info");
    expect(resolveLogLevel({ env: {} })).toBe("info");
    expect(resolveLogLevel({ debug: true, env: {} })).toBe("debug");
  });

  it("formats one line per record", () => {
    expect(
      formatLogRecord({
        timestamp: "2026-02-15T12:00:00.000Z",
        level: "warn",
        scope: "safekeep:sweep",
        message: "Skipping directory",
        payload: { name: "x" }
      })
    ).toBe('2026-02-15T12:00:00.000Z WARN [safekeep:sweep] Skipping directory {"name":"x"}');
  });
});
