import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { DAY_MS } from "../store/constants.js";
import { createSessionId } from "../store/paths.js";
import { sweepOldSessions } from "../store/sweep.js";
import { createTempDirs, createTestLogger } from "./fakes.js";

const temp = createTempDirs("safekeep-sweep-");

afterEach(() => {
  temp.cleanup();
});

const NOW = new Date(2026, 1, 15, 12, 0, 0);

function sessionDaysAgo(storeRoot: string, days: number, files: Record<string, string> = {}): string {
  const sessionId = createSessionId(new Date(NOW.getTime() - days * DAY_MS));
  const directory = path.join(storeRoot, sessionId);
  fs.mkdirSync(directory, { recursive: true });
  for (const [name, content] of Object.entries(files)) {
    fs.writeFileSync(path.join(directory, name), content, "utf8");
  }
  return sessionId;
}

describe("sweepOldSessions", () => {
  it("removes only sessions older than the retention threshold", () => {
    const storeRoot = temp.make();
    const old = sessionDaysAgo(storeRoot, 50, { "Untitled Document 1": "old text", "Untitled Document 2": "more" });
    const recent = sessionDaysAgo(storeRoot, 20, { "Untitled Document 1": "recent text" });
    const yesterday = sessionDaysAgo(storeRoot, 1, { "Untitled Document 3": "yesterday" });
    const { logger } = createTestLogger();

    const result = sweepOldSessions({ storeRoot, maxAgeDays: 28, now: NOW, logger });

    expect(result.deleted).toEqual([old]);
    expect(result.retained).toEqual([recent, yesterday]);
    expect(result.failed).toEqual([]);
    expect(fs.readdirSync(storeRoot).sort()).toEqual([recent, yesterday]);
    expect(fs.readFileSync(path.join(storeRoot, recent, "Untitled Document 1"), "utf8")).toBe("recent text");
    expect(fs.readFileSync(path.join(storeRoot, yesterday, "Untitled Document 3"), "utf8")).toBe("yesterday");
  });

  it("defaults the threshold to 28 days", () => {
    const storeRoot = temp.make();
    const old = sessionDaysAgo(storeRoot, 29);
    const kept = sessionDaysAgo(storeRoot, 27);
    const { logger } = createTestLogger();

    const result = sweepOldSessions({ storeRoot, now: NOW, logger });

    expect(result.deleted).toEqual([old]);
    expect(result.retained).toEqual([kept]);
  });

  it("completes without error when the store root does not exist", () => {
    const parent = temp.make();
    const storeRoot = path.join(parent, "missing");
    const { logger, records } = createTestLogger();

    const result = sweepOldSessions({ storeRoot, now: NOW, logger });

    expect(result).toEqual({ deleted: [], retained: [], skipped: [], failed: [] });
    expect(fs.existsSync(storeRoot)).toBe(false);
    expect(records.some((record) => record.level === "error")).toBe(false);
  });

  it("skips foreign entries and keeps going", () => {
    const storeRoot = temp.make();
    fs.mkdirSync(path.join(storeRoot, "not-a-session"));
    fs.writeFileSync(path.join(storeRoot, "README"), "hello", "utf8");
    const old = sessionDaysAgo(storeRoot, 40, { "Untitled Document 1": "x" });
    const { logger, records } = createTestLogger();

    const result = sweepOldSessions({ storeRoot, now: NOW, logger });

    expect(result.skipped).toEqual(["not-a-session"]);
    expect(result.deleted).toEqual([old]);
    expect(fs.readdirSync(storeRoot).sort()).toEqual(["README", "not-a-session"]);
    const warning = records.find((record) => record.level === "warn");
    expect(warning?.message).toBe("Skipping directory with unrecognized session name");
    expect(warning?.payload).toEqual({ name: "not-a-session" });
  });

  it("never touches the current session", () => {
    const storeRoot = temp.make();
    const current = sessionDaysAgo(storeRoot, 60, { "Untitled Document 1": "live" });
    const { logger } = createTestLogger();

    const result = sweepOldSessions({ storeRoot, currentSessionId: current, now: NOW, logger });

    expect(result.deleted).toEqual([]);
    expect(result.retained).toEqual([current]);
    expect(fs.readFileSync(path.join(storeRoot, current, "Untitled Document 1"), "utf8")).toBe("live");
  });

  it("removes nested leftovers inside an expired session", () => {
    const storeRoot = temp.make();
    const old = sessionDaysAgo(storeRoot, 35, { ".Untitled Document 1.tmp-1-2-abc": "partial" });
    fs.mkdirSync(path.join(storeRoot, old, "stray"));
    const { logger } = createTestLogger();

    const result = sweepOldSessions({ storeRoot, now: NOW, logger });

    expect(result.deleted).toEqual([old]);
    expect(fs.existsSync(path.join(storeRoot, old))).toBe(false);
  });

  it("keeps a session it cannot fully delete and carries on with the rest", () => {
    const storeRoot = temp.make();
    const blocked = sessionDaysAgo(storeRoot, 50, { "Untitled Document 1": "locked" });
    const removable = sessionDaysAgo(storeRoot, 40, { "Untitled Document 2": "gone" });
    const blockedDirectory = path.join(storeRoot, blocked);
    const realRmSync = fs.rmSync;
    vi.spyOn(fs, "rmSync").mockImplementation((target, options) => {
      if (String(target).startsWith(blockedDirectory)) {
        throw new Error("EACCES: permission denied");
      }
      realRmSync(target, options);
    });
    const { logger, records } = createTestLogger();

    const result = sweepOldSessions({ storeRoot, now: NOW, logger });

    expect(result.failed).toEqual([{ sessionId: blocked, error: "EACCES: permission denied" }]);
    expect(result.deleted).toEqual([removable]);
    expect(fs.readFileSync(path.join(blockedDirectory, "Untitled Document 1"), "utf8")).toBe("locked");
    expect(fs.existsSync(path.join(storeRoot, removable))).toBe(false);
    expect(records.filter((record) => record.level === "error").map((record) => record.payload)).toEqual([
      { path: path.join(blockedDirectory, "Untitled Document 1"), error: "EACCES: permission denied" }
    ]);
  });
});
