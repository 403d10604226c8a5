import os from "node:os";
import path from "node:path";
import { DEFAULT_STORE_DIRECTORY_NAME, SESSION_ID_PATTERN } from "./constants.js";

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Formats a local-time session id (`YYYYMMDD-HHMMSS`). Ids sort in
 * chronological order and double as the age key for the cleanup sweep.
 */
export function createSessionId(now: Date = new Date()): string {
  return (
    `${pad(now.getFullYear(), 4)}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `-${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  );
}

/**
 * Parses a session id back into its local start time. Returns null for names
 * that do not match the format or do not describe a real calendar time.
 */
export function parseSessionId(name: string): Date | null {
  const match = SESSION_ID_PATTERN.exec(name);
  if (!match) {
    return null;
  }
  const [year, month, day, hours, minutes, seconds] = match.slice(1).map((part) => Number.parseInt(part, 10));
  const parsed = new Date(year, month - 1, day, hours, minutes, seconds);
  if (Number.isNaN(parsed.getTime()) || createSessionId(parsed) !== name) {
    return null;
  }
  return parsed;
}

export function defaultStoreRoot(): string {
  return path.join(os.homedir(), DEFAULT_STORE_DIRECTORY_NAME);
}

export function expandHome(filePath: string): string {
  if (filePath === "~") {
    return os.homedir();
  }
  if (filePath.startsWith("~/")) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  return filePath;
}

// Display names are kept verbatim apart from anything that could leave the
// session directory.
export function snapshotFileName(displayName: string): string {
  const replaced = displayName.replace(/[/\\\0]/g, "_");
  if (replaced === "" || replaced === "." || replaced === "..") {
    return "_";
  }
  return replaced;
}

export function sessionDirectoryPath(storeRoot: string, sessionId: string): string {
  return path.join(storeRoot, sessionId);
}

export function snapshotFilePath(storeRoot: string, sessionId: string, displayName: string): string {
  return path.join(sessionDirectoryPath(storeRoot, sessionId), snapshotFileName(displayName));
}
