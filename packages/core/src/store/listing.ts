import fs from "node:fs";
import path from "node:path";
import { DAY_MS } from "./constants.js";
import { parseSessionId, sessionDirectoryPath, snapshotFileName } from "./paths.js";
import { type StoredSession, type StoredSnapshotFile, SnapshotStoreError } from "./types.js";
import { isErrnoCode, toErrorText } from "./utils.js";

function listSnapshotFiles(directory: string): StoredSnapshotFile[] {
  const files: StoredSnapshotFile[] = [];
  for (const entry of fs.readdirSync(directory, { withFileTypes: true })) {
    // Dot-prefixed names are in-flight atomic writes.
    if (!entry.isFile() || entry.name.startsWith(".")) {
      continue;
    }
    const stat = fs.statSync(path.join(directory, entry.name));
    files.push({
      name: entry.name,
      bytes: stat.size,
      modifiedAt: stat.mtime.toISOString()
    });
  }
  return files.sort((left, right) => left.name.localeCompare(right.name));
}

export function listStoredSessions(storeRoot: string, now: Date = new Date()): StoredSession[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(storeRoot, { withFileTypes: true });
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) {
      return [];
    }
    throw new SnapshotStoreError("io_error", `Unable to read store root ${storeRoot}: ${toErrorText(error)}`);
  }

  const sessions: StoredSession[] = [];
  for (const entry of entries) {
    if (!entry.isDirectory()) {
      continue;
    }
    const startedAt = parseSessionId(entry.name);
    if (!startedAt) {
      continue;
    }
    const directory = sessionDirectoryPath(storeRoot, entry.name);
    sessions.push({
      sessionId: entry.name,
      startedAt: startedAt.toISOString(),
      ageDays: (now.getTime() - startedAt.getTime()) / DAY_MS,
      directory,
      files: listSnapshotFiles(directory)
    });
  }
  return sessions.sort((left, right) => right.sessionId.localeCompare(left.sessionId));
}

export function readStoredSnapshot(storeRoot: string, sessionId: string, fileName: string): string {
  if (!parseSessionId(sessionId)) {
    throw new SnapshotStoreError("invalid_session", `Not a session id: ${sessionId}`);
  }
  const filePath = path.join(sessionDirectoryPath(storeRoot, sessionId), snapshotFileName(fileName));
  try {
    return fs.readFileSync(filePath, "utf8");
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) {
      throw new SnapshotStoreError("not_found", `No snapshot ${fileName} in session ${sessionId}`);
    }
    throw new SnapshotStoreError("io_error", `Unable to read ${filePath}: ${toErrorText(error)}`);
  }
}
