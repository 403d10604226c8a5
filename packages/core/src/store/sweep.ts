import fs from "node:fs";
import path from "node:path";
import { createLogger, type Logger } from "../logging.js";
import { DAY_MS, DEFAULT_MAX_AGE_DAYS } from "./constants.js";
import { parseSessionId, sessionDirectoryPath } from "./paths.js";
import type { SweepResult } from "./types.js";
import { isErrnoCode, toErrorText } from "./utils.js";

export interface SweepParams {
  storeRoot: string;
  currentSessionId?: string;
  maxAgeDays?: number;
  now?: Date;
  logger?: Logger;
}

function emptyResult(): SweepResult {
  return {
    deleted: [],
    retained: [],
    skipped: [],
    failed: []
  };
}

function listSessionEntries(storeRoot: string, logger: Logger): fs.Dirent[] | null {
  try {
    return fs.readdirSync(storeRoot, { withFileTypes: true });
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) {
      logger.debug("Store root does not exist; nothing to clean", { storeRoot });
    } else {
      logger.error("Unable to list store root", { storeRoot, error: toErrorText(error) });
    }
    return null;
  }
}

/**
 * Deletes the contents of a session directory and then the directory itself.
 * Returns the first error text when anything could not be removed; the
 * directory is left in place in that case.
 */
function removeSessionDirectory(directory: string, logger: Logger): string | null {
  let firstError: string | null = null;
  let entries: string[];
  try {
    entries = fs.readdirSync(directory);
  } catch (error) {
    return toErrorText(error);
  }

  for (const entry of entries) {
    const entryPath = path.join(directory, entry);
    logger.info("Removing stored snapshot", { path: entryPath });
    try {
      fs.rmSync(entryPath, { recursive: true });
    } catch (error) {
      const message = toErrorText(error);
      logger.error("Failed to remove stored snapshot", { path: entryPath, error: message });
      if (firstError === null) {
        firstError = message;
      }
    }
  }
  if (firstError) {
    return firstError;
  }

  logger.info("Removing session directory", { directory });
  try {
    fs.rmdirSync(directory);
  } catch (error) {
    const message = toErrorText(error);
    logger.error("Failed to remove session directory", { directory, error: message });
    return message;
  }
  return null;
}

export function sweepOldSessions(params: SweepParams): SweepResult {
  const logger = params.logger ?? createLogger({ scope: "safekeep:sweep" });
  const maxAgeDays = params.maxAgeDays ?? DEFAULT_MAX_AGE_DAYS;
  const nowMs = (params.now ?? new Date()).getTime();
  const maxAgeMs = maxAgeDays * DAY_MS;
  const result = emptyResult();

  logger.debug("Doing old-session cleanup", { storeRoot: params.storeRoot, maxAgeDays });
  const entries = listSessionEntries(params.storeRoot, logger);
  if (!entries) {
    return result;
  }

  const directories = entries
    .filter((entry) => {
      if (entry.isDirectory()) {
        return true;
      }
      logger.debug("Ignoring non-directory entry in store root", { name: entry.name });
      return false;
    })
    .map((entry) => entry.name)
    .sort();
  logger.debug(`(${directories.length}) session-backup directories found`);

  for (const sessionId of directories) {
    if (sessionId === params.currentSessionId) {
      result.retained.push(sessionId);
      continue;
    }

    const startedAt = parseSessionId(sessionId);
    if (!startedAt) {
      logger.warn("Skipping directory with unrecognized session name", { name: sessionId });
      result.skipped.push(sessionId);
      continue;
    }

    const ageMs = nowMs - startedAt.getTime();
    if (ageMs < maxAgeMs) {
      logger.debug(`[${sessionId}] is too recent: (${(ageMs / DAY_MS).toFixed(2)}) days`);
      result.retained.push(sessionId);
      continue;
    }

    logger.info("Cleaning up temporary storage for old session", { sessionId });
    const failure = removeSessionDirectory(sessionDirectoryPath(params.storeRoot, sessionId), logger);
    if (failure) {
      result.failed.push({ sessionId, error: failure });
      continue;
    }
    result.deleted.push(sessionId);
  }

  return result;
}
