export type SnapshotStoreErrorCode = "io_error" | "not_found" | "invalid_session";

export class SnapshotStoreError extends Error {
  constructor(
    public readonly code: SnapshotStoreErrorCode,
    message: string
  ) {
    super(message);
    this.name = "SnapshotStoreError";
  }
}

export interface SweepFailure {
  sessionId: string;
  error: string;
}

export interface SweepResult {
  deleted: string[];
  retained: string[];
  skipped: string[];
  failed: SweepFailure[];
}

export interface StoredSnapshotFile {
  name: string;
  bytes: number;
  modifiedAt: string;
}

export interface StoredSession {
  sessionId: string;
  startedAt: string;
  ageDays: number;
  directory: string;
  files: StoredSnapshotFile[];
}
