export type SavedHandler = () => void;

/**
 * The host document a watcher observes. `onSaved` handlers fire only for
 * saves under a real name.
 */
export interface WatchedDocument {
  getDisplayName(): string;
  isUntitled(): boolean;
  isUntouched(): boolean;
  getFullText(): string;
  onSaved(handler: SavedHandler): void;
  off(handler: SavedHandler): void;
}

export type TickOutcome = "continue" | "stop";

export type CancelToken = () => void;

export interface Scheduler {
  every(intervalSeconds: number, handler: () => TickOutcome): CancelToken;
}

export interface WatchSettings {
  enabled: boolean;
  intervalMinutes: number;
}

export type WatcherState = "inactive" | "watching";

export type WatcherEvent = "start" | "tick" | "saved" | "stop";

export type WatcherTransition =
  | {
      ok: true;
      state: WatcherState;
    }
  | {
      ok: false;
      reason: string;
    };

export interface WatcherStatus {
  state: WatcherState;
  displayName: string;
  snapshotPath: string | null;
  hasSnapshot: boolean;
  ticks: number;
  writes: number;
}
