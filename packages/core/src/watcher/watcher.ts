import fs from "node:fs";
import { createLogger, type Logger } from "../logging.js";
import { sessionDirectoryPath, snapshotFilePath } from "../store/paths.js";
import { ensureDirectory, isDirectoryEmpty, isErrnoCode, toErrorText, writeTextAtomic } from "../store/utils.js";
import { transitionWatcherState } from "./state.js";
import type {
  CancelToken,
  SavedHandler,
  Scheduler,
  TickOutcome,
  WatchSettings,
  WatchedDocument,
  WatcherEvent,
  WatcherState,
  WatcherStatus
} from "./types.js";

export interface DocumentWatcherParams {
  document: WatchedDocument;
  settings: WatchSettings;
  storeRoot: string;
  sessionId: string;
  scheduler: Scheduler;
  logger?: Logger;
}

/**
 * Keeps a snapshot of one unnamed document inside the current session
 * directory until the document is saved under a real name.
 *
 * The watcher only ever writes `<storeRoot>/<sessionId>/<displayName>`. A stop
 * without a save leaves that file in place so the text survives a crash or an
 * abrupt close.
 */
export class DocumentWatcher {
  readonly document: WatchedDocument;
  readonly displayName: string;
  readonly sessionDirectory: string;
  readonly snapshotPath: string;

  private readonly settings: WatchSettings;
  private readonly scheduler: Scheduler;
  private readonly logger: Logger;
  private readonly savedHandler: SavedHandler = () => this.handleSaved();
  private state: WatcherState = "inactive";
  private cancelTick: CancelToken | null = null;
  private snapshotPresent = false;
  private tickCount = 0;
  private writeCount = 0;

  constructor(params: DocumentWatcherParams) {
    this.document = params.document;
    this.settings = params.settings;
    this.scheduler = params.scheduler;
    this.displayName = params.document.getDisplayName();
    this.sessionDirectory = sessionDirectoryPath(params.storeRoot, params.sessionId);
    this.snapshotPath = snapshotFilePath(params.storeRoot, params.sessionId, this.displayName);
    this.logger = (params.logger ?? createLogger({ scope: "safekeep" })).child(this.displayName);
  }

  getState(): WatcherState {
    return this.state;
  }

  getStatus(): WatcherStatus {
    return {
      state: this.state,
      displayName: this.displayName,
      snapshotPath: this.snapshotPath,
      hasSnapshot: this.snapshotPresent,
      ticks: this.tickCount,
      writes: this.writeCount
    };
  }

  start(): boolean {
    if (!this.settings.enabled) {
      this.logger.warn("Watcher will not do anything because the standard 'auto-save' setting is not enabled");
      return false;
    }
    if (!this.document.isUntitled()) {
      this.logger.debug("Document is already assigned a name. Skipping.");
      return false;
    }
    if (!this.apply("start")) {
      return false;
    }

    this.logger.debug("Starting watch");
    const intervalSeconds = this.settings.intervalMinutes * 60;
    this.logger.debug(`Scheduling save for (${intervalSeconds}) second intervals`);
    try {
      this.cancelTick = this.scheduler.every(intervalSeconds, () => this.tick());
    } catch (error) {
      this.logger.error("Unable to schedule snapshots", { intervalSeconds, error: toErrorText(error) });
      this.apply("stop");
      return false;
    }
    this.document.onSaved(this.savedHandler);
    return true;
  }

  stop(): void {
    if (this.state !== "watching") {
      return;
    }
    this.logger.debug("Stopping watch");
    this.teardown("stop");
  }

  tick(): TickOutcome {
    if (!this.apply("tick")) {
      return "stop";
    }
    this.tickCount += 1;
    this.logger.debug("Checking state of unsaved document");

    if (this.document.isUntouched()) {
      this.logger.debug("Unsaved document has not been touched and will not be stored/updated on disk");
      return "continue";
    }

    try {
      if (!fs.existsSync(this.sessionDirectory)) {
        this.logger.info("Creating temporary unsaved store path", { path: this.sessionDirectory });
        ensureDirectory(this.sessionDirectory);
      }
      const text = this.document.getFullText();
      this.logger.info(`Storing unnamed file as (${Buffer.byteLength(text, "utf8")}) bytes`, {
        path: this.snapshotPath
      });
      writeTextAtomic(this.snapshotPath, text);
      this.snapshotPresent = true;
      this.writeCount += 1;
    } catch (error) {
      this.logger.error("Failed to store unsaved document", {
        path: this.snapshotPath,
        error: toErrorText(error)
      });
    }
    return "continue";
  }

  private handleSaved(): void {
    if (this.state !== "watching") {
      return;
    }
    this.teardown("saved");
    this.removeSnapshot();
  }

  private apply(event: WatcherEvent): boolean {
    const transition = transitionWatcherState(this.state, event);
    if (!transition.ok) {
      this.logger.warn("Rejected watcher transition", { event, reason: transition.reason });
      return false;
    }
    this.state = transition.state;
    return true;
  }

  private teardown(event: "saved" | "stop"): void {
    this.apply(event);
    this.logger.debug("Cancelling save schedule");
    if (this.cancelTick) {
      this.cancelTick();
      this.cancelTick = null;
    }
    this.logger.debug("Removing 'saved' handler");
    this.document.off(this.savedHandler);
  }

  private removeSnapshot(): void {
    this.logger.info("Cleaning up temporary file", { path: this.snapshotPath });
    try {
      fs.rmSync(this.snapshotPath);
    } catch (error) {
      if (!isErrnoCode(error, "ENOENT")) {
        this.logger.error("Failed to remove temporary file", {
          path: this.snapshotPath,
          error: toErrorText(error)
        });
        return;
      }
    }
    this.snapshotPresent = false;

    try {
      if (!isDirectoryEmpty(this.sessionDirectory)) {
        this.logger.debug("Other temporary files still exist for this session");
        return;
      }
      this.logger.info("No more temporary files exist for this session. Removing storage path", {
        path: this.sessionDirectory
      });
      fs.rmdirSync(this.sessionDirectory);
    } catch (error) {
      if (isErrnoCode(error, "ENOENT")) {
        return;
      }
      this.logger.error("Failed to remove session directory", {
        path: this.sessionDirectory,
        error: toErrorText(error)
      });
    }
  }
}
