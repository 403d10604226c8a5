import { type ResolvedSafekeepConfig, type SafekeepConfig, resolveSafekeepConfig } from "./config.js";
import { createLogger, type LogSink, type Logger, resolveLogLevel } from "./logging.js";
import { readWatchSettings, type SettingsProvider } from "./settings.js";
import { createSessionId } from "./store/paths.js";
import { sweepOldSessions } from "./store/sweep.js";
import type { SweepResult } from "./store/types.js";
import { toErrorText } from "./store/utils.js";
import { createTimerScheduler } from "./watcher/scheduler.js";
import type { Scheduler, WatchSettings, WatchedDocument, WatcherStatus } from "./watcher/types.js";
import { DocumentWatcher } from "./watcher/watcher.js";

export interface SafekeepRuntimeParams {
  config?: SafekeepConfig;
  settings: SettingsProvider;
  scheduler?: Scheduler;
  logSink?: LogSink;
  now?: () => Date;
}

/**
 * Process-wide wiring between the host editor's activation hooks and the
 * session store. The session id and the auto-save settings are fixed at
 * construction and shared by every watcher.
 */
export class SafekeepRuntime {
  readonly config: ResolvedSafekeepConfig;
  readonly sessionId: string;
  readonly settings: WatchSettings;

  private readonly scheduler: Scheduler;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly watchers = new Map<WatchedDocument, DocumentWatcher>();

  constructor(params: SafekeepRuntimeParams) {
    this.config = resolveSafekeepConfig(params.config);
    this.now = params.now ?? (() => new Date());
    this.logger = createLogger({
      scope: "safekeep",
      level: resolveLogLevel({ debug: this.config.debug }),
      sink: params.logSink
    });
    this.scheduler = params.scheduler ?? createTimerScheduler();
    this.sessionId = createSessionId(this.now());
    this.settings = readWatchSettings(params.settings, this.logger, this.config.settingsKeys);
  }

  onAppStart(): SweepResult {
    try {
      return sweepOldSessions({
        storeRoot: this.config.storeRoot,
        currentSessionId: this.sessionId,
        maxAgeDays: this.config.maxAgeDays,
        now: this.now(),
        logger: this.logger.child("sweep")
      });
    } catch (error) {
      this.logger.error("Old-session cleanup failed", { error: toErrorText(error) });
      return {
        deleted: [],
        retained: [],
        skipped: [],
        failed: []
      };
    }
  }

  onDocumentOpen(document: WatchedDocument): DocumentWatcher {
    const existing = this.watchers.get(document);
    if (existing) {
      return existing;
    }
    const watcher = new DocumentWatcher({
      document,
      settings: this.settings,
      storeRoot: this.config.storeRoot,
      sessionId: this.sessionId,
      scheduler: this.scheduler,
      logger: this.logger
    });
    this.watchers.set(document, watcher);
    try {
      watcher.start();
    } catch (error) {
      this.logger.error("Unable to start watching document", {
        document: watcher.displayName,
        error: toErrorText(error)
      });
    }
    return watcher;
  }

  onDocumentClose(document: WatchedDocument): void {
    const watcher = this.watchers.get(document);
    if (!watcher) {
      return;
    }
    this.watchers.delete(document);
    this.stopWatcher(watcher);
  }

  shutdown(): void {
    for (const watcher of this.watchers.values()) {
      this.stopWatcher(watcher);
    }
    this.watchers.clear();
  }

  listWatchers(): WatcherStatus[] {
    return [...this.watchers.values()].map((watcher) => watcher.getStatus());
  }

  private stopWatcher(watcher: DocumentWatcher): void {
    try {
      watcher.stop();
    } catch (error) {
      this.logger.error("Unable to stop watching document", {
        document: watcher.displayName,
        error: toErrorText(error)
      });
    }
  }
}

export function createSafekeep(params: SafekeepRuntimeParams): SafekeepRuntime {
  return new SafekeepRuntime(params);
}
