import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { createLogger, createMemoryLogSink, type LogRecord, type Logger } from "../logging.js";
import type { SavedHandler, Scheduler, TickOutcome, WatchedDocument } from "../watcher/types.js";

export interface FakeTask {
  intervalSeconds: number;
  handler: () => TickOutcome;
  cancelled: boolean;
}

export class FakeScheduler implements Scheduler {
  readonly tasks: FakeTask[] = [];

  every(intervalSeconds: number, handler: () => TickOutcome): () => void {
    const task: FakeTask = { intervalSeconds, handler, cancelled: false };
    this.tasks.push(task);
    return () => {
      task.cancelled = true;
    };
  }

  fire(): TickOutcome[] {
    const outcomes: TickOutcome[] = [];
    for (const task of this.tasks) {
      if (task.cancelled) {
        continue;
      }
      const outcome = task.handler();
      if (outcome === "stop") {
        task.cancelled = true;
      }
      outcomes.push(outcome);
    }
    return outcomes;
  }

  activeCount(): number {
    return this.tasks.filter((task) => !task.cancelled).length;
  }
}

export class FakeDocument implements WatchedDocument {
  text = "";
  untitled = true;
  untouched = true;
  readonly handlers = new Set<SavedHandler>();

  constructor(public displayName: string) {}

  edit(text: string): void {
    this.text = text;
    this.untouched = false;
  }

  saveAs(): void {
    this.untitled = false;
    for (const handler of [...this.handlers]) {
      handler();
    }
  }

  getDisplayName(): string {
    return this.displayName;
  }

  isUntitled(): boolean {
    return this.untitled;
  }

  isUntouched(): boolean {
    return this.untouched;
  }

  getFullText(): string {
    return this.text;
  }

  onSaved(handler: SavedHandler): void {
    this.handlers.add(handler);
  }

  off(handler: SavedHandler): void {
    this.handlers.delete(handler);
  }
}

export function createTestLogger(): { logger: Logger; records: LogRecord[] } {
  const memory = createMemoryLogSink();
  return {
    logger: createLogger({ scope: "test", level: "debug", sink: memory.sink }),
    records: memory.records
  };
}

export function createTempDirs(prefix: string): { make: () => string; cleanup: () => void } {
  const dirs: string[] = [];
  return {
    make: () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
      dirs.push(dir);
      return dir;
    },
    cleanup: () => {
      for (const dir of dirs.splice(0)) {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    }
  };
}
