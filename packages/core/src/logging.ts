export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogRecord {
  timestamp: string;
  level: LogLevel;
  scope: string;
  message: string;
  payload?: Record<string, unknown>;
}

export type LogSink = (record: LogRecord) => void;

export interface Logger {
  readonly scope: string;
  debug(message: string, payload?: Record<string, unknown>): void;
  info(message: string, payload?: Record<string, unknown>): void;
  warn(message: string, payload?: Record<string, unknown>): void;
  error(message: string, payload?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  scope?: string;
  level?: LogLevel;
  sink?: LogSink;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return (env.DEBUG ?? "").trim().toLowerCase() === "true";
}

export function resolveLogLevel(params?: { debug?: boolean; env?: NodeJS.ProcessEnv }): LogLevel {
  if (params?.debug === true || isDebugEnabled(params?.env)) {
    return "debug";
  }
  return "info";
}

export function formatLogRecord(record: LogRecord): string {
  const payload = record.payload && Object.keys(record.payload).length > 0 ? ` ${JSON.stringify(record.payload)}` : "";
  return `${record.timestamp} ${record.level.toUpperCase()} [${record.scope}] ${record.message}${payload}`;
}

export const stderrSink: LogSink = (record) => {
  process.stderr.write(`${formatLogRecord(record)}\n`);
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const scope = options.scope ?? "safekeep";
  const level = options.level ?? resolveLogLevel();
  const sink = options.sink ?? stderrSink;
  const threshold = LEVEL_RANK[level];

  const emit = (recordLevel: LogLevel, message: string, payload?: Record<string, unknown>): void => {
    if (LEVEL_RANK[recordLevel] < threshold) {
      return;
    }
    const record: LogRecord = {
      timestamp: new Date().toISOString(),
      level: recordLevel,
      scope,
      message
    };
    if (payload) {
      record.payload = payload;
    }
    sink(record);
  };

  return {
    scope,
    debug: (message, payload) => emit("debug", message, payload),
    info: (message, payload) => emit("info", message, payload),
    warn: (message, payload) => emit("warn", message, payload),
    error: (message, payload) => emit("error", message, payload),
    child: (childScope) => createLogger({ scope: `${scope}:${childScope}`, level, sink })
  };
}

export function createMemoryLogSink(): { sink: LogSink; records: LogRecord[] } {
  const records: LogRecord[] = [];
  return {
    sink: (record) => {
      records.push(record);
    },
    records
  };
}
