import fs from "node:fs";
import path from "node:path";
import {
  createLogger,
  createSessionId,
  listStoredSessions,
  readStoredSnapshot,
  resolveLogLevel,
  resolveSafekeepConfig,
  type LogSink,
  type ResolvedSafekeepConfig,
  SnapshotStoreError,
  stderrSink,
  sweepOldSessions
} from "@safekeep/core";
import { CliConfigError, loadCliConfig } from "./config.js";

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  logSink?: LogSink;
}

export interface RunCliParams {
  projectRoot?: string;
  env?: NodeJS.ProcessEnv;
  io?: CliIo;
  now?: () => Date;
}

const processIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  }
};

function printHelp(io: CliIo): void {
  io.stdout(
    [
      "safekeep commands:",
      "  safekeep list",
      "  safekeep show <sessionId> <file>",
      "  safekeep restore <sessionId> <file> <destination> [--force]",
      "  safekeep sweep [--max-age-days <days>]"
    ].join("\n") + "\n"
  );
}

function parseMaxAgeDays(args: string[], io: CliIo): { maxAgeDays?: number; ok: boolean } {
  let maxAgeDays: number | undefined;
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (!token) {
      continue;
    }
    let candidate: string | undefined;
    if (token === "--max-age-days") {
      candidate = args[i + 1];
      i += 1;
    } else if (token.startsWith("--max-age-days=")) {
      candidate = token.slice("--max-age-days=".length);
    } else {
      io.stderr(`Unknown sweep option: ${token}\n`);
      return { ok: false };
    }

    const parsed = candidate && /^\d+$/.test(candidate) ? Number.parseInt(candidate, 10) : Number.NaN;
    if (!Number.isFinite(parsed) || parsed <= 0) {
      io.stderr(`Invalid --max-age-days value: ${candidate ?? ""}. Expected a positive whole number.\n`);
      return { ok: false };
    }
    maxAgeDays = parsed;
  }
  return { maxAgeDays, ok: true };
}

export function runListCommand(config: ResolvedSafekeepConfig, io: CliIo, now: Date): number {
  const sessions = listStoredSessions(config.storeRoot, now);
  if (sessions.length === 0) {
    io.stdout(`No stored sessions in ${config.storeRoot}.\n`);
    return 0;
  }
  for (const session of sessions) {
    io.stdout(`${session.sessionId}  files=${session.files.length}  age=${session.ageDays.toFixed(1)}d\n`);
    for (const file of session.files) {
      io.stdout(`  - ${file.name}  bytes=${file.bytes}  modified=${file.modifiedAt}\n`);
    }
  }
  return 0;
}

export function runShowCommand(args: string[], config: ResolvedSafekeepConfig, io: CliIo): number {
  const [sessionId, fileName] = args;
  if (!sessionId || !fileName) {
    io.stderr("Usage: safekeep show <sessionId> <file>\n");
    return 1;
  }
  io.stdout(readStoredSnapshot(config.storeRoot, sessionId, fileName));
  return 0;
}

export function runRestoreCommand(
  args: string[],
  config: ResolvedSafekeepConfig,
  io: CliIo,
  projectRoot: string
): number {
  const force = args.includes("--force");
  const [sessionId, fileName, destination] = args.filter((arg) => arg !== "--force");
  if (!sessionId || !fileName || !destination) {
    io.stderr("Usage: safekeep restore <sessionId> <file> <destination> [--force]\n");
    return 1;
  }

  const text = readStoredSnapshot(config.storeRoot, sessionId, fileName);
  const target = path.resolve(projectRoot, destination);
  if (fs.existsSync(target) && !force) {
    io.stderr(`Refusing to overwrite existing file: ${target} (use --force)\n`);
    return 1;
  }
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, text, "utf8");
  io.stdout(`Restored ${sessionId}/${fileName} to ${target}\n`);
  return 0;
}

export function runSweepCommand(args: string[], config: ResolvedSafekeepConfig, io: CliIo, now: Date): number {
  const parsed = parseMaxAgeDays(args, io);
  if (!parsed.ok) {
    return 1;
  }
  const logger = createLogger({
    scope: "safekeep:sweep",
    level: resolveLogLevel({ debug: config.debug }),
    sink: io.logSink ?? stderrSink
  });
  const result = sweepOldSessions({
    storeRoot: config.storeRoot,
    currentSessionId: createSessionId(now),
    maxAgeDays: parsed.maxAgeDays ?? config.maxAgeDays,
    now,
    logger
  });

  io.stdout(`Deleted ${result.deleted.length} session(s), kept ${result.retained.length}.\n`);
  for (const sessionId of result.deleted) {
    io.stdout(`  - ${sessionId}\n`);
  }
  for (const sessionId of result.skipped) {
    io.stdout(`  ? ${sessionId} (not a session directory)\n`);
  }
  for (const failure of result.failed) {
    io.stderr(`  ! ${failure.sessionId}: ${failure.error}\n`);
  }
  return result.failed.length > 0 ? 1 : 0;
}

export function runCli(argv: string[], params: RunCliParams = {}): number {
  const io = params.io ?? processIo;
  const now = (params.now ?? (() => new Date()))();
  const [command, ...args] = argv;

  if (!command || command === "help" || command === "--help" || command === "-h") {
    printHelp(io);
    return 0;
  }

  try {
    const loaded = loadCliConfig(params.projectRoot, params.env);
    const config = resolveSafekeepConfig(loaded.config);

    if (command === "list") {
      return runListCommand(config, io, now);
    }
    if (command === "show") {
      return runShowCommand(args, config, io);
    }
    if (command === "restore") {
      return runRestoreCommand(args, config, io, loaded.projectRoot);
    }
    if (command === "sweep") {
      return runSweepCommand(args, config, io, now);
    }
  } catch (error) {
    if (error instanceof SnapshotStoreError || error instanceof CliConfigError) {
      io.stderr(`${error.message}\n`);
      return 1;
    }
    throw error;
  }

  printHelp(io);
  return 1;
}
