export { runCli, runListCommand, runRestoreCommand, runShowCommand, runSweepCommand } from "./commands.js";
export type { CliIo, RunCliParams } from "./commands.js";
export { CliConfigError, loadCliConfig } from "./config.js";
export type { LoadedCliConfig } from "./config.js";
