import path from "node:path";
import { DEFAULT_MAX_AGE_DAYS, DEFAULT_SETTINGS_KEYS } from "./store/constants.js";
import { defaultStoreRoot, expandHome } from "./store/paths.js";
import type { WatchSettingsKeys } from "./settings.js";

export interface SafekeepConfig {
  storeRoot?: string;
  retention?: {
    maxAgeDays?: number;
  };
  settingsKeys?: Partial<WatchSettingsKeys>;
  debug?: boolean;
}

export interface ResolvedSafekeepConfig {
  storeRoot: string;
  maxAgeDays: number;
  settingsKeys: WatchSettingsKeys;
  debug: boolean;
}

export function defineConfig(config: SafekeepConfig): SafekeepConfig {
  return config;
}

export function resolveSafekeepConfig(config: SafekeepConfig = {}): ResolvedSafekeepConfig {
  const storeRoot = config.storeRoot ? path.resolve(expandHome(config.storeRoot)) : defaultStoreRoot();
  const maxAgeDays = config.retention?.maxAgeDays;
  return {
    storeRoot,
    maxAgeDays: maxAgeDays !== undefined && Number.isFinite(maxAgeDays) && maxAgeDays > 0 ? maxAgeDays : DEFAULT_MAX_AGE_DAYS,
    settingsKeys: {
      enabled: config.settingsKeys?.enabled ?? DEFAULT_SETTINGS_KEYS.enabled,
      intervalMinutes: config.settingsKeys?.intervalMinutes ?? DEFAULT_SETTINGS_KEYS.intervalMinutes
    },
    debug: config.debug ?? false
  };
}
