import { z } from "zod";
import type { Logger } from "./logging.js";
import { DEFAULT_SETTINGS_KEYS, MAX_INTERVAL_MINUTES } from "./store/constants.js";
import { toErrorText } from "./store/utils.js";
import type { WatchSettings } from "./watcher/types.js";

/** Host settings store, e.g. the editor's preferences backend. */
export interface SettingsProvider {
  getBoolean(key: string): boolean | undefined;
  getUint(key: string): number | undefined;
}

export interface WatchSettingsKeys {
  enabled: string;
  intervalMinutes: string;
}

const enabledSchema = z.boolean();
const intervalMinutesSchema = z.number().int().min(1).max(MAX_INTERVAL_MINUTES);

const DISABLED: WatchSettings = {
  enabled: false,
  intervalMinutes: 0
};

function readValue<T>(read: () => T, key: string, logger: Logger): { ok: true; value: T } | { ok: false } {
  try {
    return { ok: true, value: read() };
  } catch (error) {
    logger.warn("Unable to read setting", { key, error: toErrorText(error) });
    return { ok: false };
  }
}

/**
 * Reads the auto-save toggle and interval once. Anything missing, unreadable
 * or out of range turns the feature off.
 */
export function readWatchSettings(
  provider: SettingsProvider,
  logger: Logger,
  keys: WatchSettingsKeys = DEFAULT_SETTINGS_KEYS
): WatchSettings {
  const rawEnabled = readValue(() => provider.getBoolean(keys.enabled), keys.enabled, logger);
  const rawInterval = readValue(() => provider.getUint(keys.intervalMinutes), keys.intervalMinutes, logger);
  if (!rawEnabled.ok || !rawInterval.ok) {
    logger.warn("Auto-save settings are unavailable; snapshots are disabled");
    return DISABLED;
  }

  const enabled = enabledSchema.safeParse(rawEnabled.value);
  if (!enabled.success) {
    logger.warn("Auto-save toggle is missing or invalid; snapshots are disabled", { key: keys.enabled });
    return DISABLED;
  }
  if (!enabled.data) {
    logger.warn("The standard 'auto-save' setting is not enabled; snapshots are disabled", { key: keys.enabled });
    return DISABLED;
  }

  const intervalMinutes = intervalMinutesSchema.safeParse(rawInterval.value);
  if (!intervalMinutes.success) {
    logger.warn("Auto-save interval is missing or invalid; snapshots are disabled", {
      key: keys.intervalMinutes,
      value: rawInterval.value
    });
    return DISABLED;
  }

  logger.debug("Auto-save settings loaded", { enabled: true, intervalMinutes: intervalMinutes.data });
  return {
    enabled: true,
    intervalMinutes: intervalMinutes.data
  };
}

export function createStaticSettings(values: Record<string, boolean | number>): SettingsProvider {
  return {
    getBoolean(key) {
      const value = values[key];
      return typeof value === "boolean" ? value : undefined;
    },
    getUint(key) {
      const value = values[key];
      return typeof value === "number" ? value : undefined;
    }
  };
}
