export const DEFAULT_STORE_DIRECTORY_NAME = ".safekeep-unsaved";
export const DEFAULT_MAX_AGE_DAYS = 28;

export const SESSION_ID_PATTERN = /^(\d{4})(\d{2})(\d{2})-(\d{2})(\d{2})(\d{2})$/;

export const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_SETTINGS_KEYS = {
  enabled: "auto-save",
  intervalMinutes: "auto-save-interval"
} as const;

// Node timers clamp anything above this delay to 1 ms.
export const MAX_TIMER_DELAY_MS = 2_147_483_647;
export const MAX_INTERVAL_MINUTES = Math.floor(MAX_TIMER_DELAY_MS / 60_000);
