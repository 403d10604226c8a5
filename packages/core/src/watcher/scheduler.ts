import { MAX_TIMER_DELAY_MS } from "../store/constants.js";
import type { CancelToken, Scheduler, TickOutcome } from "./types.js";

export function createTimerScheduler(): Scheduler {
  return {
    every(intervalSeconds: number, handler: () => TickOutcome): CancelToken {
      const delayMs = intervalSeconds * 1000;
      if (!Number.isFinite(delayMs) || delayMs < 1 || delayMs > MAX_TIMER_DELAY_MS) {
        throw new RangeError(`Unsupported timer interval: ${intervalSeconds}s`);
      }
      let cancelled = false;
      const timer = setInterval(() => {
        if (cancelled) {
          return;
        }
        if (handler() === "stop") {
          cancelled = true;
          clearInterval(timer);
        }
      }, delayMs);
      return () => {
        cancelled = true;
        clearInterval(timer);
      };
    }
  };
}
