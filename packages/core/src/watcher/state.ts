import type { WatcherEvent, WatcherState, WatcherTransition } from "./types.js";

export function transitionWatcherState(state: WatcherState, event: WatcherEvent): WatcherTransition {
  switch (event) {
    case "start":
      return state === "inactive"
        ? { ok: true, state: "watching" }
        : { ok: false, reason: "watcher is already watching" };
    case "tick":
      return state === "watching"
        ? { ok: true, state: "watching" }
        : { ok: false, reason: "tick received while inactive" };
    case "saved":
    case "stop":
      return { ok: true, state: "inactive" };
  }
}
