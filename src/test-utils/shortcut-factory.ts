import type { ConfigLoadResult, Shortcut } from "@shared/types";

/** Shortcut with sensible defaults; override only what a test cares about. */
export function makeShortcut(overrides: Partial<Shortcut> = {}): Shortcut {
  return {
    path: "Terminal",
    sequences: ["term"],
    kind: "app",
    ...overrides
  };
}

/** Successful configuration load of `shortcuts`. */
export function makeConfig(shortcuts: Shortcut[]): ConfigLoadResult {
  return { ok: true, value: shortcuts };
}
