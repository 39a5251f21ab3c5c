/**
 * The launcher's one control loop: render the session, wait up to
 * `pollIntervalMs` for a key, handle it completely (launch included), repeat
 * until the session is terminated.
 *
 * The loop owns the session store; nothing else mutates it.
 */

import type { PrefixResolver } from "@shared/types";
import { buildLauncherViewModel, type LauncherViewModel } from "../../renderer/services/shortcutRows";
import type { SessionState, SessionStore } from "../../renderer/stores/sessionStore";
import type { KeySource } from "./key-queue";

export const DEFAULT_POLL_INTERVAL_MS = 100;

/** Display the launcher screen somewhere. */
export interface RenderSurface {
  render: (model: LauncherViewModel) => void;
  close: () => void;
}

export interface ControlLoopOptions {
  resolvePrefix: PrefixResolver;
  pollIntervalMs?: number;
}

export interface ControlLoopOutcome {
  /** Target opened before exit, or null when the user cancelled. */
  launched: string | null;
}

export async function runControlLoop(
  store: SessionStore,
  surface: RenderSurface,
  keys: KeySource,
  options: ControlLoopOptions
): Promise<ControlLoopOutcome> {
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  let rendered: SessionState | null = null;

  try {
    while (store.getState().status !== "terminated") {
      const state = store.getState();
      // Store updates replace the state object, so identity means unchanged.
      if (state !== rendered) {
        surface.render(buildLauncherViewModel(state, options.resolvePrefix));
        rendered = state;
      }

      const event = await keys.poll(pollIntervalMs);
      if (event) {
        await store.getState().handleKey(event);
      }
    }
  } finally {
    surface.close();
  }

  return { launched: store.getState().launched };
}
