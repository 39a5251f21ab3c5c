import { createStore, type StoreApi } from "zustand/vanilla";
import type {
  ConfigLoadError,
  ConfigLoadResult,
  KeyEvent,
  LaunchPrimitive,
  PrefixResolver,
  Shortcut,
  TextEdit
} from "@shared/types";
import { applyTextEdit } from "../services/queryEditing";
import { matchShortcuts } from "../services/shortcutMatch";
import { resolveLaunch } from "../services/shortcutResolver";

/**
 * - `browsing`: the query drives matching and launching.
 * - `load-failed`: the configuration could not be loaded; only cancel works.
 * - `terminated`: the control loop should stop and the process exit.
 */
export type SessionStatus = "browsing" | "load-failed" | "terminated";

export interface SessionDeps {
  /** Outcome of the one-time configuration load. */
  config: ConfigLoadResult;
  launch: LaunchPrimitive;
  resolvePrefix: PrefixResolver;
}

export interface SessionState {
  status: SessionStatus;

  /** Current text of the search field. */
  query: string;

  /** Shortcuts matching `query`, in configuration order. */
  matches: readonly Shortcut[];

  /** Set when the session started in `load-failed`. */
  loadError: ConfigLoadError | null;

  /** Why the last launch attempt did not happen. Cleared by the next edit. */
  notice: string | null;

  /** Target opened by the launch that ended the session. */
  launched: string | null;

  // ── Actions ──────────────────────────────────────────────

  /** Dispatch a key event from the search field. */
  handleKey: (event: KeyEvent) => Promise<void>;

  /**
   * Edit the query, re-match against the full configuration and launch when
   * the matches resolve to a single target. Ignored outside `browsing`.
   */
  editQuery: (edit: TextEdit) => Promise<void>;

  /** Stop the session from any state. */
  quit: () => void;
}

export type SessionStore = StoreApi<SessionState>;

export function createSessionStore(deps: SessionDeps): SessionStore {
  const corpus: readonly Shortcut[] = deps.config.ok ? deps.config.value : [];

  return createStore<SessionState>()((set, get) => ({
    status: deps.config.ok ? "browsing" : "load-failed",
    query: "",
    matches: corpus,
    loadError: deps.config.ok ? null : deps.config.error,
    notice: null,
    launched: null,

    handleKey: async (event: KeyEvent): Promise<void> => {
      if (event.type === "cancel") {
        get().quit();
        return;
      }
      await get().editQuery(event.edit);
    },

    editQuery: async (edit: TextEdit): Promise<void> => {
      if (get().status !== "browsing") return;

      const query = applyTextEdit(get().query, edit);
      const matches = matchShortcuts(corpus, query);
      set({ query, matches, notice: null });

      const resolution = resolveLaunch(matches, query, deps.resolvePrefix);
      switch (resolution.type) {
        case "none":
          return;
        case "unresolvable":
          set({ notice: resolution.error.message });
          return;
        case "target": {
          const result = await deps.launch(resolution.target);
          if (result.ok) {
            set({ status: "terminated", launched: resolution.target });
          } else {
            set({ notice: `Could not open ${result.error.target}: ${result.error.message}` });
          }
          return;
        }
      }
    },

    quit: (): void => {
      set({ status: "terminated" });
    }
  }));
}
