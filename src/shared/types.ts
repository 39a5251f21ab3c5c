export type ShortcutKind = "app" | "dir" | "file" | "url";
export type PathPrefix = "documents" | "appdata";

/** One launchable entry from the user's configuration. */
export interface Shortcut {
  /** App identifier, filesystem path or URL, depending on `kind`. */
  path: string;
  /** Aliases the user can type. The first one is the display key. */
  sequences: readonly string[];
  description?: string;
  kind: ShortcutKind;
  /** Base directory joined in front of `path` when the shortcut is launched. */
  pathPrefix?: PathPrefix;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

/* ── Configuration errors ─────────────────────────────────── */

export type ConfigErrorCode = "CONFIG_ABSENT" | "CONFIG_IO_ERROR" | "CONFIG_PARSE_ERROR";

/** A single schema validation issue found in the config file. */
export interface ConfigIssue {
  path: (string | number)[];
  message: string;
  code: string;
}

export interface ConfigLoadError {
  code: ConfigErrorCode;
  message: string;
  /** Location that was tried, or null when none could be determined. */
  path: string | null;
  details?: ConfigIssue[];
}

export type ConfigLoadResult = Result<readonly Shortcut[], ConfigLoadError>;

/* ── Launching ────────────────────────────────────────────── */

export interface PrefixError {
  prefix: PathPrefix;
  message: string;
}

export type PrefixResolver = (prefix: PathPrefix) => Result<string, PrefixError>;

export interface LaunchFailure {
  target: string;
  message: string;
}

export type LaunchPrimitive = (target: string) => Promise<Result<void, LaunchFailure>>;

/* ── Key input ────────────────────────────────────────────── */

export type TextEdit =
  | { op: "insert"; text: string }
  | { op: "deleteBackward"; count: number }
  | { op: "deleteWord" }
  | { op: "clear" };

export type KeyEvent = { type: "cancel" } | { type: "edit"; edit: TextEdit };
