import { useInput, type Key } from "ink";
import type { KeyEvent } from "@shared/types";

/* ── Key bindings ─────────────────────────────────────────── */

/**
 * Ctrl+letter bindings of the search field. Ctrl+C is handled here rather
 * than by Ink so quitting always goes through the session.
 */
const CTRL_BINDINGS: Record<string, KeyEvent> = {
  c: { type: "cancel" },
  w: { type: "edit", edit: { op: "deleteWord" } },
  u: { type: "edit", edit: { op: "clear" } }
};

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/g;

/** The flags of Ink's `Key` the search field looks at. */
export type LauncherKey = Pick<
  Key,
  | "escape"
  | "ctrl"
  | "meta"
  | "backspace"
  | "delete"
  | "return"
  | "tab"
  | "upArrow"
  | "downArrow"
  | "leftArrow"
  | "rightArrow"
  | "pageUp"
  | "pageDown"
>;

/**
 * Translate one Ink input callback into a launcher key event.
 * Returns null for keys the search field does not react to
 * (arrows, Tab, Return, unbound Ctrl/Meta chords).
 */
export function toKeyEvent(input: string, key: LauncherKey): KeyEvent | null {
  if (key.escape) {
    return { type: "cancel" };
  }

  if (key.ctrl) {
    return CTRL_BINDINGS[input.toLowerCase()] ?? null;
  }

  // Most terminals send DEL for Backspace, which Ink reports as `delete`.
  if (key.backspace || key.delete) {
    return { type: "edit", edit: { op: "deleteBackward", count: 1 } };
  }

  if (
    key.meta ||
    key.return ||
    key.tab ||
    key.upArrow ||
    key.downArrow ||
    key.leftArrow ||
    key.rightArrow ||
    key.pageUp ||
    key.pageDown
  ) {
    return null;
  }

  const text = input.replace(CONTROL_CHARS, "");
  return text.length > 0 ? { type: "edit", edit: { op: "insert", text } } : null;
}

/* ── Hook ─────────────────────────────────────────────────── */

/** Forward the search field's key events to `onKey`. */
export function useLauncherKeys(onKey: (event: KeyEvent) => void): void {
  useInput((input, key) => {
    const event = toKeyEvent(input, key);
    if (event) onKey(event);
  });
}
