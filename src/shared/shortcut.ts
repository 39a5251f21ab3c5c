import type { Shortcut, ShortcutKind } from "./types";

/** Display order of the kind groups in the shortcut list. */
export const SHORTCUT_KIND_ORDER: readonly ShortcutKind[] = ["app", "dir", "file", "url"];

/** Only filesystem shortcuts take a base-directory prefix. */
export function acceptsPathPrefix(kind: ShortcutKind): boolean {
  switch (kind) {
    case "dir":
    case "file":
      return true;
    case "app":
    case "url":
      return false;
  }
}

/** First alias of a shortcut, or "" for an entry without aliases. */
export function canonicalSequence(shortcut: Shortcut): string {
  return shortcut.sequences[0] ?? "";
}
