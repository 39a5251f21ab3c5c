/**
 * View model for the launcher screen.
 *
 * Matches are grouped by kind (apps, directories, files, URLs) and keep their
 * configuration order inside each group. Rows carry plain strings only; the
 * Ink components decide colours and glyphs.
 */

import type { ConfigLoadError, PathPrefix, PrefixResolver, Shortcut, ShortcutKind } from "@shared/types";
import { SHORTCUT_KIND_ORDER, canonicalSequence } from "@shared/shortcut";
import type { SessionState } from "../stores/sessionStore";
import { toForwardSlashes } from "./shortcutResolver";

/* ── Types ────────────────────────────────────────────────── */

export type ShortcutRowDetail =
  | { type: "text"; text: string }
  | { type: "path"; prefix: string | null; path: string };

export interface ShortcutRow {
  kind: ShortcutKind;
  /** Canonical (first) alias. */
  sequence: string;
  detail: ShortcutRowDetail;
}

export interface LauncherViewModel {
  query: string;
  rows: ShortcutRow[];
  loadError: ConfigLoadError | null;
  notice: string | null;
}

/* ── Grouping ─────────────────────────────────────────────── */

/** Stable partition of `matches` into the fixed kind order. */
export function groupByKind(matches: readonly Shortcut[]): Shortcut[] {
  const groups = new Map<ShortcutKind, Shortcut[]>(SHORTCUT_KIND_ORDER.map((kind) => [kind, []]));
  for (const shortcut of matches) {
    groups.get(shortcut.kind)?.push(shortcut);
  }
  return SHORTCUT_KIND_ORDER.flatMap((kind) => groups.get(kind) ?? []);
}

/* ── Rows ─────────────────────────────────────────────────── */

function describePrefix(prefix: PathPrefix, resolvePrefix: PrefixResolver): string {
  const base = resolvePrefix(prefix);
  return base.ok ? toForwardSlashes(base.value) : prefix;
}

export function toShortcutRow(shortcut: Shortcut, resolvePrefix: PrefixResolver): ShortcutRow {
  const sequence = canonicalSequence(shortcut);

  switch (shortcut.kind) {
    case "app":
    case "url":
      return {
        kind: shortcut.kind,
        sequence,
        detail: { type: "text", text: shortcut.description ?? "" }
      };
    case "dir":
    case "file":
      return {
        kind: shortcut.kind,
        sequence,
        detail: {
          type: "path",
          prefix: shortcut.pathPrefix ? describePrefix(shortcut.pathPrefix, resolvePrefix) : null,
          path: shortcut.path
        }
      };
  }
}

export function buildLauncherViewModel(
  state: Pick<SessionState, "query" | "matches" | "loadError" | "notice">,
  resolvePrefix: PrefixResolver
): LauncherViewModel {
  return {
    query: state.query,
    rows: groupByKind(state.matches).map((shortcut) => toShortcutRow(shortcut, resolvePrefix)),
    loadError: state.loadError,
    notice: state.notice
  };
}
