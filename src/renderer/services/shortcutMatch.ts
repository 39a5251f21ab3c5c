/**
 * Sequence matching for the launcher's search field.
 *
 * A shortcut matches when any of its aliases contains the query as a literal,
 * case-sensitive substring: "ls" matches "list", "LS" does not. There is no
 * scoring; results keep the order of the configuration file.
 */

import type { Shortcut } from "@shared/types";

/* ── Alias containment ────────────────────────────────────── */

/** True when at least one alias of `shortcut` contains `query`. */
export function sequencesContain(shortcut: Shortcut, query: string): boolean {
  return shortcut.sequences.some((sequence) => sequence.includes(query));
}

/** True when at least one alias of `shortcut` is exactly `query`. */
export function hasExactSequence(shortcut: Shortcut, query: string): boolean {
  return shortcut.sequences.some((sequence) => sequence === query);
}

/* ── Public API ───────────────────────────────────────────── */

/**
 * Filter `corpus` down to the shortcuts reachable with `query`.
 *
 * An empty or whitespace-only query is a no-op filter and returns every
 * shortcut. The query itself is never trimmed for matching.
 */
export function matchShortcuts(corpus: readonly Shortcut[], query: string): Shortcut[] {
  if (query.trim().length === 0) {
    return corpus.slice();
  }
  return corpus.filter((shortcut) => sequencesContain(shortcut, query));
}
