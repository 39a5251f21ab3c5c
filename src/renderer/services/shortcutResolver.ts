/**
 * Launch decisions for the current set of matches.
 *
 * The search field launches as soon as the matches collapse to a single
 * shortcut, or when the query spells out one candidate's alias exactly while
 * others are still listed ("git" picks the "git" shortcut over "github").
 *
 * Targets are computed here too, because a shortcut's `pathPrefix` is only
 * expanded at launch time. A prefix that cannot be expanded on this machine
 * makes the decision `unresolvable` instead of throwing.
 */

import type { PrefixError, PrefixResolver, Result, Shortcut } from "@shared/types";
import { acceptsPathPrefix } from "@shared/shortcut";
import { hasExactSequence } from "./shortcutMatch";

/* ── Types ────────────────────────────────────────────────── */

export type LaunchResolution =
  | { type: "none" }
  | { type: "target"; shortcut: Shortcut; target: string }
  | { type: "unresolvable"; shortcut: Shortcut; error: PrefixError };

/* ── Path helpers ─────────────────────────────────────────── */

const WINDOWS_DRIVE = /^[A-Za-z]:\//;
const TRAILING_SLASHES = /\/+$/;

/** Convert Windows separators so targets look the same on every platform. */
export function toForwardSlashes(path: string): string {
  return path.replace(/\\/g, "/");
}

function isAbsolutePath(path: string): boolean {
  const normalized = toForwardSlashes(path);
  return normalized.startsWith("/") || WINDOWS_DRIVE.test(normalized);
}

/* ── Public API ───────────────────────────────────────────── */

/**
 * Pick the shortcut to launch, or null to keep typing.
 *
 * 1. A single remaining match is picked whatever the query is.
 * 2. Otherwise the first match with an alias equal to the query.
 */
export function pickShortcut(filtered: readonly Shortcut[], query: string): Shortcut | null {
  if (filtered.length === 1) {
    return filtered[0];
  }
  return filtered.find((shortcut) => hasExactSequence(shortcut, query)) ?? null;
}

/**
 * Expand a shortcut into the string handed to the OS opener.
 *
 * The prefix directory is joined in front of `path` for dir/file shortcuts,
 * with separators normalized to `/`. Without a prefix, or with an absolute
 * `path`, the configured path is handed over untouched.
 */
export function resolveLaunchTarget(
  shortcut: Shortcut,
  resolvePrefix: PrefixResolver
): Result<string, PrefixError> {
  if (!shortcut.pathPrefix || !acceptsPathPrefix(shortcut.kind) || isAbsolutePath(shortcut.path)) {
    return { ok: true, value: shortcut.path };
  }

  const base = resolvePrefix(shortcut.pathPrefix);
  if (!base.ok) {
    return base;
  }
  // Plain concatenation keeps a UNC base's leading `//`.
  const dir = toForwardSlashes(base.value).replace(TRAILING_SLASHES, "");
  return { ok: true, value: `${dir}/${toForwardSlashes(shortcut.path)}` };
}

/** Decide whether `filtered` should launch, and what. */
export function resolveLaunch(
  filtered: readonly Shortcut[],
  query: string,
  resolvePrefix: PrefixResolver
): LaunchResolution {
  const shortcut = pickShortcut(filtered, query);
  if (!shortcut) {
    return { type: "none" };
  }

  const target = resolveLaunchTarget(shortcut, resolvePrefix);
  if (!target.ok) {
    return { type: "unresolvable", shortcut, error: target.error };
  }
  return { type: "target", shortcut, target: target.value };
}
