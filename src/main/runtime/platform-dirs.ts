/**
 * Well-known base directories used for `path_prefix` expansion and for
 * locating the configuration file.
 *
 * Lookups are lazy and never throw: a directory that cannot be determined is
 * reported as null (or as a PrefixError through `resolvePrefix`), so loading
 * the configuration never depends on prefix directories being available.
 */

import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import type { PathPrefix, PrefixResolver } from "@shared/types";

export interface PlatformContext {
  platform: NodeJS.Platform;
  /** Empty string when the home directory is unknown. */
  homeDir: string;
  env: NodeJS.ProcessEnv;
  /** Returns file contents, or null when the file cannot be read. */
  readTextFile: (path: string) => string | null;
}

export interface PlatformDirs {
  documentsDir: () => string | null;
  configDir: () => string | null;
  resolvePrefix: PrefixResolver;
}

/* ── Helpers ──────────────────────────────────────────────── */

function normalize(path: string): string {
  return path.replace(/\\/g, "/").replace(/\/+$/, "");
}

function readTextFileOrNull(path: string): string | null {
  try {
    return readFileSync(path, "utf8");
  } catch {
    return null;
  }
}

function safeHomeDir(): string {
  try {
    return homedir();
  } catch {
    return "";
  }
}

export function currentPlatformContext(): PlatformContext {
  return {
    platform: process.platform,
    homeDir: safeHomeDir(),
    env: process.env,
    readTextFile: readTextFileOrNull
  };
}

const USER_DIRS_DOCUMENTS = /^XDG_DOCUMENTS_DIR="?([^"\n]*)"?\s*$/m;

/**
 * Read XDG_DOCUMENTS_DIR from user-dirs.dirs. `$HOME` is the only variable
 * that file format allows.
 */
function xdgDocumentsDir(context: PlatformContext, configHome: string): string | null {
  const contents = context.readTextFile(`${configHome}/user-dirs.dirs`);
  if (contents === null) return null;

  const match = USER_DIRS_DOCUMENTS.exec(contents);
  if (!match || match[1].length === 0) return null;

  const dir = match[1].replace(/^\$HOME/, context.homeDir);
  return dir.startsWith("/") ? dir : null;
}

/* ── Factory ──────────────────────────────────────────────── */

export function createPlatformDirs(context: PlatformContext = currentPlatformContext()): PlatformDirs {
  const home = normalize(context.homeDir);

  const configDir = (): string | null => {
    switch (context.platform) {
      case "win32":
        return context.env.APPDATA ? normalize(context.env.APPDATA) : null;
      case "darwin":
        return home ? `${home}/Library/Application Support` : null;
      default: {
        const xdg = context.env.XDG_CONFIG_HOME;
        if (xdg && xdg.startsWith("/")) return normalize(xdg);
        return home ? `${home}/.config` : null;
      }
    }
  };

  const documentsDir = (): string | null => {
    switch (context.platform) {
      case "win32": {
        const profile = context.env.USERPROFILE ? normalize(context.env.USERPROFILE) : home;
        return profile ? `${profile}/Documents` : null;
      }
      case "darwin":
        return home ? `${home}/Documents` : null;
      default: {
        if (!home) return null;
        const configHome = configDir() ?? `${home}/.config`;
        const fromUserDirs = xdgDocumentsDir(context, configHome);
        return fromUserDirs ? normalize(fromUserDirs) : `${home}/Documents`;
      }
    }
  };

  const lookups: Record<PathPrefix, () => string | null> = {
    documents: documentsDir,
    appdata: configDir
  };

  const resolvePrefix: PrefixResolver = (prefix) => {
    const dir = lookups[prefix]();
    if (dir === null) {
      return {
        ok: false,
        error: {
          prefix,
          message: `Cannot resolve the "${prefix}" directory on ${context.platform}.`
        }
      };
    }
    return { ok: true, value: dir };
  };

  return { documentsDir, configDir, resolvePrefix };
}
