import { readFileSync } from "node:fs";
import { z } from "zod";
import type { ConfigIssue, ConfigLoadError, ConfigLoadResult } from "@shared/types";
import { configFileSchema, toShortcut } from "@shared/config-schema";
import type { PlatformDirs } from "./platform-dirs";

/** Location of the config file relative to the documents directory. */
export const CONFIG_RELATIVE_PATH = "bullet/config.json";

/** Environment variable that points at a config file elsewhere. */
export const CONFIG_PATH_ENV = "BULLET_CONFIG";

export interface LoadConfigOptions {
  dirs: Pick<PlatformDirs, "documentsDir">;
  env?: NodeJS.ProcessEnv;
}

/**
 * Where the configuration is read from: `$BULLET_CONFIG` when set, otherwise
 * `<documents>/bullet/config.json`. Null when no documents directory exists.
 */
export function resolveConfigPath(options: LoadConfigOptions): string | null {
  const override = options.env?.[CONFIG_PATH_ENV];
  if (override && override.trim().length > 0) {
    return override;
  }
  const documents = options.dirs.documentsDir();
  return documents === null ? null : `${documents}/${CONFIG_RELATIVE_PATH}`;
}

/* ── Error formatting ─────────────────────────────────────── */

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

function toConfigIssues(error: z.ZodError): ConfigIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.map((p) => (typeof p === "symbol" ? String(p) : p)),
    message: issue.message,
    code: issue.code
  }));
}

/**
 * Build a ConfigLoadError from whatever reading or parsing threw.
 *
 * - ENOENT: no file at the location (CONFIG_ABSENT).
 * - ZodError: the JSON does not describe a valid config; each issue is kept.
 * - SyntaxError: the file is not JSON.
 * - anything else: the file exists but cannot be read.
 */
export function formatConfigError(error: unknown, path: string): ConfigLoadError {
  if (isNodeError(error) && error.code === "ENOENT") {
    return {
      code: "CONFIG_ABSENT",
      message: `Config does not exist in "${path}"`,
      path
    };
  }

  if (error instanceof z.ZodError) {
    return {
      code: "CONFIG_PARSE_ERROR",
      message: `Invalid config: ${error.issues
        .map((i) => `${i.path.map(String).join(".")}: ${i.message}`)
        .join("; ")}`,
      path,
      details: toConfigIssues(error)
    };
  }

  if (error instanceof SyntaxError) {
    return {
      code: "CONFIG_PARSE_ERROR",
      message: `Config is not valid JSON: ${error.message}`,
      path
    };
  }

  return {
    code: "CONFIG_IO_ERROR",
    message: error instanceof Error ? error.message : String(error),
    path
  };
}

/* ── Loading ──────────────────────────────────────────────── */

/** Parse the contents of a config file into shortcuts. Throws on bad input. */
export function parseConfig(contents: string): ConfigLoadResult {
  const raw: unknown = JSON.parse(contents);
  const file = configFileSchema.parse(raw);
  return { ok: true, value: file.shortcuts.map(toShortcut) };
}

/**
 * Read and validate the configuration once. Never throws: every failure is
 * returned as a ConfigLoadError so the session can display it.
 */
export function loadConfig(options: LoadConfigOptions): ConfigLoadResult {
  const path = resolveConfigPath(options);
  if (path === null) {
    const error: ConfigLoadError = {
      code: "CONFIG_ABSENT",
      message: "No documents directory is known on this platform, so no config can be found.",
      path: null
    };
    console.warn(`[ConfigLoader] ${error.code}: ${error.message}`);
    return { ok: false, error };
  }

  try {
    return parseConfig(readFileSync(path, "utf8"));
  } catch (error) {
    const formatted = formatConfigError(error, path);
    console.warn(`[ConfigLoader] ${formatted.code}: ${formatted.message}`);
    return { ok: false, error: formatted };
  }
}
