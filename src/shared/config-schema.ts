import { z } from "zod";
import type { Shortcut } from "./types";

export const shortcutKindSchema = z.enum(["app", "dir", "file", "url"]);

export const pathPrefixSchema = z.enum(["documents", "appdata"]);

/** One entry of the `shortcuts` array, as written in config.json. */
export const shortcutRecordSchema = z.object({
  path: z.string().min(1, "path must not be empty."),
  seq: z
    .array(z.string().min(1, "sequences must not be empty strings."))
    .min(1, "seq must list at least one sequence."),
  description: z.string().nullish(),
  kind: shortcutKindSchema,
  path_prefix: pathPrefixSchema.nullish()
});

export const configFileSchema = z.object({
  shortcuts: z.array(shortcutRecordSchema)
});

export type ShortcutRecord = z.infer<typeof shortcutRecordSchema>;
export type ConfigFile = z.infer<typeof configFileSchema>;

export function toShortcut(record: ShortcutRecord): Shortcut {
  return {
    path: record.path,
    sequences: record.seq,
    kind: record.kind,
    ...(record.description != null ? { description: record.description } : {}),
    ...(record.path_prefix != null ? { pathPrefix: record.path_prefix } : {})
  };
}
