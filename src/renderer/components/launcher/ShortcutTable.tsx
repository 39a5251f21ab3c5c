import type { JSX } from "react";
import { Box, Text } from "ink";
import type { ShortcutKind } from "@shared/types";
import type { ShortcutRow, ShortcutRowDetail } from "../../services/shortcutRows";

/* ── Kind styling ─────────────────────────────────────────── */

interface KindStyle {
  glyph: string;
  color: string;
  keyColor: string;
}

export const KIND_STYLES: Record<ShortcutKind, KindStyle> = {
  app: { glyph: ">__", color: "red", keyColor: "redBright" },
  dir: { glyph: "[_]", color: "green", keyColor: "greenBright" },
  file: { glyph: "[_]", color: "yellow", keyColor: "yellowBright" },
  url: { glyph: "(#)", color: "blue", keyColor: "blueBright" }
};

/** Narrowest key column, glyph and separator included. */
const MIN_KEY_COLUMN = 8;

export function keyColumnWidth(rows: readonly ShortcutRow[]): number {
  return rows.reduce(
    (width, row) => Math.max(width, KIND_STYLES[row.kind].glyph.length + 1 + row.sequence.length + 1),
    MIN_KEY_COLUMN
  );
}

/* ── Cells ────────────────────────────────────────────────── */

function DetailCell({ detail }: { detail: ShortcutRowDetail }): JSX.Element {
  if (detail.type === "text") {
    return <Text>{detail.text}</Text>;
  }
  return (
    <Text>
      {detail.prefix !== null ? <Text underline>{`${detail.prefix}/`}</Text> : null}
      {detail.path}
    </Text>
  );
}

/* ── Table ────────────────────────────────────────────────── */

export interface ShortcutTableProps {
  rows: readonly ShortcutRow[];
}

export function ShortcutTable({ rows }: ShortcutTableProps): JSX.Element {
  if (rows.length === 0) {
    return <Text dimColor>No shortcuts match.</Text>;
  }

  const width = keyColumnWidth(rows);
  return (
    <Box flexDirection="column">
      {rows.map((row, index) => {
        const style = KIND_STYLES[row.kind];
        return (
          <Box key={`${row.kind}:${row.sequence}:${index}`}>
            <Box width={width} flexShrink={0}>
              <Text>
                <Text color={style.color}>{`${style.glyph} `}</Text>
                <Text bold color={style.keyColor}>
                  {row.sequence}
                </Text>
              </Text>
            </Box>
            <DetailCell detail={row.detail} />
          </Box>
        );
      })}
    </Box>
  );
}
