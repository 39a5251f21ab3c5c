import type { TextEdit } from "@shared/types";

const TRAILING_WORD = /\S*\s*$/;

/**
 * Apply a single text edit to the search query. The field has no cursor
 * movement, so every edit happens at the end of the text.
 */
export function applyTextEdit(query: string, edit: TextEdit): string {
  switch (edit.op) {
    case "insert":
      return query + edit.text;
    case "deleteBackward": {
      // Spread so surrogate pairs are removed as one character.
      const chars = [...query];
      return chars.slice(0, Math.max(0, chars.length - edit.count)).join("");
    }
    case "deleteWord":
      return query.replace(TRAILING_WORD, "");
    case "clear":
      return "";
  }
}
