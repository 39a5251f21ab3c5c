import { describe, it, expect } from "vitest";
import { buildLauncherViewModel, groupByKind, toShortcutRow } from "../../src/renderer/services/shortcutRows";
import { createPrefixResolver, makeShortcut } from "../../src/test-utils";

const resolvePrefix = createPrefixResolver({ documents: "/home/test/Documents" });

const site = makeShortcut({ kind: "url", path: "https://example.test", sequences: ["site"], description: "Example" });
const editor = makeShortcut({ kind: "app", path: "Editor", sequences: ["ed", "edit"], description: "Text editor" });
const todo = makeShortcut({ kind: "file", path: "todo.md", sequences: ["todo"], pathPrefix: "documents" });
const projects = makeShortcut({ kind: "dir", path: "/srv/projects", sequences: ["proj"] });
const shell = makeShortcut({ kind: "app", path: "Terminal", sequences: ["sh"] });

describe("groupByKind", () => {
  it("orders groups app, dir, file, url and keeps order inside a group", () => {
    expect(groupByKind([site, editor, todo, projects, shell])).toEqual([editor, shell, projects, todo, site]);
  });

  it("returns an empty list for no matches", () => {
    expect(groupByKind([])).toEqual([]);
  });
});

describe("toShortcutRow", () => {
  it("shows the first alias and the description for apps", () => {
    expect(toShortcutRow(editor, resolvePrefix)).toEqual({
      kind: "app",
      sequence: "ed",
      detail: { type: "text", text: "Text editor" }
    });
  });

  it("shows an empty detail for a url without description", () => {
    const bare = makeShortcut({ kind: "url", path: "https://example.test", sequences: ["ex"] });
    expect(toShortcutRow(bare, resolvePrefix).detail).toEqual({ type: "text", text: "" });
  });

  it("shows the resolved prefix directory for files", () => {
    expect(toShortcutRow(todo, resolvePrefix).detail).toEqual({
      type: "path",
      prefix: "/home/test/Documents",
      path: "todo.md"
    });
  });

  it("falls back to the prefix name when it cannot be resolved", () => {
    expect(toShortcutRow(todo, createPrefixResolver()).detail).toEqual({
      type: "path",
      prefix: "documents",
      path: "todo.md"
    });
  });

  it("has no prefix for an unprefixed directory", () => {
    expect(toShortcutRow(projects, resolvePrefix).detail).toEqual({
      type: "path",
      prefix: null,
      path: "/srv/projects"
    });
  });

  it("uses an empty key for a shortcut without aliases", () => {
    const orphan = makeShortcut({ sequences: [] });
    expect(toShortcutRow(orphan, resolvePrefix).sequence).toBe("");
  });
});

describe("buildLauncherViewModel", () => {
  it("carries query, grouped rows, load error and notice", () => {
    const model = buildLauncherViewModel(
      { query: "s", matches: [site, shell], loadError: null, notice: "Could not open x: y" },
      resolvePrefix
    );

    expect(model.query).toBe("s");
    expect(model.rows.map((row) => row.sequence)).toEqual(["sh", "site"]);
    expect(model.loadError).toBeNull();
    expect(model.notice).toBe("Could not open x: y");
  });
});
