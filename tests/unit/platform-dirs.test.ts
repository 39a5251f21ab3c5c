import { describe, it, expect } from "vitest";
import { createPlatformDirs, type PlatformContext } from "../../src/main/runtime/platform-dirs";

function context(overrides: Partial<PlatformContext> = {}): PlatformContext {
  return {
    platform: "linux",
    homeDir: "/home/test",
    env: {},
    readTextFile: () => null,
    ...overrides
  };
}

describe("createPlatformDirs", () => {
  describe("linux", () => {
    it("defaults documents to ~/Documents", () => {
      expect(createPlatformDirs(context()).documentsDir()).toBe("/home/test/Documents");
    });

    it("reads XDG_DOCUMENTS_DIR from user-dirs.dirs", () => {
      const files: Record<string, string> = {
        "/home/test/.config/user-dirs.dirs": '# generated\nXDG_DESKTOP_DIR="$HOME/Desktop"\nXDG_DOCUMENTS_DIR="$HOME/Dokumente"\n'
      };
      const dirs = createPlatformDirs(context({ readTextFile: (path) => files[path] ?? null }));
      expect(dirs.documentsDir()).toBe("/home/test/Dokumente");
    });

    it("looks for user-dirs.dirs under XDG_CONFIG_HOME", () => {
      const seen: string[] = [];
      const dirs = createPlatformDirs(
        context({
          env: { XDG_CONFIG_HOME: "/cfg" },
          readTextFile: (path) => {
            seen.push(path);
            return null;
          }
        })
      );
      dirs.documentsDir();
      expect(seen).toEqual(["/cfg/user-dirs.dirs"]);
    });

    it("uses XDG_CONFIG_HOME for appdata when absolute", () => {
      expect(createPlatformDirs(context({ env: { XDG_CONFIG_HOME: "/cfg/" } })).configDir()).toBe("/cfg");
      expect(createPlatformDirs(context({ env: { XDG_CONFIG_HOME: "relative" } })).configDir()).toBe(
        "/home/test/.config"
      );
    });

    it("has no directories without a home directory", () => {
      const dirs = createPlatformDirs(context({ homeDir: "" }));
      expect(dirs.documentsDir()).toBeNull();
      expect(dirs.configDir()).toBeNull();
    });
  });

  describe("darwin", () => {
    it("uses ~/Documents and Application Support", () => {
      const dirs = createPlatformDirs(context({ platform: "darwin", homeDir: "/Users/test" }));
      expect(dirs.documentsDir()).toBe("/Users/test/Documents");
      expect(dirs.configDir()).toBe("/Users/test/Library/Application Support");
    });
  });

  describe("win32", () => {
    it("uses USERPROFILE and APPDATA with forward slashes", () => {
      const dirs = createPlatformDirs(
        context({
          platform: "win32",
          homeDir: "C:\\Users\\test",
          env: { USERPROFILE: "C:\\Users\\test", APPDATA: "C:\\Users\\test\\AppData\\Roaming" }
        })
      );
      expect(dirs.documentsDir()).toBe("C:/Users/test/Documents");
      expect(dirs.configDir()).toBe("C:/Users/test/AppData/Roaming");
    });

    it("cannot resolve appdata without APPDATA", () => {
      const dirs = createPlatformDirs(context({ platform: "win32", homeDir: "C:\\Users\\test" }));
      expect(dirs.resolvePrefix("appdata")).toEqual({
        ok: false,
        error: { prefix: "appdata", message: 'Cannot resolve the "appdata" directory on win32.' }
      });
    });
  });

  describe("resolvePrefix", () => {
    it("resolves documents and appdata", () => {
      const dirs = createPlatformDirs(context());
      expect(dirs.resolvePrefix("documents")).toEqual({ ok: true, value: "/home/test/Documents" });
      expect(dirs.resolvePrefix("appdata")).toEqual({ ok: true, value: "/home/test/.config" });
    });
  });
});
