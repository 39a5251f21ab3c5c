/**
 * Opens launch targets with the platform's default handler.
 *
 * The opener runs detached with its stdio ignored and is unref'd, so the
 * launcher can exit right after a successful spawn. Success means the opener
 * started; what the opener does with the target afterwards is not observed.
 */

import { spawn, type SpawnOptions } from "node:child_process";
import type { LaunchFailure, LaunchPrimitive, Result } from "@shared/types";

/** The part of a spawned ChildProcess the launcher relies on. */
export interface DetachedChild {
  once(event: "spawn", listener: () => void): unknown;
  once(event: "error", listener: (error: Error) => void): unknown;
  unref(): void;
}

export type SpawnDetached = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => DetachedChild;

export interface OpenerCommand {
  command: string;
  args: string[];
}

export interface LauncherOptions {
  platform?: NodeJS.Platform;
  spawnImpl?: SpawnDetached;
}

const defaultSpawn: SpawnDetached = (command, args, options) => spawn(command, args, options);

/** Command line that opens `target` with the default handler on `platform`. */
export function openerCommand(target: string, platform: NodeJS.Platform): OpenerCommand {
  switch (platform) {
    case "darwin":
      return { command: "open", args: [target] };
    case "win32":
      // Arguments go through verbatim: `""` is start's window title and the
      // quoted target keeps `&` in URLs away from cmd.
      return { command: "cmd", args: ["/c", "start", '""', `"${target.replace(/"/g, "")}"`] };
    default:
      return { command: "xdg-open", args: [target] };
  }
}

export function createLauncher(options: LauncherOptions = {}): LaunchPrimitive {
  const platform = options.platform ?? process.platform;
  const spawnImpl = options.spawnImpl ?? defaultSpawn;

  return (target: string): Promise<Result<void, LaunchFailure>> => {
    const { command, args } = openerCommand(target, platform);

    return new Promise((resolve) => {
      let child: DetachedChild;
      try {
        child = spawnImpl(command, args, {
          detached: true,
          stdio: "ignore",
          windowsVerbatimArguments: platform === "win32"
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[Launcher] Failed to start ${command} for ${target}: ${message}`);
        resolve({ ok: false, error: { target, message } });
        return;
      }

      child.once("spawn", () => {
        child.unref();
        resolve({ ok: true, value: undefined });
      });
      child.once("error", (error: Error) => {
        console.warn(`[Launcher] Failed to open ${target}: ${error.message}`);
        resolve({ ok: false, error: { target, message: error.message } });
      });
    });
  };
}

/** Launcher for the current platform. */
export const openDetached: LaunchPrimitive = createLauncher();
