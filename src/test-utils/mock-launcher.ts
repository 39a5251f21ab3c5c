/**
 * Stand-ins for the OS-facing collaborators of the session.
 *
 * Usage:
 *   const launch = createMockLaunch();              // every launch succeeds
 *   launch.mockResolvedValueOnce({ ok: false, error: { target, message } });
 *   const resolvePrefix = createPrefixResolver({ documents: "/home/test/Documents" });
 */

import { vi, type Mock } from "vitest";
import type { LaunchPrimitive, PathPrefix, PrefixResolver } from "@shared/types";

export type MockLaunch = Mock<LaunchPrimitive>;

export function createMockLaunch(): MockLaunch {
  return vi.fn<LaunchPrimitive>(async () => ({ ok: true, value: undefined }));
}

/** Prefix lookup over a fixed table; missing prefixes fail to resolve. */
export function createPrefixResolver(dirs: Partial<Record<PathPrefix, string>> = {}): PrefixResolver {
  return (prefix) => {
    const dir = dirs[prefix];
    if (dir === undefined) {
      return { ok: false, error: { prefix, message: `No ${prefix} directory in test.` } };
    }
    return { ok: true, value: dir };
  };
}
