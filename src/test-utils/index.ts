/**
 * Test utilities barrel export.
 *
 * Import from "src/test-utils" in test files for shortcut factories and the
 * in-process stand-ins for the launcher, prefix lookup, surface and keys.
 */

export { makeShortcut, makeConfig } from "./shortcut-factory";
export { createMockLaunch, createPrefixResolver, type MockLaunch } from "./mock-launcher";
export { createRecordingSurface, createScriptedKeys, type RecordingSurface } from "./fake-surface";
