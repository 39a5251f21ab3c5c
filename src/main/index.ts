import { InkSurface } from "../renderer";
import { createSessionStore } from "../renderer/stores/sessionStore";
import { loadConfig } from "./runtime/config-loader";
import { runControlLoop } from "./runtime/control-loop";
import { KeyQueue } from "./runtime/key-queue";
import { openDetached } from "./runtime/launcher";
import { createPlatformDirs } from "./runtime/platform-dirs";

async function bootstrap(): Promise<number> {
  const dirs = createPlatformDirs();

  // Loaded once, before the first frame; a failure is shown by the session.
  const config = loadConfig({ dirs, env: process.env });

  const keys = new KeyQueue();
  const store = createSessionStore({
    config,
    launch: openDetached,
    resolvePrefix: dirs.resolvePrefix
  });
  const surface = new InkSurface((event) => keys.push(event));

  await runControlLoop(store, surface, keys, { resolvePrefix: dirs.resolvePrefix });
  return 0;
}

process.on("unhandledRejection", (error) => {
  console.error("[bullet] Unhandled rejection:", error);
});

process.on("uncaughtException", (error) => {
  console.error("[bullet] Uncaught exception:", error);
  process.exit(1);
});

void bootstrap()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error("[bullet] Failed to start:", error);
    process.exit(1);
  });
