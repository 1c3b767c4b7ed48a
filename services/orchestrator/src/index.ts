/**
 * Clipcast orchestrator entrypoint
 * Usage: node dist/services/orchestrator/src/index.js (configuration from the environment)
 */

import { createApplication } from "./app";
import { loadConfig } from "./lib/config";
import { createServiceLogger, defaultLogger } from "./lib/logger";
import { ObsWebSocketCompositor } from "./obs";

export { createApplication, type Application, type ApplicationDependencies } from "./app";
export { loadConfig, type AppConfig } from "./lib/config";
export { ClipCommandService, type ClipCommand, type CommandResult } from "./commands/clipCommands";
export type { ChatNotifier } from "./commands/notifier";
export { PlaybackEngine } from "./playback/playbackEngine";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createServiceLogger({ minLevel: config.logLevel });

  const compositor = new ObsWebSocketCompositor({ url: config.obs.url, password: config.obs.password, logger });
  const app = createApplication(config, { compositor, connection: compositor, logger });
  const port = await app.start();
  logger.info("Clipcast ready", { pageUrl: app.server.pageUrl, port });

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info("Shutting down", { signal });

    app
      .shutdown()
      .then(() => compositor.disconnect())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error("Shutdown failed", error);
        process.exit(1);
      });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

if (require.main === module) {
  main().catch((error: unknown) => {
    defaultLogger.error("Startup failed", error);
    process.exit(1);
  });
}
