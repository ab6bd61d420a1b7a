/**
 * Server Entry Point
 * ==================
 * Loads configuration, builds the container and starts the Express server
 */

import "dotenv/config";

import { createApp } from "./app.js";
import { loadConfig } from "./config/env.js";
import { buildContainer } from "./container.js";
import { logger, setLogLevel } from "./shared/logger.js";

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const container = await buildContainer(config);
  const app = createApp(container);

  const server = app.listen(config.port, () => {
    logger.info("Secure Chat API listening", {
      url: `http://localhost:${config.port}`,
      health: `http://localhost:${config.port}/health`,
      docs: `http://localhost:${config.port}/api-docs`,
      refreshRotation: config.auth.refreshRotation,
      rolePolicy: config.auth.rolePolicy,
    });
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) {return;}
    shuttingDown = true;
    logger.info(`${signal} received, closing server...`);

    server.close(() => {
      container
        .close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error("Shutdown failed", { error: err instanceof Error ? err.message : String(err) });
          process.exit(1);
        });
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  logger.error("Startup failed", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
