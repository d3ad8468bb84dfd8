// backend/services/hero/index.ts
/**
 * Start-up: load env (bootstrap), validate config, open the store, then
 * start HTTP with the shared startHttpService.
 */

import "./src/bootstrap"; // loads env + sets SERVICE_NAME

import { createApp } from "./src/app";
import { loadConfig, SERVICE_NAME } from "./src/config";
import { openHeroStore } from "./src/repo/openHeroStore";
import { logger } from "../shared/utils/logger";
import { startHttpService } from "../shared/bootstrap/startHttpService";

// Top-level guards
process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, `[${SERVICE_NAME}] Unhandled Promise Rejection`);
});
process.on("uncaughtException", (err) => {
  logger.error({ err }, `[${SERVICE_NAME}] Uncaught Exception`);
});

async function start() {
  try {
    const config = loadConfig(process.env);
    const { store, readiness, close } = await openHeroStore(config, logger);
    startHttpService({
      app: createApp({ store, logger, readiness }),
      port: config.port,
      serviceName: SERVICE_NAME,
      logger,
      onShutdown: close,
    });
  } catch (err) {
    logger.error({ err }, `failed to start ${SERVICE_NAME} service`);
    process.exit(1);
  }
}

void start();
