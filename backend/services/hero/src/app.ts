// backend/services/hero/src/app.ts
/**
 * Builds the hero express app on the shared service builder. The store and
 * logger are passed in, so tests assemble the same app over a fake store.
 */

import type { Express } from "express";
import { createServiceApp } from "../../shared/app/createServiceApp";
import type { ReadinessFn } from "../../shared/health";
import type { ILogger } from "../../shared/utils/logger";
import { HeroController } from "./controllers/hero/HeroController";
import { createHeroRouter } from "./routes/heroRoutes";
import type { HeroStore } from "./repo/heroStore";
import { SERVICE_NAME } from "./config";

export type HeroAppDeps = {
  store: HeroStore;
  logger: ILogger;
  readiness?: ReadinessFn;
};

export function createApp(deps: HeroAppDeps): Express {
  const controller = new HeroController(deps.store, deps.logger);

  return createServiceApp({
    serviceName: SERVICE_NAME,
    routePrefixes: ["/heroes"],
    readiness: deps.readiness,
    logger: deps.logger,
    mountRoutes: (api) => {
      api.use("/heroes", createHeroRouter(controller));
    },
  });
}

export default createApp;
