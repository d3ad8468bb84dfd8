// backend/services/shared/app/createServiceApp.ts

/**
 * Purpose:
 * - Assemble the internal service stack in one place:
 *   requestId → http logger → health → json parser → routes → 404 → error.
 *
 * Notes:
 * - Health endpoints are mounted before the body parser and stay open.
 * - Routes are mounted at the root; each service router owns its prefix.
 */

import express, { type Express, type Router } from "express";
import { requestIdMiddleware } from "../middleware/requestId";
import { makeHttpLogger } from "../middleware/httpLogger";
import {
  notFoundProblemJson,
  errorProblemJson,
} from "../middleware/problemJson";
import {
  createHealthRouter,
  LIVENESS_PATHS,
  READINESS_PATHS,
  type ReadinessFn,
} from "../health";
import type { ILogger } from "../utils/logger";

export type CreateServiceAppOptions = {
  /** Service slug (e.g., "hero"). Used in logs and health bodies. */
  serviceName: string;
  /** Mounts the service's routers onto the provided Router. */
  mountRoutes: (router: Router) => void;
  /** Path prefixes whose unknown routes answer 404 Problem+JSON. */
  routePrefixes: string[];
  readiness?: ReadinessFn;
  /** Logger for the error formatter (defaults to the shared root logger). */
  logger?: ILogger;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const {
    serviceName,
    mountRoutes,
    routePrefixes,
    readiness,
    logger,
  } = opts;

  const app = express();
  app.disable("x-powered-by");

  // ── Transport & Telemetry ───────────────────────────────────────────────────
  app.use(requestIdMiddleware());
  app.use(makeHttpLogger(serviceName));

  // ── Health (public) ─────────────────────────────────────────────────────────
  app.use(createHealthRouter(serviceName, readiness));

  // ── Body parsers ────────────────────────────────────────────────────────────
  app.use(express.json({ limit: "1mb" }));

  // ── Routes ──────────────────────────────────────────────────────────────────
  const api = express.Router();
  mountRoutes(api);
  app.use(api);

  // ── Tails: 404 + error formatter ────────────────────────────────────────────
  app.use(
    notFoundProblemJson([...routePrefixes, ...LIVENESS_PATHS, ...READINESS_PATHS])
  );
  app.use(errorProblemJson(logger));

  return app;
}
