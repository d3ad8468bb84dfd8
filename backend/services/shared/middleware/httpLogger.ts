// backend/services/shared/middleware/httpLogger.ts
import pinoHttp from "pino-http";
import { randomUUID } from "crypto";
import type { IncomingMessage, ServerResponse } from "http";
import { logger } from "../utils/logger";
import { LIVENESS_PATHS, READINESS_PATHS } from "../health";

const QUIET_PATHS = new Set([
  ...LIVENESS_PATHS,
  ...READINESS_PATHS,
  "/favicon.ico",
]);

export function makeHttpLogger(serviceName: string) {
  return pinoHttp({
    logger,
    // requestIdMiddleware normally runs first and has already set req.id
    genReqId: (req: IncomingMessage, res: ServerResponse) => {
      if (typeof req.id === "string" && req.id) return req.id;
      const id = randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },
    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },
    customProps: () => ({ service: serviceName }),
    autoLogging: {
      ignore: (req: IncomingMessage) => QUIET_PATHS.has(req.url ?? ""),
    },
    serializers: {
      req(req: IncomingMessage) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: ServerResponse) {
        return { statusCode: res.statusCode };
      },
    },
  });
}
