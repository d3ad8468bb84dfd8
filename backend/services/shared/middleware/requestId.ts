// backend/services/shared/middleware/requestId.ts

/**
 * Purpose:
 * - Every inbound request carries a stable correlation key so that logs and
 *   Problem+JSON bodies can be tied together.
 *
 * Notes:
 * - Must run **before** the http logger; pino-http reuses `req.id`.
 * - Never overwrites a caller-supplied ID. A UUID is minted only if the
 *   request lacks all recognized headers.
 * - Headers honored: `x-request-id`, `x-correlation-id`, `x-amzn-trace-id`.
 *   The response always echoes `x-request-id`.
 */

import type { Request, RequestHandler } from "express";
import { randomUUID } from "crypto";

export function inboundRequestId(req: Request): string | undefined {
  return (
    req.get("x-request-id") ||
    req.get("x-correlation-id") ||
    req.get("x-amzn-trace-id") ||
    undefined
  );
}

export function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    const id = inboundRequestId(req) || randomUUID();

    req.id = id;
    res.setHeader("x-request-id", id);

    next();
  };
}
