// backend/services/shared/middleware/problemJson.ts

/**
 * Purpose:
 * - Standardize error responses as RFC 7807 Problem+JSON so clients/tests
 *   can rely on a stable shape.
 * - 404s are formatted as Problem+JSON only under known prefixes; static or
 *   probe noise gets a bare 404.
 *
 * Notes:
 * - Transport-level formatting, not business logic.
 * - Error detail is kept minimal; 5xx never echo the raw message in production.
 */

import type { ErrorRequestHandler, Request, RequestHandler } from "express";
import { extractLogContext, logger, type ILogger } from "../utils/logger";

const IS_PROD = String(process.env.NODE_ENV || "").trim() === "production";

function instanceOf(req: Request): string | undefined {
  return typeof req.id === "string" ? req.id : undefined;
}

/** Reads an HTTP status off anything thrown; body-parser sets `status`. */
export function statusOfError(err: unknown): number {
  if (typeof err !== "object" || err === null) return 500;
  const raw =
    "statusCode" in err && err.statusCode != null
      ? err.statusCode
      : "status" in err
        ? err.status
        : undefined;
  const n = Number(raw);
  return Number.isInteger(n) && n >= 400 && n <= 599 ? n : 500;
}

export function notFoundProblemJson(validPrefixes: string[]): RequestHandler {
  return (req, res) => {
    if (validPrefixes.some((p) => req.path.startsWith(p))) {
      res
        .status(404)
        .type("application/problem+json")
        .json({
          type: "about:blank",
          title: "Not Found",
          status: 404,
          detail: "Route not found",
          instance: instanceOf(req),
        });
      return;
    }
    res.status(404).end();
  };
}

export function errorProblemJson(log: ILogger = logger): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    const status = statusOfError(err);
    const message = err instanceof Error ? err.message : String(err);

    log.error(
      { ...extractLogContext(req), status, err },
      "request error"
    );

    const detail =
      status >= 500 && IS_PROD ? "Unexpected error" : message || "Unexpected error";

    res
      .status(status)
      .type("application/problem+json")
      .json({
        type: "about:blank",
        title: status >= 500 ? "Internal Server Error" : "Request Error",
        status,
        detail,
        instance: instanceOf(req),
      });
  };
}
