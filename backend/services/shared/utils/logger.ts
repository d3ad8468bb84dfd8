// backend/services/shared/utils/logger.ts
import type { Request } from "express";
import pino, { type LoggerOptions, type LevelWithSilent } from "pino";
import { isLogLevel } from "./logLevel";

// ─────────────────────────── Env (fail fast for required) ─────────────────────
function requireLevel(): LevelWithSilent {
  const raw = (process.env.LOG_LEVEL || "").trim();
  if (!raw) throw new Error("Missing required env var: LOG_LEVEL");
  if (!isLogLevel(raw)) throw new Error(`Invalid LOG_LEVEL: "${raw}"`);
  return raw;
}

const SERVICE_NAME = process.env.SERVICE_NAME?.trim();

// ─────────────────────────────── Logging port ─────────────────────────────────
export type LogFn = (obj: Record<string, unknown>, msg?: string) => void;

/**
 * Minimal structured logger contract handed to controllers and stores.
 * The pino root logger satisfies it; tests pass a capturing fake.
 */
export interface ILogger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

// ────────────────────────────── Pino (stdout only) ────────────────────────────
const pinoOptions: LoggerOptions = {
  level: requireLevel(),
  base: SERVICE_NAME ? { service: SERVICE_NAME } : undefined,
  redact: {
    remove: true,
    paths: [
      "req.headers.authorization",
      "req.headers.cookie",
      "req.headers['x-api-key']",
      "res.headers['set-cookie']",
    ],
  },
};
export const logger = pino(pinoOptions);

// ───────────────────────────── Request context helper ─────────────────────────
export function extractLogContext(req: Request): Record<string, unknown> {
  const hdrId =
    req.get("x-request-id") ||
    req.get("x-correlation-id") ||
    req.get("x-amzn-trace-id");
  return {
    requestId: typeof req.id === "string" ? req.id : hdrId || null,
    path: req.originalUrl,
    method: req.method,
    entityId: req.params?.id,
    ip: req.ip,
    service: SERVICE_NAME,
  };
}
