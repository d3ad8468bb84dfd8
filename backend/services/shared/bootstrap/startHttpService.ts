// backend/services/shared/bootstrap/startHttpService.ts

/**
 * Purpose:
 * - Bind, harden socket timeouts, log where the server landed (port 0 in
 *   tests), and shut down cleanly on SIGINT/SIGTERM.
 *
 * Notes:
 * - Signal handlers are attached with `process.once` and removed by `stop`.
 * - `onShutdown` runs after the server closes (e.g. disconnect the store).
 */

import type { Express } from "express";
import type { Server } from "http";
import type { ILogger } from "../utils/logger";

export interface StartHttpServiceOptions {
  app: Express;
  /** Allow 0 in tests to get an ephemeral port. */
  port: number;
  serviceName: string;
  logger: ILogger;
  onShutdown?: () => Promise<void>;
}

export interface StartedService {
  server: Server;
  stop: () => Promise<void>;
}

export function startHttpService(
  opts: StartHttpServiceOptions
): StartedService {
  const { app, port, serviceName, logger, onShutdown } = opts;

  const server = app.listen(port, () => {
    const addr = server.address();
    const boundPort = addr && typeof addr === "object" ? addr.port : port;
    logger.info({ service: serviceName, port: boundPort }, "service listening");
  });

  // headersTimeout must stay above keepAliveTimeout
  server.keepAliveTimeout = 7_000;
  server.headersTimeout = 9_000;

  server.on("error", (err) => {
    logger.error({ err, service: serviceName }, "http server error");
    process.exit(1);
  });

  const onSigterm = () => shutdown("SIGTERM");
  const onSigint = () => shutdown("SIGINT");

  /** Closes the server and detaches the signal handlers; runs no onShutdown. */
  const stop = () =>
    new Promise<void>((resolve, reject) => {
      process.off("SIGTERM", onSigterm);
      process.off("SIGINT", onSigint);
      server.close((err) => (err ? reject(err) : resolve()));
    });

  const shutdown = (signal: string) => {
    logger.info({ signal, service: serviceName }, "shutting down service");
    void stop()
      .then(() => onShutdown?.())
      .then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err, service: serviceName }, "shutdown failed");
          process.exit(1);
        }
      );
    // Fail-safe in case close hangs
    setTimeout(() => process.exit(1), 10_000).unref();
  };

  process.once("SIGTERM", onSigterm);
  process.once("SIGINT", onSigint);

  return { server, stop };
}
