// backend/services/shared/health.ts
import { Router, type Request, type Response } from "express";

export type ReadinessDetails = Record<string, unknown>;
export type ReadinessFn = () => Promise<ReadinessDetails> | ReadinessDetails;

export const LIVENESS_PATHS = ["/health", "/health/live", "/healthz", "/live"];
export const READINESS_PATHS = ["/health/ready", "/readyz", "/ready"];

/**
 * Liveness always answers 200. Readiness merges the details from `readiness`
 * into the body, or answers 503 with the error message when it throws.
 */
export function createHealthRouter(service: string, readiness?: ReadinessFn): Router {
  const router = Router();
  const stamp = (req: Request) => ({
    service,
    instance: typeof req.id === "string" ? req.id : undefined,
  });

  const live = (req: Request, res: Response) => {
    res.json({ ...stamp(req), ok: true });
  };

  const ready = async (req: Request, res: Response) => {
    try {
      const details = readiness ? await readiness() : {};
      res.json({ ...stamp(req), ok: true, ...details });
    } catch (err) {
      res.status(503).json({
        ...stamp(req),
        ok: false,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  };

  for (const p of LIVENESS_PATHS) router.get(p, live);
  for (const p of READINESS_PATHS) router.get(p, ready);
  return router;
}
