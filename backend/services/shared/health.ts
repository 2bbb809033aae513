// backend/services/shared/health.ts

/**
 * Why:
 * - Liveness and readiness must be predictable across services and public.
 *   Orchestrators need stable URLs and a compact, machine-friendly shape.
 * - Liveness answers "is the process up?" (cheap, no dependencies).
 * - Readiness answers "can this instance take traffic?" (fast, bounded checks).
 *
 * Notes:
 * - Mount ahead of any auth gate; probes carry no credentials.
 */

import express from "express";
import { asyncHandler } from "./middleware/asyncHandler";

export type ReadinessDetails = Record<string, unknown>;
export type ReadinessFn = (
  req: express.Request
) => Promise<ReadinessDetails> | ReadinessDetails;

type Options = {
  service: string;
  env?: string;
  readiness?: ReadinessFn;
};

function getReqId(req: express.Request): string | undefined {
  const h =
    req.headers["x-request-id"] ||
    req.headers["x-correlation-id"] ||
    req.headers["x-amzn-trace-id"];
  const hdr = Array.isArray(h) ? h[0] : h;
  if (hdr) return hdr;
  return typeof req.id === "string" ? req.id : undefined;
}

/**
 * Exposes:
 *   GET /health   -> liveness
 *   GET /healthz  -> k8s-style liveness
 *   GET /readyz   -> k8s-style readiness
 */
export function createHealthRouter(opts: Options): express.Router {
  const router = express.Router();

  const base = {
    service: opts.service,
    env: opts.env ?? process.env.NODE_ENV,
  };

  const liveness = (req: express.Request, res: express.Response) => {
    res.json({ ...base, ok: true, instance: getReqId(req) });
  };

  const readiness = async (req: express.Request, res: express.Response) => {
    try {
      const details = opts.readiness ? await opts.readiness(req) : {};
      res.json({ ...base, ok: true, instance: getReqId(req), ...details });
    } catch (err) {
      res.status(503).json({
        ...base,
        ok: false,
        instance: getReqId(req),
        error: err instanceof Error ? err.message : String(err),
      });
    }
  };

  router.get("/health", liveness);
  router.get("/healthz", liveness);
  router.get("/readyz", asyncHandler(readiness));

  return router;
}
