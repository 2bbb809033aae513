// backend/services/shared/middleware/problemJson.ts

/**
 * Why:
 * - Unexpected failures leave the service as RFC 7807 Problem+JSON so clients
 *   and tests can rely on one stable shape.
 * - Expected protocol outcomes (404, 401, 405, ...) are NOT routed here; they
 *   are ordinary responses written by the handlers that own them.
 *
 * Notes:
 * - Detail stays generic for 5xx; internals are logged, not returned.
 */

import type { ErrorRequestHandler } from "express";
import { logger } from "../utils/logger";

export type ProblemJson = {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
};

function toHttpStatus(x: unknown): number {
  const n = typeof x === "number" ? x : Number(x);
  if (!Number.isFinite(n)) return 500;
  const i = Math.trunc(n);
  return i >= 400 && i <= 599 ? i : 500;
}

function statusOf(err: unknown): number {
  if (err && typeof err === "object") {
    if ("statusCode" in err) return toHttpStatus(err.statusCode);
    if ("status" in err) return toHttpStatus(err.status);
  }
  return 500;
}

export function errorProblemJson(): ErrorRequestHandler {
  return (err, req, res, next) => {
    const status = statusOf(err);
    const e = err instanceof Error ? err : null;

    logger.error(
      {
        requestId: req.id,
        status,
        path: req.path,
        method: req.method,
        error: e ? { message: e.message, stack: e.stack } : String(err),
      },
      "unhandled error in request pipeline"
    );

    const body: ProblemJson = {
      type: "about:blank",
      title: status >= 500 ? "Internal Server Error" : "Request Error",
      status,
      detail:
        status >= 500
          ? "An unexpected error occurred."
          : e?.message || "Request failed",
      instance: typeof req.id === "string" ? req.id : undefined,
    };

    if (res.headersSent) return next(err);
    res.status(status).type("application/problem+json").json(body);
  };
}
