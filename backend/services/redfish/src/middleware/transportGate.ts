// backend/services/redfish/src/middleware/transportGate.ts

/**
 * Why:
 * - Each listener admits requests per its TransportPolicy before any Redfish
 *   route runs.
 *   • TLS required but the request came in cleartext -> empty 308 to https
 *     (same host + URL) so method and body survive the hop.
 *   • Credentials missing/malformed/rejected -> 401 with a Basic challenge and
 *     no body (nothing about the resource leaks).
 *
 * Notes:
 * - `req.secure` honors `trust proxy`; X-Forwarded-Proto is not read directly
 *   so an untrusted client cannot claim TLS.
 * - Denials log the reason and request id only; never the header value.
 */

import type { RequestHandler, Response } from "express";
import { asyncHandler } from "../../../shared/middleware/asyncHandler";
import { logger } from "../../../shared/utils/logger";
import type { Authenticator } from "../security/Authenticator";
import {
  evaluateTransport,
  type TransportPolicy,
} from "../policy/TransportPolicy";
import { PROTOCOL_HEADERS } from "../root/headers";

export interface TransportGateOptions {
  policy: TransportPolicy;
  authenticator?: Authenticator;
  /** Realm advertised in the Basic challenge. Must not contain quotes. */
  realm: string;
}

export function basicChallenge(realm: string): string {
  return `Basic realm="${realm}", charset="UTF-8"`;
}

export function transportGate(opts: TransportGateOptions): RequestHandler {
  const { policy, authenticator, realm } = opts;
  if (policy.requiresAuth && !authenticator) {
    throw new Error("transportGate: policy requires auth but no authenticator was provided");
  }
  const challenge = basicChallenge(realm);

  return asyncHandler(async (req, res, next) => {
    const decision = await evaluateTransport(
      policy,
      { secure: req.secure, authorization: req.get("authorization") },
      authenticator
    );
    if (decision.allow) return next();

    logger.warn(
      { requestId: req.id, reason: decision.reason, method: req.method, path: req.path },
      "transport policy denied request"
    );

    if (decision.reason === "TLS_REQUIRED") {
      const host = req.get("host");
      if (!host) return empty(res, 400);
      return empty(res, 308, { Location: `https://${host}${req.originalUrl}` });
    }

    return empty(res, 401, { "WWW-Authenticate": challenge });
  });
}

function empty(
  res: Response,
  status: number,
  extra: Record<string, string> = {}
): void {
  res
    .status(status)
    .set({ ...PROTOCOL_HEADERS, ...extra, "Content-Length": "0" })
    .end();
}
