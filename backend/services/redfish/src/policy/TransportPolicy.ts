// backend/services/redfish/src/policy/TransportPolicy.ts

/**
 * Per-listener admission rules.
 *
 * - Plain HTTP: no TLS, no credentials.
 * - TLS listener: TLS and HTTP Basic credentials on every request.
 *
 * `evaluateTransport` is the pure decision; the Express gate maps a denial to
 * a redirect (TLS) or a 401 challenge (credentials).
 */

import type { Authenticator } from "../security/Authenticator";
import { parseBasicAuthorization } from "../security/basicCredentials";

export interface TransportPolicy {
  readonly requiresTLS: boolean;
  readonly requiresAuth: boolean;
}

export const PLAIN_HTTP_POLICY: TransportPolicy = Object.freeze({
  requiresTLS: false,
  requiresAuth: false,
});

export const TLS_BASIC_AUTH_POLICY: TransportPolicy = Object.freeze({
  requiresTLS: true,
  requiresAuth: true,
});

export interface TransportFacts {
  /** Request arrived over TLS (directly, or via a trusted proxy). */
  secure: boolean;
  authorization?: string;
}

export type DenyReason =
  | "TLS_REQUIRED"
  | "CREDENTIALS_MISSING"
  | "CREDENTIALS_MALFORMED"
  | "CREDENTIALS_REJECTED";

export type TransportDecision =
  | { allow: true }
  | { allow: false; reason: DenyReason };

export async function evaluateTransport(
  policy: TransportPolicy,
  facts: TransportFacts,
  authenticator?: Authenticator
): Promise<TransportDecision> {
  if (policy.requiresTLS && !facts.secure) {
    return { allow: false, reason: "TLS_REQUIRED" };
  }
  if (!policy.requiresAuth) return { allow: true };

  if (!authenticator) {
    throw new Error("evaluateTransport: policy requires auth but no authenticator is configured");
  }

  const parsed = parseBasicAuthorization(facts.authorization);
  if (!parsed.ok) {
    return {
      allow: false,
      reason:
        parsed.reason === "missing"
          ? "CREDENTIALS_MISSING"
          : "CREDENTIALS_MALFORMED",
    };
  }

  const accepted = await authenticator.verify(parsed.credentials);
  return accepted
    ? { allow: true }
    : { allow: false, reason: "CREDENTIALS_REJECTED" };
}
