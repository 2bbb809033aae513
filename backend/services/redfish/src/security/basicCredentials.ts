// backend/services/redfish/src/security/basicCredentials.ts

/**
 * Parse an `Authorization: Basic <base64(user:pass)>` header.
 *
 * - Scheme match is case-insensitive.
 * - Payload must be canonical base64; anything else is malformed rather than
 *   silently decoded (Buffer.from is lenient).
 * - Split on the first ":"; passwords may contain colons.
 */

export interface Credentials {
  readonly username: string;
  readonly password: string;
}

export type BasicParseResult =
  | { ok: true; credentials: Credentials }
  | { ok: false; reason: "missing" | "malformed" };

const BASIC_SCHEME = /^basic$/i;
const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function parseBasicAuthorization(
  header: string | undefined
): BasicParseResult {
  if (header === undefined || header.trim() === "") {
    return { ok: false, reason: "missing" };
  }

  const [scheme, payload, ...rest] = header.trim().split(/\s+/);
  if (!BASIC_SCHEME.test(scheme) || !payload || rest.length > 0) {
    return { ok: false, reason: "malformed" };
  }
  if (!BASE64.test(payload)) return { ok: false, reason: "malformed" };

  const decoded = Buffer.from(payload, "base64").toString("utf8");
  const sep = decoded.indexOf(":");
  if (sep < 0) return { ok: false, reason: "malformed" };

  return {
    ok: true,
    credentials: {
      username: decoded.slice(0, sep),
      password: decoded.slice(sep + 1),
    },
  };
}

export function encodeBasicAuthorization(creds: Credentials): string {
  return `Basic ${Buffer.from(`${creds.username}:${creds.password}`, "utf8").toString("base64")}`;
}
