// backend/services/redfish/src/config.ts

/**
 * Listener + credential config, validated once at startup.
 *
 * Env:
 *   REDFISH_BIND_HOST        default 0.0.0.0
 *   REDFISH_HTTP_PORT        plain listener (no TLS, no auth)
 *   REDFISH_HTTPS_PORT       TLS listener (Basic auth on every request)
 *   REDFISH_TLS_CERT_FILE    \
 *   REDFISH_TLS_KEY_FILE      | required with REDFISH_HTTPS_PORT
 *   REDFISH_BASIC_USER        |
 *   REDFISH_BASIC_PASSWORD   /
 *   REDFISH_AUTH_REALM       default "Redfish"
 *   REDFISH_TRUST_PROXY      true|false|1|0, default false
 *
 * Blank values count as unset. Every problem is reported in one error.
 */

import { z } from "zod";
import {
  PLAIN_HTTP_POLICY,
  TLS_BASIC_AUTH_POLICY,
  type TransportPolicy,
} from "./policy/TransportPolicy";
import type { Credentials } from "./security/basicCredentials";

export const DEFAULT_BIND_HOST = "0.0.0.0";
export const DEFAULT_AUTH_REALM = "Redfish";

export type ListenerName = "http" | "https";

export interface ListenerConfig {
  readonly name: ListenerName;
  readonly host: string;
  readonly port: number;
  readonly policy: TransportPolicy;
  readonly tls?: { readonly certFile: string; readonly keyFile: string };
}

export interface RedfishConfig {
  readonly listeners: readonly ListenerConfig[];
  readonly credentials?: Credentials;
  readonly authRealm: string;
  readonly trustProxy: boolean;
}

const blankAsUndefined = (v: unknown) =>
  typeof v === "string" && v.trim() === "" ? undefined : v;

const zText = z.preprocess(blankAsUndefined, z.string().trim().optional());
// Passwords are taken as-is; surrounding whitespace may be intentional.
const zSecret = z.preprocess(blankAsUndefined, z.string().optional());
const zPort = z.preprocess(
  blankAsUndefined,
  z.coerce.number().int().min(0).max(65535).optional()
);
const zFlag = z.preprocess(
  (v) => (typeof v === "string" ? blankAsUndefined(v.trim().toLowerCase()) : v),
  z.enum(["true", "false", "1", "0"]).optional()
);
const zRealm = z.preprocess(
  blankAsUndefined,
  z
    .string()
    .trim()
    .regex(/^[^"\\\r\n]+$/, "must not contain quotes, backslashes or newlines")
    .optional()
);

const zRedfishEnv = z
  .object({
    REDFISH_BIND_HOST: zText,
    REDFISH_HTTP_PORT: zPort,
    REDFISH_HTTPS_PORT: zPort,
    REDFISH_TLS_CERT_FILE: zText,
    REDFISH_TLS_KEY_FILE: zText,
    REDFISH_BASIC_USER: zText,
    REDFISH_BASIC_PASSWORD: zSecret,
    REDFISH_AUTH_REALM: zRealm,
    REDFISH_TRUST_PROXY: zFlag,
  })
  .transform((env, ctx): RedfishConfig => {
    const issue = (key: keyof typeof env, message: string) =>
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message });

    const host = env.REDFISH_BIND_HOST ?? DEFAULT_BIND_HOST;
    const httpPort = env.REDFISH_HTTP_PORT;
    const httpsPort = env.REDFISH_HTTPS_PORT;
    const listeners: ListenerConfig[] = [];
    let credentials: Credentials | undefined;

    if (httpPort === undefined && httpsPort === undefined) {
      issue(
        "REDFISH_HTTP_PORT",
        "at least one of REDFISH_HTTP_PORT or REDFISH_HTTPS_PORT must be set"
      );
    }
    if (
      httpPort !== undefined &&
      httpsPort !== undefined &&
      httpPort !== 0 &&
      httpPort === httpsPort
    ) {
      issue("REDFISH_HTTPS_PORT", "must differ from REDFISH_HTTP_PORT");
    }

    if (
      httpsPort === undefined &&
      (env.REDFISH_BASIC_USER !== undefined ||
        env.REDFISH_BASIC_PASSWORD !== undefined)
    ) {
      // Credentials are never accepted over cleartext.
      issue(
        "REDFISH_BASIC_USER",
        "Basic credentials require the TLS listener (set REDFISH_HTTPS_PORT)"
      );
    }

    if (httpPort !== undefined) {
      listeners.push({ name: "http", host, port: httpPort, policy: PLAIN_HTTP_POLICY });
    }

    if (httpsPort !== undefined) {
      const {
        REDFISH_TLS_CERT_FILE: certFile,
        REDFISH_TLS_KEY_FILE: keyFile,
        REDFISH_BASIC_USER: username,
        REDFISH_BASIC_PASSWORD: password,
      } = env;
      const required = "required when REDFISH_HTTPS_PORT is set";
      if (!certFile) issue("REDFISH_TLS_CERT_FILE", required);
      if (!keyFile) issue("REDFISH_TLS_KEY_FILE", required);
      if (!username) issue("REDFISH_BASIC_USER", required);
      if (password === undefined) issue("REDFISH_BASIC_PASSWORD", required);

      if (certFile && keyFile && username && password !== undefined) {
        credentials = { username, password };
        listeners.push({
          name: "https",
          host,
          port: httpsPort,
          policy: TLS_BASIC_AUTH_POLICY,
          tls: { certFile, keyFile },
        });
      }
    }

    return {
      listeners,
      ...(credentials ? { credentials } : {}),
      authRealm: env.REDFISH_AUTH_REALM ?? DEFAULT_AUTH_REALM,
      trustProxy:
        env.REDFISH_TRUST_PROXY === "true" || env.REDFISH_TRUST_PROXY === "1",
    };
  });

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RedfishConfig {
  const parsed = zRedfishEnv.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new Error(`[redfish] invalid configuration: ${details}`);
  }
  return parsed.data;
}
