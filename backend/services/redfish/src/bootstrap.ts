// backend/services/redfish/src/bootstrap.ts
import {
  loadEnvFromFileOrThrow,
  assertRequiredEnv,
} from "../../shared/config/env";

// ── Service identity ─────────────────────────────────────────────────────────
export const SERVICE_NAME = "redfish" as const;

/**
 * Load ENV_FILE (if set) into process.env, then assert what must exist before
 * any module that reads env at import time (the logger) is loaded.
 */
export function loadServiceEnv(): void {
  const envFile = process.env.ENV_FILE?.trim();
  if (envFile) {
    console.log(`[bootstrap] [${SERVICE_NAME}] Loading env from ${envFile}`);
    loadEnvFromFileOrThrow(envFile);
  }
  assertRequiredEnv(["LOG_LEVEL"]);
}
