// backend/services/shared/config/env.ts

/**
 * Env file loading + presence checks.
 *
 * - Values already in process.env win over the file (dotenv default); the
 *   file fills gaps, then `${VAR}` references are expanded.
 * - "Present" means non-blank after trimming, everywhere in this module.
 */

import path from "path";
import fs from "fs";
import { config as loadDotenv } from "dotenv";
import { expand } from "dotenv-expand";

function isBlank(v: string | undefined): boolean {
  return v === undefined || v.trim() === "";
}

/**
 * Load a specific env file, resolved against cwd. Throws if the path is blank,
 * the file is missing, or dotenv cannot parse it. Returns the keys the file
 * defines.
 */
export function loadEnvFromFileOrThrow(envFilePath: string): string[] {
  if (isBlank(envFilePath)) {
    throw new Error("ENV_FILE is required but was not provided.");
  }
  const resolved = path.resolve(process.cwd(), envFilePath.trim());
  if (!fs.existsSync(resolved)) {
    throw new Error(`ENV_FILE not found at: ${resolved}`);
  }

  const result = loadDotenv({ path: resolved });
  if (result.error) {
    throw new Error(`Failed to load ENV_FILE ${resolved}: ${result.error.message}`);
  }
  expand(result);
  return Object.keys(result.parsed ?? {});
}

/** Keys from `keys` that are unset or blank, in the order given. */
export function missingEnv(keys: readonly string[]): string[] {
  return keys.filter((k) => isBlank(process.env[k]));
}

export function assertRequiredEnv(keys: readonly string[]): void {
  const missing = missingEnv(keys);
  if (missing.length) {
    throw new Error(`Missing required env vars: ${missing.join(", ")}`);
  }
}

/** Require a non-blank env var; returns it trimmed. */
export function requireEnv(name: string): string {
  const v = process.env[name];
  if (v === undefined || isBlank(v)) throw new Error(`Missing required env: ${name}`);
  return v.trim();
}
