// backend/services/shared/utils/logger.ts
import pino, {
  type Logger,
  type LoggerOptions,
  type LevelWithSilent,
  stdTimeFunctions,
} from "pino";
import { requireEnv } from "../config/env";

/**
 * Shared process logger.
 *
 * Each service calls `initLogger(SERVICE_NAME)` at bootstrap BEFORE creating
 * request loggers (pino-http captures the instance it is given).
 *
 * Runtime controls:
 * - LOG_LEVEL = fatal | error | warn | info | debug | trace | silent (required)
 */

const validLevels = new Set<string>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

function isLevel(v: string): v is LevelWithSilent {
  return validLevels.has(v);
}

const rawLevel = requireEnv("LOG_LEVEL");
if (!isLevel(rawLevel)) throw new Error(`Invalid LOG_LEVEL: "${rawLevel}"`);
const LOG_LEVEL: LevelWithSilent = rawLevel;

// NOTE: No "service" in base until initLogger() runs; avoids stamping "unknown".
let SERVICE_NAME = "";

const pinoOptions: LoggerOptions = {
  level: LOG_LEVEL,
  base: {},
  timestamp: stdTimeFunctions.isoTime,
  redact: {
    remove: true,
    paths: [
      "req.headers.authorization",
      "req.headers.cookie",
      "headers.authorization",
    ],
  },
};

export let logger: Logger = pino(pinoOptions);

/** Initialize the shared logger for this running service. Call once at bootstrap. */
export function initLogger(serviceName: string): void {
  SERVICE_NAME = String(serviceName || "").trim();
  if (!SERVICE_NAME) throw new Error("initLogger requires serviceName");
  logger = pino({ ...pinoOptions, base: { service: SERVICE_NAME } });
}

export function currentServiceName(): string {
  return SERVICE_NAME || "uninitialized";
}
