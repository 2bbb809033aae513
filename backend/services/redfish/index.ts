// backend/services/redfish/index.ts
/**
 * Service: redfish
 * -----------------------------------------------------------------------------
 * WHY:
 * - Env first, logger second: the shared logger reads LOG_LEVEL at import
 *   time, so everything that pulls it in is loaded after loadServiceEnv().
 * - This file owns the signal handlers; listeners are stopped together.
 */

import { loadServiceEnv, SERVICE_NAME } from "./src/bootstrap";
import { loadConfig } from "./src/config";

const SHUTDOWN_GRACE_MS = 10_000;

async function main(): Promise<void> {
  loadServiceEnv();

  const log = await import("../shared/utils/logger");
  log.initLogger(SERVICE_NAME);

  const config = loadConfig();
  const { startRedfishService } = await import("./src/server");
  const service = await startRedfishService(config);

  log.logger.info(
    {
      listeners: service.listeners.map(({ name, port }) => ({ name, port })),
      trustProxy: config.trustProxy,
    },
    "redfish service ready"
  );

  const shutdown = (signal: NodeJS.Signals) => {
    log.logger.info({ signal }, "shutting down");
    setTimeout(() => process.exit(1), SHUTDOWN_GRACE_MS).unref();
    service.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        log.logger.error({ err }, "shutdown failed");
        process.exit(1);
      }
    );
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  console.error(`[${SERVICE_NAME}] startup failed:`, err);
  process.exit(1);
});
