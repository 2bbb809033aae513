// backend/services/redfish/src/server.ts

/**
 * Why:
 * - A process runs up to two listeners (plain HTTP, TLS+Basic) over the same
 *   service root. Documents and the authenticator are built once and shared;
 *   each listener gets its own app so its policy cannot leak to the other.
 * - TLS material for all listeners is read before any of them starts.
 * - If any listener fails to bind, the ones that did bind are stopped before
 *   the error propagates.
 */

import fs from "fs";
import {
  startHttpService,
  type StartedService,
  type TlsMaterial,
} from "../../shared/bootstrap/startHttpService";
import { logger } from "../../shared/utils/logger";
import { createApp } from "./app";
import { SERVICE_NAME } from "./bootstrap";
import type { ListenerConfig, ListenerName, RedfishConfig } from "./config";
import { buildServiceRootDocuments } from "./root/documents";
import { ServiceRootRouter } from "./root/ServiceRootRouter";
import {
  StaticCredentialAuthenticator,
  type Authenticator,
} from "./security/Authenticator";

export interface BoundListener {
  readonly name: ListenerName;
  readonly port: number;
  readonly started: StartedService;
}

export interface RunningRedfishService {
  readonly listeners: readonly BoundListener[];
  stop(): Promise<void>;
}

export interface RedfishServiceDeps {
  /** Overrides the authenticator built from configured credentials. */
  authenticator?: Authenticator;
  readTlsMaterial?: (tls: NonNullable<ListenerConfig["tls"]>) => TlsMaterial;
}

function readTlsFromFiles(tls: NonNullable<ListenerConfig["tls"]>): TlsMaterial {
  return {
    cert: fs.readFileSync(tls.certFile),
    key: fs.readFileSync(tls.keyFile),
  };
}

export async function startRedfishService(
  config: RedfishConfig,
  deps: RedfishServiceDeps = {}
): Promise<RunningRedfishService> {
  const root = new ServiceRootRouter(buildServiceRootDocuments());
  const authenticator =
    deps.authenticator ??
    (config.credentials
      ? new StaticCredentialAuthenticator(config.credentials)
      : undefined);
  const readTls = deps.readTlsMaterial ?? readTlsFromFiles;

  // Read every key/cert before any socket opens; a missing file must not
  // leave an earlier listener bound.
  const plans = config.listeners.map((cfg) => ({
    cfg,
    tls: cfg.tls ? readTls(cfg.tls) : undefined,
  }));

  const started: { cfg: ListenerConfig; svc: StartedService }[] = [];
  const stopAll = async () => {
    await Promise.all(started.map(({ svc }) => svc.stop()));
  };

  try {
    for (const { cfg, tls } of plans) {
      const app = createApp({
        listenerName: cfg.name,
        policy: cfg.policy,
        root,
        authenticator,
        authRealm: config.authRealm,
        trustProxy: config.trustProxy,
      });
      const svc = startHttpService({
        app,
        port: cfg.port,
        host: cfg.host,
        serviceName: SERVICE_NAME,
        listenerName: cfg.name,
        logger,
        tls,
      });
      started.push({ cfg, svc });
    }

    // Settle every bind before deciding, so none is left half-started.
    const results = await Promise.allSettled(
      started.map(({ svc }) => svc.listening)
    );
    const ports: number[] = [];
    for (const r of results) {
      if (r.status === "rejected") throw r.reason;
      ports.push(r.value);
    }

    return {
      listeners: started.map(({ cfg, svc }, i) => ({
        name: cfg.name,
        port: ports[i],
        started: svc,
      })),
      stop: stopAll,
    };
  } catch (err) {
    await stopAll();
    throw err;
  }
}
