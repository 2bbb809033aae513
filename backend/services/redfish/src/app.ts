// backend/services/redfish/src/app.ts
import express, { type Express } from "express";

import { makeHttpLogger } from "../../shared/middleware/httpLogger";
import { errorProblemJson } from "../../shared/middleware/problemJson";
import { createHealthRouter } from "../../shared/health";
import { SERVICE_NAME } from "./bootstrap";
import type { TransportPolicy } from "./policy/TransportPolicy";
import type { Authenticator } from "./security/Authenticator";
import type { ServiceRootRouter } from "./root/ServiceRootRouter";
import { transportGate } from "./middleware/transportGate";
import { createRedfishRoutes } from "./routes/redfishRoutes";

export interface RedfishAppOptions {
  /** Listener identity for logs ("http" | "https"). */
  listenerName: string;
  policy: TransportPolicy;
  /** Shared across listeners; documents are built once per process. */
  root: ServiceRootRouter;
  authenticator?: Authenticator;
  authRealm: string;
  trustProxy: boolean;
}

/** One app per listener; the only difference between them is the policy. */
export function createApp(opts: RedfishAppOptions): Express {
  const app = express();

  // Hardening & basics
  app.disable("x-powered-by");
  app.disable("etag");
  app.set("trust proxy", opts.trustProxy);

  // Request logging
  app.use(makeHttpLogger(SERVICE_NAME, opts.listenerName));

  // Health endpoints (ahead of the gate; probes carry no credentials)
  app.use(
    createHealthRouter({
      service: SERVICE_NAME,
      readiness: () => ({ listener: opts.listenerName }),
    })
  );

  app.use(
    transportGate({
      policy: opts.policy,
      authenticator: opts.authenticator,
      realm: opts.authRealm,
    })
  );

  // Service root owns every remaining path, 404s included.
  app.use(createRedfishRoutes(opts.root));

  app.use(errorProblemJson());

  return app;
}
