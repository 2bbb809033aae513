// backend/services/redfish/src/routes/redfishRoutes.ts
import { Router } from "express";
import type { ServiceRootRouter } from "../root/ServiceRootRouter";
import { serveServiceRoot } from "../controllers/redfishController";

/**
 * Catch-all: the service root decides every path (including 404s), so the
 * NotFound response carries the same protocol headers as everything else.
 */
export function createRedfishRoutes(root: ServiceRootRouter): Router {
  const router = Router();
  router.use(serveServiceRoot(root));
  return router;
}
