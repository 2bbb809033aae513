// backend/services/redfish/src/controllers/redfishController.ts
import type { Request, Response } from "express";
import type { ServiceRootRouter } from "../root/ServiceRootRouter";

/**
 * Copies the router's decision onto the wire verbatim. The body is written
 * with res.end (not res.send) so Express adds no charset, ETag or freshness
 * handling; Node drops the body itself for HEAD.
 */
export function serveServiceRoot(root: ServiceRootRouter) {
  return (req: Request, res: Response): void => {
    const out = root.handle({
      method: req.method,
      path: req.path,
      odataVersion: req.get("odata-version"),
    });

    res.status(out.status);
    for (const [name, value] of Object.entries(out.headers)) {
      res.setHeader(name, value);
    }
    res.end(out.body);
  };
}
