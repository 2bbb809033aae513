// backend/services/shared/middleware/httpLogger.ts
import pinoHttp from "pino-http";
import { randomUUID } from "crypto";
import type { IncomingMessage, ServerResponse } from "http";
import { logger } from "../utils/logger";

const PROBE_URLS = new Set(["/health", "/healthz", "/readyz", "/favicon.ico"]);

function firstHeader(v: string | string[] | undefined): string | undefined {
  return Array.isArray(v) ? v[0] : v;
}

export function makeHttpLogger(serviceName: string, listener: string) {
  return pinoHttp({
    logger,
    genReqId: (req, res) => {
      const hdr =
        firstHeader(req.headers["x-request-id"]) ||
        firstHeader(req.headers["x-correlation-id"]) ||
        firstHeader(req.headers["x-amzn-trace-id"]);
      const id = hdr || randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },
    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },
    customProps: () => ({ service: serviceName, listener }),
    autoLogging: {
      ignore: (req: IncomingMessage) => PROBE_URLS.has(req.url ?? ""),
    },
    // Headers are never serialized: the Authorization header carries credentials.
    serializers: {
      req(req: IncomingMessage) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: ServerResponse) {
        return { statusCode: res.statusCode };
      },
    },
  });
}
