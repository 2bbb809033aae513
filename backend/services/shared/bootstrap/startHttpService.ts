// backend/services/shared/bootstrap/startHttpService.ts

/**
 * Why:
 * - Starting/stopping a listener is a single concern: bind (plain or TLS),
 *   harden socket timeouts, log where it landed (port 0 in tests), and shut
 *   down cleanly.
 * - Higher-level bootstraps (env load, logger init, app assembly) call this;
 *   this file never loads envs and never installs signal handlers, because a
 *   process may own several listeners and must stop them together.
 *
 * Notes:
 * - `listening` rejects on bind failure (EADDRINUSE, EACCES); callers decide
 *   whether that is fatal.
 * - `stop()` waits for a pending bind to settle, then closes if it bound.
 * - Keep-alive + header timeout hardening (headersTimeout > keepAliveTimeout).
 */

import http from "node:http";
import https from "node:https";
import type { Express } from "express";

type PinoLike = {
  info: (o: object, m?: string) => void;
  error: (o: object, m?: string) => void;
};

export interface TlsMaterial {
  key: string | Buffer;
  cert: string | Buffer;
}

export interface StartHttpServiceOptions {
  app: Express;
  /** Allow 0 in tests to get an ephemeral port. */
  port: number;
  host?: string;
  /** Service identity for logs. */
  serviceName: string;
  /** Listener identity for logs (e.g., "http", "https"). */
  listenerName: string;
  logger: PinoLike;
  /** When present, the listener terminates TLS itself. */
  tls?: TlsMaterial;
}

export interface StartedService {
  server: http.Server;
  listenerName: string;
  /** Resolves with the bound port once the socket is listening. */
  listening: Promise<number>;
  stop: () => Promise<void>;
}

export function startHttpService(
  opts: StartHttpServiceOptions
): StartedService {
  const { app, port, host, serviceName, listenerName, logger, tls } = opts;

  const server: http.Server = tls
    ? https.createServer({ key: tls.key, cert: tls.cert }, app)
    : http.createServer(app);

  // Socket hardening (maintain headersTimeout > keepAliveTimeout)
  server.keepAliveTimeout = 7_000;
  server.headersTimeout = 9_000;

  const listening = new Promise<number>((resolve, reject) => {
    const onBindError = (err: Error) => {
      logger.error(
        { err, service: serviceName, listener: listenerName, port },
        "listener failed to bind"
      );
      reject(err);
    };
    server.once("error", onBindError);

    server.listen(port, host, () => {
      server.off("error", onBindError);
      server.on("error", (err) => {
        logger.error(
          { err, service: serviceName, listener: listenerName },
          "http server error"
        );
      });

      const addr = server.address();
      const boundPort = addr && typeof addr === "object" ? addr.port : port;
      logger.info(
        {
          service: serviceName,
          listener: listenerName,
          port: boundPort,
          tls: !!tls,
        },
        "service listening"
      );
      resolve(boundPort);
    });
  });

  const stop = async (): Promise<void> => {
    // listen() may still be in flight; let it settle so a pending bind is
    // closed instead of skipped.
    const bound = await listening.then(
      () => true,
      () => false
    );
    if (!bound || !server.listening) return;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeIdleConnections();
    });
  };

  return { server, listenerName, listening, stop };
}
