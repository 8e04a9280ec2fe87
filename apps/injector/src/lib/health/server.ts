/**
 * Readiness Server
 *
 * Target of the platform's startup and liveness probes. It only starts
 * listening once the installer has returned, so a 200 means the agent
 * library is published. No other state is kept.
 */

import http from "node:http";
import { SidecarError, errorMessage, logger } from "@agent-sidecar/core";

const log = logger("injector:health");

export interface HealthServerOptions {
  port: number;
  path: string;
  /** Bind address (default: all interfaces) */
  host?: string;
}

/**
 * Request handler: GET <healthPath> answers 200 "ok", anything else 404.
 * The query string is ignored. Requests are not logged.
 */
export function createHealthHandler(healthPath: string): http.RequestListener {
  return (req, res) => {
    // Match on the path alone; kubelet probes may append a query string.
    const { pathname } = new URL(req.url ?? "/", "http://localhost");

    if (req.method === "GET" && pathname === healthPath) {
      res.writeHead(200, { "Content-Type": "text/plain" });
      res.end("ok");
      return;
    }

    res.writeHead(404);
    res.end();
  };
}

/**
 * Start listening. Resolves once the socket is bound.
 *
 * @throws SidecarError BIND_FAILED when the port cannot be bound
 */
export function startHealthServer(
  options: HealthServerOptions,
): Promise<http.Server> {
  const host = options.host ?? "0.0.0.0";
  const server = http.createServer(createHealthHandler(options.path));

  return new Promise((resolve, reject) => {
    const onError = (err: Error): void => {
      server.close();
      reject(
        new SidecarError(
          "BIND_FAILED",
          `Health server failed to bind ${host}:${options.port}: ${errorMessage(err)}`,
          { cause: err },
        ),
      );
    };

    server.once("error", onError);
    server.listen(options.port, host, () => {
      server.off("error", onError);
      server.on("error", (err) => {
        log.error(`Health server error: ${err.message}`);
      });

      const address = server.address();
      const port =
        typeof address === "object" && address ? address.port : options.port;
      log.info(`Health server listening on :${port}${options.path}`);
      resolve(server);
    });
  });
}

/**
 * Stop accepting connections and wait for the server to close
 */
export function stopHealthServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeAllConnections();
  });
}
