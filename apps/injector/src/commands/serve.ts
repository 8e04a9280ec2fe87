import { Command } from "commander";
import { exitWithError, loadInjectorConfig, logger } from "@agent-sidecar/core";
import { startHealthServer, stopHealthServer } from "../lib/health/server.js";
import { setupSignalHandlers } from "../lib/runner/signals.js";
import { parseHealthPath, parsePort, type ServeOptions } from "./options.js";

const log = logger("injector");

export const serveCommand = new Command("serve")
  .description("Serve the readiness probe only (no install)")
  .option("--port <port>", "Health port (default: $HEALTH_PORT)", parsePort)
  .option(
    "--path <path>",
    "Health path (default: $HEALTH_PATH)",
    parseHealthPath,
  )
  .action(async (options: ServeOptions) => {
    try {
      const config = loadInjectorConfig();
      const server = await startHealthServer({
        port: options.port ?? config.healthPort,
        path: options.path ?? config.healthPath,
      });

      setupSignalHandlers({
        onShutdown: () => {
          stopHealthServer(server).then(
            () => process.exit(0),
            (err: unknown) => exitWithError(log, err),
          );
        },
      });
    } catch (error) {
      exitWithError(log, error);
    }
  });
