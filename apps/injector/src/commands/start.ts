import { Command } from "commander";
import { exitWithError, loadInjectorConfig, logger } from "@agent-sidecar/core";
import { install } from "../lib/installer/index.js";
import { startHealthServer, stopHealthServer } from "../lib/health/server.js";
import { setupSignalHandlers } from "../lib/runner/signals.js";
import { parseHealthPath, parsePort, type ServeOptions } from "./options.js";

const log = logger("injector");

export const startCommand = new Command("start")
  .description(
    "Install the agent, then serve the readiness probe (sidecar entrypoint)",
  )
  .option("--archive <path>", "Agent archive (default: $ZIP_PATH)")
  .option("--port <port>", "Health port (default: $HEALTH_PORT)", parsePort)
  .option(
    "--path <path>",
    "Health path (default: $HEALTH_PATH)",
    parseHealthPath,
  )
  .action(async (options: ServeOptions & { archive?: string }) => {
    try {
      const config = loadInjectorConfig();
      log.info(`DT_DIR=${config.volumeRoot} DT_STAGE=${config.stage}`);

      // Readiness must not be reported before the library is published:
      // any install failure exits here, before a socket is opened.
      await install({
        archivePath: options.archive ?? config.archivePath,
        volumeRoot: config.volumeRoot,
        stage: config.stage,
        libraryName: config.libraryName,
        lock: { timeoutMs: config.lockTimeoutMs },
      });

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
