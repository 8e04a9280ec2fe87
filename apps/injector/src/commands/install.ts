import { Command } from "commander";
import chalk from "chalk";
import { exitWithError, loadInjectorConfig, logger } from "@agent-sidecar/core";
import { install } from "../lib/installer/index.js";

const log = logger("injector");

export const installCommand = new Command("install")
  .description(
    "Extract the agent archive into the shared volume and publish the stable library path",
  )
  .option("--archive <path>", "Agent archive (default: $ZIP_PATH)")
  .action(async (options: { archive?: string }) => {
    try {
      const config = loadInjectorConfig();
      log.info(`DT_DIR=${config.volumeRoot} DT_STAGE=${config.stage}`);

      const result = await install({
        archivePath: options.archive ?? config.archivePath,
        volumeRoot: config.volumeRoot,
        stage: config.stage,
        libraryName: config.libraryName,
        lock: { timeoutMs: config.lockTimeoutMs },
      });

      if (result.extracted) {
        console.log(chalk.green(`✓ Installed ${result.libraryPath}`));
        console.log(chalk.gray(`  Source: ${result.sourcePath}`));
        console.log(chalk.gray(`  Mode: ${result.mode}`));
      } else {
        console.log(chalk.green(`✓ Already installed ${result.libraryPath}`));
      }
    } catch (error) {
      exitWithError(log, error);
    }
  });
