import { Command } from "commander";
import chalk from "chalk";
import {
  agentPaths,
  exitWithError,
  loadLauncherConfig,
  logger,
} from "@agent-sidecar/core";
import { PollingArtifactWatcher } from "../lib/watcher.js";

const log = logger("launcher");

export const statusCommand = new Command("status")
  .description(
    "Check whether the agent library is published (usable as an exec probe)",
  )
  .action(async () => {
    let libraryPath: string;
    let published: boolean;
    try {
      const config = loadLauncherConfig();
      libraryPath = agentPaths.stableLibrary(
        config.volumeRoot,
        config.stage,
        config.libraryName,
      );
      published = await new PollingArtifactWatcher({
        path: libraryPath,
      }).published();
    } catch (error) {
      exitWithError(log, error);
    }

    if (!published) {
      console.log(chalk.red(`✗ Not published: ${libraryPath}`));
      process.exit(1);
    }
    console.log(chalk.green(`✓ Published: ${libraryPath}`));
  });
