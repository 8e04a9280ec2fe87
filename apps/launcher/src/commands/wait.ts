import { Command } from "commander";
import {
  SidecarError,
  agentPaths,
  exitWithError,
  loadLauncherConfig,
  logger,
} from "@agent-sidecar/core";
import { waitThenExec } from "../lib/wait-then-exec.js";
import { parseSeconds } from "./options.js";

const log = logger("launcher");

interface WaitOptions {
  timeout?: number;
  diagnostics: boolean;
}

export const waitCommand = new Command("wait")
  .description(
    "Wait for the agent library on the shared volume, then run the command with it preloaded",
  )
  .argument("<command...>", "Application command and its arguments")
  .option(
    "--timeout <seconds>",
    "Wait budget (default: $DT_WAIT_TIMEOUT)",
    parseSeconds,
  )
  .option("--no-diagnostics", "Skip the advisory diagnostics")
  .passThroughOptions()
  .action(async (commandLine: string[], options: WaitOptions) => {
    let exitCode: number;
    try {
      const config = loadLauncherConfig();
      const [command, ...args] = commandLine;
      if (command === undefined) {
        throw new SidecarError("LAUNCH_FAILED", "No command given");
      }

      exitCode = await waitThenExec({
        libraryPath: agentPaths.stableLibrary(
          config.volumeRoot,
          config.stage,
          config.libraryName,
        ),
        maxWaitSeconds: options.timeout ?? config.maxWaitSeconds,
        command,
        args,
        preloadVar: config.preloadVar,
        diagnostics: options.diagnostics && config.diagnostics,
      });
    } catch (error) {
      exitWithError(log, error);
    }
    process.exit(exitCode);
  });
