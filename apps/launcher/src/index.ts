import { Command } from "commander";
import { logger, runProgram } from "@agent-sidecar/core";
import { waitCommand } from "./commands/wait.js";
import { statusCommand } from "./commands/status.js";

declare const __LAUNCHER_VERSION__: string;

const program = new Command();

program
  .name("agent-launcher")
  .description(
    "Start the application once the observability agent is available on the shared volume",
  )
  .version(__LAUNCHER_VERSION__)
  .enablePositionalOptions();

program.addCommand(waitCommand);
program.addCommand(statusCommand);

await runProgram(program, logger("launcher"));
