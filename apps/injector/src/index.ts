import { Command } from "commander";
import { logger, runProgram } from "@agent-sidecar/core";
import { startCommand } from "./commands/start.js";
import { installCommand } from "./commands/install.js";
import { serveCommand } from "./commands/serve.js";

declare const __INJECTOR_VERSION__: string;

const program = new Command();

program
  .name("agent-injector")
  .description(
    "Install the observability agent into a shared volume and gate sidecar readiness on it",
  )
  .version(__INJECTOR_VERSION__);

program.addCommand(startCommand, { isDefault: true });
program.addCommand(installCommand);
program.addCommand(serveCommand);

await runProgram(program, logger("injector"));
