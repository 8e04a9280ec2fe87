/**
 * Supervised launch
 *
 * Node.js cannot replace its own process image, so the application runs as
 * a child with inherited stdio and the launcher stays in front of it:
 * termination signals are forwarded and the child's exit status becomes
 * the launcher's.
 */

import { spawn } from "node:child_process";
import os from "node:os";
import { SidecarError, errorMessage, logger } from "@agent-sidecar/core";

const log = logger("launcher");

export const FORWARDED_SIGNALS = [
  "SIGINT",
  "SIGTERM",
  "SIGHUP",
  "SIGQUIT",
] as const satisfies readonly NodeJS.Signals[];

/** Minimal surface of `process` used to receive signals */
interface SignalSource {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

export interface LaunchOptions {
  command: string;
  args: readonly string[];
  env: NodeJS.ProcessEnv;
  /** Called once the child process is running */
  onSpawn?: () => void;
  spawnFn?: typeof spawn;
  signalSource?: SignalSource;
}

/**
 * Shell convention: the exit code, or 128 + signal number for a child
 * killed by a signal
 */
export function exitCodeOf(
  code: number | null,
  signal: NodeJS.Signals | null,
): number {
  if (code !== null) {
    return code;
  }
  if (signal) {
    return 128 + os.constants.signals[signal];
  }
  return 1;
}

/**
 * Run the command to completion and resolve with its exit code.
 *
 * @throws SidecarError LAUNCH_FAILED when the command cannot be spawned
 */
export function launchSupervised(options: LaunchOptions): Promise<number> {
  const spawnFn = options.spawnFn ?? spawn;
  const source = options.signalSource ?? process;

  return new Promise((resolve, reject) => {
    const child = spawnFn(options.command, options.args, {
      env: options.env,
      stdio: "inherit",
    });

    const forwarders = FORWARDED_SIGNALS.map((signal) => {
      const forward = (): void => {
        log.debug(`Forwarding ${signal} to pid ${child.pid ?? "?"}`);
        child.kill(signal);
      };
      source.on(signal, forward);
      return { signal, forward };
    });

    const detach = (): void => {
      for (const { signal, forward } of forwarders) {
        source.off(signal, forward);
      }
    };

    child.once("spawn", () => options.onSpawn?.());

    child.once("error", (err) => {
      detach();
      reject(
        new SidecarError(
          "LAUNCH_FAILED",
          `Failed to launch ${options.command}: ${errorMessage(err)}`,
          { cause: err },
        ),
      );
    });

    child.once("exit", (code, signal) => {
      detach();
      resolve(exitCodeOf(code, signal));
    });
  });
}
