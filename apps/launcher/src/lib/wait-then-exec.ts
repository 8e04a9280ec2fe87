/**
 * Consumer Wait-Loop
 *
 * waiting -> ready -> launched
 * waiting -> timed_out
 *
 * The library is only preloaded once it is observed on the shared volume;
 * on timeout the application is never started.
 */

import { logger } from "@agent-sidecar/core";
import type { Clock } from "./clock.js";
import { runDiagnostics } from "./diagnostics.js";
import { launchSupervised, type LaunchOptions } from "./launch.js";
import { PollingArtifactWatcher, type ArtifactWatcher } from "./watcher.js";

const log = logger("launcher");

export type LaunchState = "waiting" | "ready" | "launched" | "timed_out";

export interface WaitThenExecOptions {
  libraryPath: string;
  maxWaitSeconds: number;
  command: string;
  args?: readonly string[];
  /** Variable receiving the library path (default: LD_PRELOAD) */
  preloadVar?: string;
  /** Run advisory diagnostics before launching (default: true) */
  diagnostics?: boolean;
  /** Base environment for the application (default: process.env) */
  env?: NodeJS.ProcessEnv;
  onStateChange?: (state: LaunchState) => void;
  watcher?: ArtifactWatcher;
  clock?: Clock;
  launch?: (options: LaunchOptions) => Promise<number>;
}

/**
 * Wait for the agent library, then run the command with it preloaded.
 * Resolves with the command's exit code.
 *
 * @throws DependencyNotReadyError when the library does not appear in time
 * @throws SidecarError LAUNCH_FAILED when the command cannot be spawned
 */
export async function waitThenExec(
  options: WaitThenExecOptions,
): Promise<number> {
  const preloadVar = options.preloadVar ?? "LD_PRELOAD";
  const args = options.args ?? [];
  const launch = options.launch ?? launchSupervised;
  const transition = (state: LaunchState): void => {
    log.debug(`State: ${state}`);
    options.onStateChange?.(state);
  };

  transition("waiting");
  log.info("Waiting for agent library...");

  const watcher =
    options.watcher ??
    new PollingArtifactWatcher({
      path: options.libraryPath,
      clock: options.clock,
      onProgress: (elapsed, max) => {
        log.info(`Agent not ready, waiting... (${elapsed}/${max})`);
      },
    });

  const result = await watcher.wait(options.maxWaitSeconds * 1000);
  if (!result.ok) {
    transition("timed_out");
    throw result.error;
  }

  transition("ready");
  log.info(`Agent library found: ${result.path}`);

  const env: NodeJS.ProcessEnv = {
    ...(options.env ?? process.env),
    [preloadVar]: result.path,
  };

  if (options.diagnostics ?? true) {
    await runDiagnostics({ env, libraryPath: result.path, preloadVar });
  }

  log.info(`Starting application: ${[options.command, ...args].join(" ")}`);
  return launch({
    command: options.command,
    args,
    env,
    onSpawn: () => transition("launched"),
  });
}
