/**
 * Advisory diagnostics, logged right before the application starts.
 *
 * Nothing here may change whether the application is launched: every
 * failure is reported as a warning and runDiagnostics never rejects.
 */

import { errorMessage, logger } from "@agent-sidecar/core";
import { execCommand } from "./utils/exec.js";

const log = logger("launcher:diagnostics");

const MASK_PLACEHOLDER = "***";
const SENSITIVE_NAME = /TOKEN|SECRET|PASSWORD|KEY/i;

export interface DiagnosticsOptions {
  env: NodeJS.ProcessEnv;
  libraryPath: string;
  preloadVar: string;
  /** Linkage inspection (default: ldd <library>) */
  inspectLinkage?: (libraryPath: string) => Promise<string>;
}

/**
 * DT_* variables as sorted NAME=value lines, secrets masked
 */
export function agentEnvironment(env: NodeJS.ProcessEnv): string[] {
  return Object.keys(env)
    .filter((name) => name.startsWith("DT_"))
    .sort()
    .map((name) => {
      const value = SENSITIVE_NAME.test(name)
        ? MASK_PLACEHOLDER
        : (env[name] ?? "");
      return `${name}=${value}`;
    });
}

/**
 * Whether a preload list (space or colon separated) names libraryPath
 */
export function preloadReferencesLibrary(
  preload: string | undefined,
  libraryPath: string,
): boolean {
  if (!preload) {
    return false;
  }
  return preload.split(/[\s:]+/).includes(libraryPath);
}

function inspectWithLdd(libraryPath: string): Promise<string> {
  return execCommand("ldd", [libraryPath]);
}

export async function runDiagnostics(
  options: DiagnosticsOptions,
): Promise<void> {
  const { env, libraryPath, preloadVar } = options;

  try {
    const lines = agentEnvironment(env);
    if (lines.length === 0) {
      log.info("No DT_* environment variables set.");
    } else {
      log.info("DT environment variables:");
      for (const line of lines) {
        log.info(`  ${line}`);
      }
    }

    const preload = env[preloadVar];
    log.info(`${preloadVar}: ${preload ?? ""}`);
    if (preloadReferencesLibrary(preload, libraryPath)) {
      log.info(`${preloadVar} references the agent library.`);
    } else {
      log.warn(`${preloadVar} does not reference ${libraryPath}`);
    }
  } catch (err) {
    log.warn(`Environment diagnostics failed: ${errorMessage(err)}`);
  }

  const inspect = options.inspectLinkage ?? inspectWithLdd;
  try {
    const output = await inspect(libraryPath);
    for (const line of output.split("\n")) {
      log.info(`  ${line}`);
    }
  } catch (err) {
    log.warn(`ldd failed on ${libraryPath}: ${errorMessage(err)}`);
  }
}
