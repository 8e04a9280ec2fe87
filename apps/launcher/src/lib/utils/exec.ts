/**
 * Command Execution Utilities
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { errorMessage } from "@agent-sidecar/core";

const execFileAsync = promisify(execFile);

/**
 * Execute a program directly (no shell)
 *
 * @returns Command stdout trimmed
 * @throws Error with command and stderr on failure
 */
export async function execCommand(
  file: string,
  args: readonly string[] = [],
): Promise<string> {
  const commandLine = [file, ...args].join(" ");
  try {
    const { stdout } = await execFileAsync(file, args);
    return stdout.trim();
  } catch (error) {
    const stderr =
      error instanceof Error &&
      "stderr" in error &&
      typeof error.stderr === "string"
        ? error.stderr.trim()
        : "";
    throw new Error(
      `Command failed: ${commandLine}\n${stderr || errorMessage(error)}`,
    );
  }
}
