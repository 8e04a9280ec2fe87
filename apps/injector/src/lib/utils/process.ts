import { systemErrorCode } from "@agent-sidecar/core";

/**
 * Check whether a process with the given PID exists.
 * EPERM means it exists but belongs to another user.
 */
export function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return systemErrorCode(err) === "EPERM";
  }
}
