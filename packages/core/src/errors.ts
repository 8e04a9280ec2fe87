/**
 * Error taxonomy for the sidecar protocol.
 *
 * Every code is fatal at process level: commands log the message and exit
 * non-zero, and retrying is left to the platform's restart policy.
 */

export type SidecarErrorCode =
  // input errors
  | "INVALID_CONFIG"
  | "ARCHIVE_NOT_FOUND"
  | "ARCHIVE_CORRUPT"
  | "ARTIFACT_NOT_FOUND"
  // timing errors
  | "DEPENDENCY_NOT_READY"
  | "LOCK_TIMEOUT"
  // resource errors
  | "VOLUME_NOT_WRITABLE"
  | "BIND_FAILED"
  | "LAUNCH_FAILED";

export class SidecarError extends Error {
  readonly code: SidecarErrorCode;

  constructor(
    code: SidecarErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SidecarError";
    this.code = code;
  }
}

/**
 * The agent library did not appear on the shared volume within the wait budget
 */
export class DependencyNotReadyError extends SidecarError {
  readonly libraryPath: string;
  readonly maxWaitSeconds: number;

  constructor(libraryPath: string, maxWaitSeconds: number) {
    super(
      "DEPENDENCY_NOT_READY",
      `Agent library not found after ${maxWaitSeconds}s: ${libraryPath}`,
    );
    this.name = "DependencyNotReadyError";
    this.libraryPath = libraryPath;
    this.maxWaitSeconds = maxWaitSeconds;
  }
}

/**
 * Message for an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

/**
 * Node.js system error code (ENOENT, EACCES, ...) of a thrown value, if any
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}
