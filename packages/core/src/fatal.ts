import type { Logger } from "./logger.js";

/**
 * Log a fatal error and exit non-zero. Used by command actions only;
 * library code throws and leaves the exit to its caller.
 */
export function exitWithError(log: Logger, error: unknown): never {
  if (error instanceof Error) {
    log.error(`Error: ${error.message}`);
  } else {
    log.error("An unknown error occurred");
  }
  process.exit(1);
}

interface Program {
  parseAsync(argv?: readonly string[]): Promise<unknown>;
}

/**
 * Run a CLI program, sending anything its actions reject with to
 * exitWithError
 */
export function runProgram(
  program: Program,
  log: Logger,
  argv: readonly string[] = process.argv,
): Promise<void> {
  return program.parseAsync(argv).then(
    () => undefined,
    (error: unknown) => exitWithError(log, error),
  );
}
