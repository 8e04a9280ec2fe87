import { logger } from "@agent-sidecar/core";

const log = logger("injector");

interface SignalHandlers {
  onShutdown: () => void;
}

/** Minimal surface of `process` the handlers attach to */
interface SignalTarget {
  once(signal: NodeJS.Signals, listener: () => void): unknown;
}

/**
 * Set up signal handlers for graceful shutdown (SIGINT, SIGTERM).
 * A second signal while shutting down is ignored.
 */
export function setupSignalHandlers(
  handlers: SignalHandlers,
  target: SignalTarget = process,
): void {
  let stopping = false;

  const shutdown = (signal: NodeJS.Signals) => () => {
    if (stopping) {
      return;
    }
    stopping = true;
    log.info(`${signal} received, shutting down...`);
    handlers.onShutdown();
  };

  target.once("SIGINT", shutdown("SIGINT"));
  target.once("SIGTERM", shutdown("SIGTERM"));
}
