/**
 * Artifact Watcher
 *
 * Observes the shared volume for the published agent library. The installer
 * runs in another container and there is no channel between the two, so
 * readiness is whatever the filesystem shows.
 */

import fs from "node:fs";
import { DependencyNotReadyError } from "@agent-sidecar/core";
import { systemClock, type Clock } from "./clock.js";

const DEFAULT_INTERVAL_MS = 1000;

export type WaitResult =
  | { ok: true; path: string; waitedMs: number }
  | { ok: false; error: DependencyNotReadyError };

export interface ArtifactWatcher {
  readonly path: string;
  /** Whether the artifact is visible right now */
  published(): Promise<boolean>;
  /** Wait until the artifact is visible or timeoutMs has elapsed */
  wait(timeoutMs: number): Promise<WaitResult>;
}

export interface PollingWatcherConfig {
  path: string;
  clock?: Clock;
  /** Existence check (default: stat resolves to a regular file) */
  isPublished?: (path: string) => Promise<boolean>;
  intervalMs?: number;
  /** Called after every failed check with whole seconds elapsed and budget */
  onProgress?: (elapsedSeconds: number, maxSeconds: number) => void;
}

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

/**
 * Polls once per interval. With a budget of N intervals the artifact is
 * checked N + 1 times (at 0, 1, ..., N) and progress is reported N times.
 */
export class PollingArtifactWatcher implements ArtifactWatcher {
  readonly path: string;
  private readonly clock: Clock;
  private readonly isPublished: (path: string) => Promise<boolean>;
  private readonly intervalMs: number;
  private readonly onProgress?: (
    elapsedSeconds: number,
    maxSeconds: number,
  ) => void;

  constructor(config: PollingWatcherConfig) {
    this.path = config.path;
    this.clock = config.clock ?? systemClock;
    this.isPublished = config.isPublished ?? isRegularFile;
    this.intervalMs = config.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.onProgress = config.onProgress;
  }

  published(): Promise<boolean> {
    return this.isPublished(this.path);
  }

  async wait(timeoutMs: number): Promise<WaitResult> {
    const start = this.clock.now();
    const maxSeconds = Math.floor(timeoutMs / 1000);

    for (;;) {
      if (await this.published()) {
        const waitedMs = this.clock.now() - start;
        return { ok: true, path: this.path, waitedMs };
      }

      const elapsed = this.clock.now() - start;
      if (elapsed >= timeoutMs) {
        return {
          ok: false,
          error: new DependencyNotReadyError(this.path, maxSeconds),
        };
      }

      this.onProgress?.(Math.floor(elapsed / 1000), maxSeconds);
      await this.clock.sleep(Math.min(this.intervalMs, timeoutMs - elapsed));
    }
  }
}
