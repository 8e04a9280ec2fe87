/**
 * Install claim
 *
 * Serialises the first extraction on a shared volume. The claim is a lock
 * file created with O_EXCL ("wx"); whoever creates it extracts, everyone
 * else polls until it disappears.
 *
 * A claim is stale when its owner is a dead process on this host, or when it
 * is older than staleAfterMs (owners on another host cannot be checked).
 * Each process signs its claims with a random token: a claim carrying our
 * PID but not our token was left by an earlier container whose process had
 * the same PID, typically 1.
 */

import { randomUUID } from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import {
  SidecarError,
  errorMessage,
  logger,
  systemErrorCode,
} from "@agent-sidecar/core";
import { isProcessRunning } from "../utils/process.js";

const log = logger("injector:lock");

const DEFAULT_TIMEOUT_MS = 120000;
const DEFAULT_RETRY_INTERVAL_MS = 100;
const DEFAULT_STALE_AFTER_MS = 10 * 60 * 1000;

const PROCESS_TOKEN = randomUUID();

interface LockOwner {
  pid: number;
  host: string;
  token?: string;
  acquiredAt?: string;
}

export interface InstallLockOptions {
  /** Give up waiting for another installer after this long */
  timeoutMs?: number;
  retryIntervalMs?: number;
  /** Age after which any claim is considered abandoned (default: min(10 min, timeoutMs)) */
  staleAfterMs?: number;
}

function readOwner(lockPath: string): LockOwner | null {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(lockPath, "utf-8"));
    if (
      typeof parsed === "object" &&
      parsed !== null &&
      "pid" in parsed &&
      "host" in parsed &&
      typeof parsed.pid === "number" &&
      typeof parsed.host === "string"
    ) {
      return {
        pid: parsed.pid,
        host: parsed.host,
        token:
          "token" in parsed && typeof parsed.token === "string"
            ? parsed.token
            : undefined,
      };
    }
  } catch {
    // Missing, half-written or foreign content
  }
  return null;
}

function isOwnerGone(owner: LockOwner): boolean {
  if (owner.host !== os.hostname()) {
    return false;
  }
  if (owner.pid === process.pid) {
    return owner.token !== PROCESS_TOKEN;
  }
  return !isProcessRunning(owner.pid);
}

/**
 * The stat of the claim at lockPath when it is stale, otherwise null
 */
function staleClaim(lockPath: string, staleAfterMs: number): fs.Stats | null {
  let stat: fs.Stats;
  try {
    stat = fs.statSync(lockPath);
  } catch {
    // Released between our attempt and now
    return null;
  }

  if (Date.now() - stat.mtimeMs > staleAfterMs) {
    return stat;
  }
  const owner = readOwner(lockPath);
  return owner !== null && isOwnerGone(owner) ? stat : null;
}

/**
 * Move the stale claim aside before deleting it. If another waiter already
 * replaced it with a fresh claim, that claim is linked back.
 */
function removeStaleClaim(lockPath: string, stale: fs.Stats): void {
  const asidePath = `${lockPath}.stale-${PROCESS_TOKEN}`;
  try {
    fs.renameSync(lockPath, asidePath);
  } catch (err) {
    if (systemErrorCode(err) === "ENOENT") {
      return;
    }
    throw err;
  }

  try {
    if (fs.statSync(asidePath).ino !== stale.ino) {
      try {
        fs.linkSync(asidePath, lockPath);
      } catch (err) {
        if (systemErrorCode(err) !== "EEXIST") {
          throw err;
        }
      }
    }
  } finally {
    fs.rmSync(asidePath, { force: true });
  }
}

function tryAcquire(lockPath: string): boolean {
  const owner: LockOwner = {
    pid: process.pid,
    host: os.hostname(),
    token: PROCESS_TOKEN,
    acquiredAt: new Date().toISOString(),
  };
  try {
    fs.writeFileSync(lockPath, JSON.stringify(owner), { flag: "wx" });
    return true;
  } catch (err) {
    if (systemErrorCode(err) === "EEXIST") {
      return false;
    }
    throw err;
  }
}

/**
 * Execute a function while holding the install claim at lockPath
 */
export async function withInstallLock<T>(
  lockPath: string,
  fn: () => Promise<T>,
  options: InstallLockOptions = {},
): Promise<T> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const retryIntervalMs = options.retryIntervalMs ?? DEFAULT_RETRY_INTERVAL_MS;
  const staleAfterMs =
    options.staleAfterMs ?? Math.min(DEFAULT_STALE_AFTER_MS, timeoutMs);

  const startTime = Date.now();
  let waitingLogged = false;

  while (!tryAcquire(lockPath)) {
    const stale = staleClaim(lockPath, staleAfterMs);
    if (stale) {
      log.warn(`Removing stale install lock ${lockPath}`);
      removeStaleClaim(lockPath, stale);
      continue;
    }

    if (Date.now() - startTime >= timeoutMs) {
      throw new SidecarError(
        "LOCK_TIMEOUT",
        `Another installer still holds ${lockPath} after ${timeoutMs}ms`,
      );
    }

    if (!waitingLogged) {
      log.info("Another installer is extracting, waiting for it to finish...");
      waitingLogged = true;
    }
    await new Promise((resolve) => setTimeout(resolve, retryIntervalMs));
  }

  // Keep the claim fresh so waiters do not mistake a long extraction for a stale one
  const heartbeat = setInterval(
    () => {
      const now = new Date();
      try {
        fs.utimesSync(lockPath, now, now);
      } catch (err) {
        log.warn(`Could not refresh ${lockPath}: ${errorMessage(err)}`);
      }
    },
    Math.max(Math.floor(staleAfterMs / 3), retryIntervalMs),
  );
  heartbeat.unref();

  try {
    return await fn();
  } finally {
    clearInterval(heartbeat);
    fs.rmSync(lockPath, { force: true });
  }
}
