/**
 * Stable alias publication
 *
 * The alias is created under a temporary name and renamed over the stable
 * path, so the installation marker appears in one step and a pre-existing
 * (dangling) alias is replaced atomically.
 */

import fs from "node:fs";
import path from "node:path";
import { errorMessage, logger } from "@agent-sidecar/core";

const log = logger("injector:installer");

export type PublishMode = "symlink" | "copy";

export interface PublishOptions {
  /** Link primitive; replaced in tests to simulate filesystems without symlinks */
  symlink?: (target: string, linkPath: string) => void;
}

/**
 * Publish sourcePath at stablePath. The symlink is relative to the stable
 * path's directory so it resolves whatever mount point the consumer uses.
 * Falls back to a world-readable copy when the filesystem refuses links.
 */
export function publishStableAlias(
  sourcePath: string,
  stablePath: string,
  options: PublishOptions = {},
): PublishMode {
  const symlink = options.symlink ?? ((t, p) => fs.symlinkSync(t, p));
  const stableDir = path.dirname(stablePath);
  const tempPath = path.join(
    stableDir,
    `.${path.basename(stablePath)}.${process.pid}-${Date.now()}.tmp`,
  );

  fs.mkdirSync(stableDir, { recursive: true });

  let mode: PublishMode;
  try {
    symlink(path.relative(stableDir, sourcePath), tempPath);
    mode = "symlink";
  } catch (err) {
    log.warn(`Symlink not permitted (${errorMessage(err)}), copying instead`);
    fs.rmSync(tempPath, { force: true });
    fs.copyFileSync(sourcePath, tempPath);
    fs.chmodSync(tempPath, 0o644);
    mode = "copy";
  }

  try {
    fs.renameSync(tempPath, stablePath);
  } catch (err) {
    fs.rmSync(tempPath, { force: true });
    throw err;
  }

  return mode;
}
