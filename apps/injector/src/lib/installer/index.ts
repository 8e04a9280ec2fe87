/**
 * Agent Installer
 *
 * Unpacks the agent archive into the shared volume once per volume lifetime
 * and publishes the 64-bit library at the stable path:
 *
 *   <volume>/oneagent/<stage>/agent/lib64/<library>
 *
 * The stable path doubles as the installation marker. The archive is
 * extracted into a private staging directory, checked and relaxed there,
 * then renamed to <volume>/.oneagent-<stage>. Only after that is the alias
 * written, so a consumer that sees the stable path can load the library and
 * a failed install leaves no marker behind.
 */

import fs from "node:fs";
import path from "node:path";
import {
  AGENT_LIBRARY_NAME,
  SidecarError,
  agentPaths,
  errorMessage,
  logger,
} from "@agent-sidecar/core";
import { extractArchive, type ArchiveFormat } from "./archive.js";
import { findAgentLibraries, selectAgentLibrary } from "./locate.js";
import { relaxPermissions } from "./permissions.js";
import { publishStableAlias, type PublishMode } from "./publish.js";
import { withInstallLock, type InstallLockOptions } from "./install-lock.js";

const log = logger("injector:installer");

export interface InstallOptions {
  archivePath: string;
  volumeRoot: string;
  stage: string;
  libraryName?: string;
  /** Install claim timing */
  lock?: InstallLockOptions;
  /** Extraction step (default: extractArchive) */
  extract?: (
    archivePath: string,
    destination: string,
  ) => Promise<ArchiveFormat>;
  /** Link primitive used when publishing the alias */
  symlink?: (target: string, linkPath: string) => void;
}

export type InstallResult =
  | { extracted: false; libraryPath: string }
  | {
      extracted: true;
      libraryPath: string;
      sourcePath: string;
      mode: PublishMode;
    };

/**
 * Whether the stable path exists and resolves to a regular file
 */
export function isPublished(libraryPath: string): boolean {
  try {
    return fs.statSync(libraryPath).isFile();
  } catch {
    return false;
  }
}

function ensureWritableVolume(volumeRoot: string): void {
  try {
    fs.mkdirSync(volumeRoot, { recursive: true });
    fs.accessSync(volumeRoot, fs.constants.W_OK);
  } catch (err) {
    throw new SidecarError(
      "VOLUME_NOT_WRITABLE",
      `Shared volume ${volumeRoot} is not writable: ${errorMessage(err)}`,
      { cause: err },
    );
  }
}

function ensureArchive(archivePath: string): void {
  let isFile = false;
  try {
    isFile = fs.statSync(archivePath).isFile();
  } catch {
    // Reported below
  }
  if (!isFile) {
    throw new SidecarError(
      "ARCHIVE_NOT_FOUND",
      `Agent archive not found: ${archivePath}`,
    );
  }
}

/**
 * Remove staging directories of installs that died while holding the claim
 */
function sweepStaging(volumeRoot: string, stage: string): void {
  const prefix = path.basename(agentPaths.stagingDir(volumeRoot, stage, ""));
  for (const name of fs.readdirSync(volumeRoot)) {
    if (name.startsWith(prefix)) {
      log.warn(`Removing ${name} left by an interrupted install`);
      fs.rmSync(path.join(volumeRoot, name), { recursive: true, force: true });
    }
  }
}

/**
 * Extract into stagingDir and return the library to publish, inside it
 */
async function stageArchive(
  options: InstallOptions,
  libraryName: string,
  stagingDir: string,
): Promise<string> {
  const extract = options.extract ?? extractArchive;

  log.info(`Extracting ${options.archivePath} into ${stagingDir}...`);
  const format = await extract(options.archivePath, stagingDir);
  log.debug(`Extracted ${format} archive`);

  const candidates = await findAgentLibraries(stagingDir, libraryName);
  const sourcePath = selectAgentLibrary(
    candidates,
    agentPaths.stableLibrary(stagingDir, options.stage, libraryName),
  );
  if (!sourcePath) {
    throw new SidecarError(
      "ARTIFACT_NOT_FOUND",
      `${libraryName} not found under agent/lib64 after extracting ${options.archivePath}`,
    );
  }
  if (candidates.length > 1) {
    log.warn(
      `Found ${candidates.length} copies of ${libraryName}, using ${sourcePath}`,
    );
  }

  const relaxed = await relaxPermissions(stagingDir);
  log.debug(
    `Relaxed permissions on ${relaxed.directories} directories and ${relaxed.files} files`,
  );
  return sourcePath;
}

async function extractAndPublish(
  options: InstallOptions,
  libraryName: string,
  libraryPath: string,
): Promise<InstallResult> {
  const { volumeRoot, stage } = options;
  const contentDir = agentPaths.contentRoot(volumeRoot, stage);
  const stagingDir = agentPaths.stagingDir(
    volumeRoot,
    stage,
    `${process.pid}-${Date.now()}`,
  );

  sweepStaging(volumeRoot, stage);
  fs.mkdirSync(stagingDir);

  let stagedSource: string;
  try {
    stagedSource = await stageArchive(options, libraryName, stagingDir);
    // Not published, so nothing can be using a previous content root
    fs.rmSync(contentDir, { recursive: true, force: true });
    fs.renameSync(stagingDir, contentDir);
  } catch (err) {
    fs.rmSync(stagingDir, { recursive: true, force: true });
    throw err;
  }
  const sourcePath = path.join(
    contentDir,
    path.relative(stagingDir, stagedSource),
  );

  // The alias is the last write of the install.
  fs.mkdirSync(path.dirname(libraryPath), { recursive: true });
  await relaxPermissions(agentPaths.installBase(volumeRoot));
  const mode = publishStableAlias(sourcePath, libraryPath, {
    symlink: options.symlink,
  });
  log.info(`Ready. ${libraryPath} (${mode} -> ${sourcePath})`);

  return { extracted: true, libraryPath, sourcePath, mode };
}

/**
 * Install the agent library into the shared volume.
 *
 * Idempotent: when the stable path is already published nothing on the
 * volume is touched. Concurrent installers serialise on the install claim
 * and only the first one extracts.
 *
 * @throws SidecarError ARCHIVE_NOT_FOUND, ARCHIVE_CORRUPT, ARTIFACT_NOT_FOUND,
 *   VOLUME_NOT_WRITABLE or LOCK_TIMEOUT
 */
export async function install(options: InstallOptions): Promise<InstallResult> {
  const libraryName = options.libraryName ?? AGENT_LIBRARY_NAME;
  const libraryPath = agentPaths.stableLibrary(
    options.volumeRoot,
    options.stage,
    libraryName,
  );

  if (isPublished(libraryPath)) {
    log.info(`Reusing existing ${libraryPath}`);
    return { extracted: false, libraryPath };
  }

  ensureWritableVolume(options.volumeRoot);
  ensureArchive(options.archivePath);

  return withInstallLock<InstallResult>(
    agentPaths.installLock(options.volumeRoot, options.stage),
    async () => {
      if (isPublished(libraryPath)) {
        log.info(`Another installer published ${libraryPath}`);
        return { extracted: false, libraryPath };
      }
      return extractAndPublish(options, libraryName, libraryPath);
    },
    options.lock,
  );
}
