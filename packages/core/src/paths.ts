/**
 * Shared volume layout.
 *
 * Injector and launcher never exchange the library location; both derive it
 * from the same volume root and stage label through these helpers.
 */

import path from "node:path";

export const AGENT_LIBRARY_NAME = "liboneagentproc.so";

/** Directory under the volume root that holds per-stage installs */
const INSTALL_DIR = "oneagent";

function installRoot(volumeRoot: string, stage: string): string {
  return path.join(volumeRoot, INSTALL_DIR, stage);
}

function contentRoot(volumeRoot: string, stage: string): string {
  return path.join(volumeRoot, `.${INSTALL_DIR}-${stage}`);
}

function libraryDir(volumeRoot: string, stage: string): string {
  return path.join(installRoot(volumeRoot, stage), "agent", "lib64");
}

export const agentPaths = {
  /** <volume>/oneagent/<stage> */
  installRoot,

  /** <volume>/oneagent/<stage>/agent/lib64 */
  libraryDir,

  /** <volume>/oneagent: parent of every stage's install root */
  installBase: (volumeRoot: string): string =>
    path.join(volumeRoot, INSTALL_DIR),

  /** <volume>/.oneagent-<stage>: the extracted archive once complete */
  contentRoot,

  /**
   * Private extraction directory next to the content root. Prefix-matched
   * when sweeping leftovers of crashed installs.
   */
  stagingDir: (volumeRoot: string, stage: string, id: string): string =>
    `${contentRoot(volumeRoot, stage)}.staging-${id}`,

  /** Stable Library Path: the installation marker both processes agree on */
  stableLibrary: (
    volumeRoot: string,
    stage: string,
    libraryName: string = AGENT_LIBRARY_NAME,
  ): string => path.join(libraryDir(volumeRoot, stage), libraryName),

  /** Claim file serialising the first extraction on a volume */
  installLock: (volumeRoot: string, stage: string): string =>
    path.join(volumeRoot, `.${INSTALL_DIR}-${stage}.install.lock`),

  /**
   * Whether a path names the 64-bit agent library: .../agent/lib64/<name>.
   * 32-bit siblings (agent/lib, agent/lib32) do not match.
   */
  isAgentLibrary: (filePath: string, libraryName: string): boolean => {
    const dir = path.dirname(filePath);
    return (
      path.basename(filePath) === libraryName &&
      path.basename(dir) === "lib64" &&
      path.basename(path.dirname(dir)) === "agent"
    );
  },
} as const;
