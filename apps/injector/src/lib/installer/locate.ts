import fs from "node:fs";
import path from "node:path";
import { agentPaths } from "@agent-sidecar/core";

/**
 * Recursively find every regular file matching .../agent/lib64/<libraryName>
 * under root. Symbolic links are not followed and never match, so a previous
 * alias is not mistaken for the real library. Results are sorted.
 */
export async function findAgentLibraries(
  root: string,
  libraryName: string,
): Promise<string[]> {
  const matches: string[] = [];

  async function walkDir(currentDir: string): Promise<void> {
    const entries = await fs.promises.readdir(currentDir, {
      withFileTypes: true,
    });

    for (const entry of entries) {
      const fullPath = path.join(currentDir, entry.name);

      if (entry.isDirectory()) {
        await walkDir(fullPath);
      } else if (
        entry.isFile() &&
        agentPaths.isAgentLibrary(fullPath, libraryName)
      ) {
        matches.push(fullPath);
      }
    }
  }

  await walkDir(root);
  return matches.sort();
}

/**
 * Pick the library to publish. A match already sitting at the stable path
 * wins; otherwise the first match in path order.
 */
export function selectAgentLibrary(
  candidates: readonly string[],
  stablePath: string,
): string | undefined {
  return candidates.find((c) => c === stablePath) ?? candidates[0];
}
