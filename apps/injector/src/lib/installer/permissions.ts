import fs from "node:fs";
import path from "node:path";

const DIR_BITS = 0o755;
const FILE_BITS = 0o644;
const EXEC_BITS = 0o111;

interface RelaxSummary {
  directories: number;
  files: number;
}

function relaxedMode(mode: number, isDirectory: boolean): number {
  const current = mode & 0o7777;
  if (isDirectory) {
    return current | DIR_BITS;
  }
  const exec = current & 0o100 ? EXEC_BITS : 0;
  return current | FILE_BITS | exec;
}

/**
 * Make everything under root loadable by another user: directories become
 * world-traversable, files world-readable (owner-executable files also
 * world-executable). Bits are only added. Symbolic links are skipped.
 *
 * Returns how many entries were changed.
 */
export async function relaxPermissions(root: string): Promise<RelaxSummary> {
  const summary: RelaxSummary = { directories: 0, files: 0 };

  async function relax(target: string, isDirectory: boolean): Promise<void> {
    const { mode } = await fs.promises.lstat(target);
    const next = relaxedMode(mode, isDirectory);
    if (next !== (mode & 0o7777)) {
      await fs.promises.chmod(target, next);
      if (isDirectory) {
        summary.directories++;
      } else {
        summary.files++;
      }
    }
  }

  async function walkDir(currentDir: string): Promise<void> {
    await relax(currentDir, true);

    const entries = await fs.promises.readdir(currentDir, {
      withFileTypes: true,
    });
    for (const entry of entries) {
      const fullPath = path.join(currentDir, entry.name);
      if (entry.isDirectory()) {
        await walkDir(fullPath);
      } else if (entry.isFile()) {
        await relax(fullPath, false);
      }
    }
  }

  await walkDir(root);
  return summary;
}
