/**
 * Agent archive extraction
 *
 * The agent ships as a ZIP archive; tarballs (plain or gzip) are accepted
 * too. The format is sniffed from the leading bytes so a misnamed archive
 * still extracts.
 */

import fs from "node:fs";
import AdmZip from "adm-zip";
import * as tar from "tar";
import { SidecarError, errorMessage } from "@agent-sidecar/core";

export type ArchiveFormat = "zip" | "tar.gz" | "tar";

function readHeader(archivePath: string): Buffer {
  const header = Buffer.alloc(4);
  const fd = fs.openSync(archivePath, "r");
  try {
    const bytesRead = fs.readSync(fd, header, 0, header.length, 0);
    return header.subarray(0, bytesRead);
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Detect the archive format from magic bytes ("PK" for zip, 1f 8b for gzip),
 * falling back to the .tar extension since plain tar has no leading magic.
 */
export function detectArchiveFormat(archivePath: string): ArchiveFormat {
  const header = readHeader(archivePath);

  if (header[0] === 0x50 && header[1] === 0x4b) {
    return "zip";
  }
  if (header[0] === 0x1f && header[1] === 0x8b) {
    return "tar.gz";
  }
  if (archivePath.endsWith(".tar")) {
    return "tar";
  }

  throw new SidecarError(
    "ARCHIVE_CORRUPT",
    `Unrecognized archive format: ${archivePath}`,
  );
}

/**
 * Extract the whole archive into destination, overwriting existing files.
 * Extraction is never selective: the versioned layout inside is unknown.
 */
export async function extractArchive(
  archivePath: string,
  destination: string,
): Promise<ArchiveFormat> {
  const format = detectArchiveFormat(archivePath);

  try {
    if (format === "zip") {
      const zip = new AdmZip(archivePath);
      zip.extractAllTo(destination, true);
    } else {
      await tar.x({ file: archivePath, cwd: destination, strict: true });
    }
  } catch (err) {
    throw new SidecarError(
      "ARCHIVE_CORRUPT",
      `Failed to extract ${archivePath}: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  return format;
}
