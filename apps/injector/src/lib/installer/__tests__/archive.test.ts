import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import AdmZip from "adm-zip";
import * as tar from "tar";
import { detectArchiveFormat, extractArchive } from "../archive.js";

describe("archive", () => {
  let testDir: string;
  let sourceDir: string;
  let destDir: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), "archive-test-"));
    sourceDir = path.join(testDir, "source");
    destDir = path.join(testDir, "dest");
    fs.mkdirSync(path.join(sourceDir, "agent", "lib64"), { recursive: true });
    fs.writeFileSync(path.join(sourceDir, "agent", "lib64", "lib.so"), "64");
    fs.mkdirSync(destDir);
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  const extractedLib = () => path.join(destDir, "agent", "lib64", "lib.so");

  describe("detectArchiveFormat", () => {
    it("should detect zip archives regardless of extension", () => {
      const file = path.join(testDir, "agent.bin");
      const zip = new AdmZip();
      zip.addFile("agent/lib64/lib.so", Buffer.from("64"));
      zip.writeZip(file);

      expect(detectArchiveFormat(file)).toBe("zip");
    });

    it("should detect gzip tarballs", async () => {
      const file = path.join(testDir, "agent.tgz");
      await tar.create({ gzip: true, file, cwd: sourceDir }, ["agent"]);

      expect(detectArchiveFormat(file)).toBe("tar.gz");
    });

    it("should fall back to the .tar extension", async () => {
      const file = path.join(testDir, "agent.tar");
      await tar.create({ file, cwd: sourceDir }, ["agent"]);

      expect(detectArchiveFormat(file)).toBe("tar");
    });

    it("should reject unknown content", () => {
      const file = path.join(testDir, "agent.zip");
      fs.writeFileSync(file, "hello");

      expect(() => detectArchiveFormat(file)).toThrow(
        `Unrecognized archive format: ${file}`,
      );
    });

    it("should reject an empty file", () => {
      const file = path.join(testDir, "empty.zip");
      fs.writeFileSync(file, "");

      expect(() => detectArchiveFormat(file)).toThrow(
        "Unrecognized archive format",
      );
    });
  });

  describe("extractArchive", () => {
    it("should extract a zip archive and overwrite existing files", async () => {
      const file = path.join(testDir, "agent.zip");
      const zip = new AdmZip();
      zip.addFile("agent/lib64/lib.so", Buffer.from("new"));
      zip.writeZip(file);
      fs.mkdirSync(path.join(destDir, "agent", "lib64"), { recursive: true });
      fs.writeFileSync(path.join(destDir, "agent", "lib64", "lib.so"), "old");

      await expect(extractArchive(file, destDir)).resolves.toBe("zip");
      expect(fs.readFileSync(extractedLib(), "utf-8")).toBe("new");
    });

    it("should extract a plain tarball", async () => {
      const file = path.join(testDir, "agent.tar");
      await tar.create({ file, cwd: sourceDir }, ["agent"]);

      await expect(extractArchive(file, destDir)).resolves.toBe("tar");
      expect(fs.readFileSync(extractedLib(), "utf-8")).toBe("64");
    });

    it("should report a truncated zip as corrupt", async () => {
      const file = path.join(testDir, "agent.zip");
      fs.writeFileSync(file, Buffer.from([0x50, 0x4b, 0x03, 0x04, 0x00]));

      await expect(extractArchive(file, destDir)).rejects.toMatchObject({
        code: "ARCHIVE_CORRUPT",
        message: expect.stringContaining(`Failed to extract ${file}:`),
      });
    });
  });
});
