import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { EventEmitter } from "node:events";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  FORWARDED_SIGNALS,
  exitCodeOf,
  launchSupervised,
} from "../launch.js";

describe("exitCodeOf", () => {
  it("should pass through a normal exit code", () => {
    expect(exitCodeOf(0, null)).toBe(0);
    expect(exitCodeOf(42, null)).toBe(42);
  });

  it("should map a terminating signal to 128 + its number", () => {
    expect(exitCodeOf(null, "SIGTERM")).toBe(143);
    expect(exitCodeOf(null, "SIGKILL")).toBe(137);
    expect(exitCodeOf(null, "SIGINT")).toBe(130);
  });

  it("should fall back to 1", () => {
    expect(exitCodeOf(null, null)).toBe(1);
  });
});

describe("launchSupervised", () => {
  let testDir: string;
  let signals: EventEmitter;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), "launch-test-"));
    signals = new EventEmitter();
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("should run the command with the given environment", async () => {
    const outFile = path.join(testDir, "out");

    const code = await launchSupervised({
      command: "sh",
      args: ["-c", 'printf %s "$AGENT_PRELOAD" > "$OUT"'],
      env: {
        PATH: process.env.PATH,
        AGENT_PRELOAD: "/volume/agent/lib64/lib.so",
        OUT: outFile,
      },
      signalSource: signals,
    });

    expect(code).toBe(0);
    expect(fs.readFileSync(outFile, "utf-8")).toBe(
      "/volume/agent/lib64/lib.so",
    );
  });

  it("should resolve with the child's exit code", async () => {
    await expect(
      launchSupervised({
        command: "sh",
        args: ["-c", "exit 3"],
        env: { PATH: process.env.PATH },
        signalSource: signals,
      }),
    ).resolves.toBe(3);
  });

  it("should report the spawn", async () => {
    const onSpawn = vi.fn();

    await launchSupervised({
      command: "sh",
      args: ["-c", "true"],
      env: { PATH: process.env.PATH },
      onSpawn,
      signalSource: signals,
    });

    expect(onSpawn).toHaveBeenCalledTimes(1);
  });

  it("should fail with LAUNCH_FAILED when the command does not exist", async () => {
    const onSpawn = vi.fn();

    await expect(
      launchSupervised({
        command: "/nonexistent/app-binary",
        args: [],
        env: { PATH: process.env.PATH },
        onSpawn,
        signalSource: signals,
      }),
    ).rejects.toMatchObject({
      code: "LAUNCH_FAILED",
      message: expect.stringContaining(
        "Failed to launch /nonexistent/app-binary:",
      ),
    });
    expect(onSpawn).not.toHaveBeenCalled();
  });

  it("should forward SIGTERM and exit with 128 + 15", async () => {
    const code = await launchSupervised({
      command: "sleep",
      args: ["5"],
      env: { PATH: process.env.PATH },
      onSpawn: () => signals.emit("SIGTERM"),
      signalSource: signals,
    });

    expect(code).toBe(143);
  });

  it("should stop listening for signals once the child exits", async () => {
    await launchSupervised({
      command: "sh",
      args: ["-c", "true"],
      env: { PATH: process.env.PATH },
      signalSource: signals,
    });

    for (const signal of FORWARDED_SIGNALS) {
      expect(signals.listenerCount(signal)).toBe(0);
    }
  });
});
