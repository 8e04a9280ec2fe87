import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { logger, clearLoggerCache } from "../logger.js";
import { runProgram } from "../fatal.js";

describe("runProgram", () => {
  beforeEach(() => {
    vi.stubEnv("DEBUG", "");
    clearLoggerCache();
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(process, "exit").mockImplementation((): never => {
      throw new Error("process.exit called");
    });
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("should pass argv to the program", async () => {
    const parseAsync = vi.fn(async () => undefined);

    await runProgram({ parseAsync }, logger("cli"), ["node", "cli", "status"]);

    expect(parseAsync).toHaveBeenCalledWith(["node", "cli", "status"]);
    expect(process.exit).not.toHaveBeenCalled();
  });

  it("should log a rejected action and exit 1", async () => {
    const program = {
      parseAsync: async () => {
        throw new Error("boom");
      },
    };

    await expect(runProgram(program, logger("cli"), [])).rejects.toThrow(
      "process.exit called",
    );

    expect(console.error).toHaveBeenCalledWith("[ERROR] [cli] Error: boom");
    expect(process.exit).toHaveBeenCalledWith(1);
  });

  it("should report non-Error rejections as unknown", async () => {
    const program = { parseAsync: () => Promise.reject("bad") };

    await expect(runProgram(program, logger("cli"), [])).rejects.toThrow(
      "process.exit called",
    );

    expect(console.error).toHaveBeenCalledWith(
      "[ERROR] [cli] An unknown error occurred",
    );
  });
});
