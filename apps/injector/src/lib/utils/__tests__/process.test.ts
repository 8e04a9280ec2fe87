import { describe, it, expect, vi, afterEach } from "vitest";
import { isProcessRunning } from "../process.js";

function errnoError(code: string): Error {
  return Object.assign(new Error(code), { code });
}

describe("isProcessRunning", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should return true when process exists", () => {
    const kill = vi.spyOn(process, "kill").mockImplementation(() => true);

    expect(isProcessRunning(1234)).toBe(true);
    expect(kill).toHaveBeenCalledWith(1234, 0);
  });

  it("should return true when EPERM (process exists but no permission)", () => {
    vi.spyOn(process, "kill").mockImplementation(() => {
      throw errnoError("EPERM");
    });

    expect(isProcessRunning(1234)).toBe(true);
  });

  it("should return false when ESRCH (no such process)", () => {
    vi.spyOn(process, "kill").mockImplementation(() => {
      throw errnoError("ESRCH");
    });

    expect(isProcessRunning(1234)).toBe(false);
  });

  it("should return false for other errors", () => {
    vi.spyOn(process, "kill").mockImplementation(() => {
      throw new Error("Unknown error");
    });

    expect(isProcessRunning(1234)).toBe(false);
  });

  it("should report the current process as running", () => {
    expect(isProcessRunning(process.pid)).toBe(true);
  });
});
