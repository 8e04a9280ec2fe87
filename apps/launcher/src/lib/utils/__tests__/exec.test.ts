import { describe, it, expect } from "vitest";
import { execCommand } from "../exec.js";

describe("execCommand", () => {
  it("should return trimmed stdout", async () => {
    await expect(execCommand("sh", ["-c", "echo '  hello  '"])).resolves.toBe(
      "hello",
    );
  });

  it("should pass arguments without a shell", async () => {
    await expect(execCommand("printf", ["%s", "$HOME"])).resolves.toBe("$HOME");
  });

  it("should include stderr in the error", async () => {
    await expect(
      execCommand("sh", ["-c", "echo oops >&2; exit 2"]),
    ).rejects.toThrow("Command failed: sh -c echo oops >&2; exit 2\noops");
  });

  it("should report a missing program", async () => {
    await expect(execCommand("/nonexistent/tool")).rejects.toThrow(
      "Command failed: /nonexistent/tool\n",
    );
  });
});
