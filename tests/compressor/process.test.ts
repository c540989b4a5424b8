import { afterEach, describe, expect, test, vi } from "vitest";
import { runProcess } from "../../src/compressor/process";
import { logger } from "../../src/utils/logger";

describe("runProcess", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("captures output and exit code", async () => {
    const result = await runProcess("sh", ["-c", "echo out; echo err 1>&2; exit 3"]);

    expect(result).toEqual({ exitCode: 3, stdout: "out\n", stderr: "err\n", timedOut: false });
  });

  test("reports success", async () => {
    const result = await runProcess("sh", ["-c", "printf done"]);

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe("done");
  });

  test("runs in the given directory", async () => {
    const result = await runProcess("sh", ["-c", "pwd"], { cwd: "/" });
    expect(result.stdout).toBe("/\n");
  });

  test("kills the process on timeout", async () => {
    vi.spyOn(logger, "warn").mockImplementation(() => {});

    const result = await runProcess("sh", ["-c", "exec sleep 5"], { timeoutMs: 100 });

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBeNull();
  });

  test("rejects when the command cannot start", async () => {
    await expect(runProcess("/nonexistent/packrat-tool", [])).rejects.toThrow("ENOENT");
  });
});
