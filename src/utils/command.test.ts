/**
 * command.test.ts - Unit tests for subprocess execution
 *
 * child_process is mocked, so no tool actually runs.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import type { SpawnSyncReturns } from "child_process";

const { spawnSyncMock } = vi.hoisted(() => ({
  spawnSyncMock: vi.fn<
    (
      command: string,
      args: string[],
      options: { timeout?: number; encoding?: string; maxBuffer?: number }
    ) => Partial<SpawnSyncReturns<string>>
  >(),
}));

vi.mock("child_process", () => ({ spawnSync: spawnSyncMock }));

import { executeCommand } from "./command";

beforeEach(() => {
  spawnSyncMock.mockReset();
});

describe("executeCommand", () => {
  it("passes arguments without a shell and returns output on success", () => {
    spawnSyncMock.mockReturnValue({ status: 0, stdout: "All done!\n", stderr: "" });

    const result = executeCommand("black", ["--check", "--diff", "./agents; rm -rf /"]);

    expect(result).toEqual({ output: "All done!\n", isError: false, exitCode: 0 });
    expect(spawnSyncMock.mock.calls[0]?.[0]).toBe("black");
    expect(spawnSyncMock.mock.calls[0]?.[1]).toEqual([
      "--check",
      "--diff",
      "./agents; rm -rf /",
    ]);
  });

  it("combines stdout and stderr and keeps the exit code on failure", () => {
    spawnSyncMock.mockReturnValue({
      status: 1,
      stdout: "--- a.py\n+++ a.py\n",
      stderr: "would reformat a.py\n",
    });

    const result = executeCommand("black", ["--check", "./agents"]);

    expect(result).toEqual({
      output: "--- a.py\n+++ a.py\nwould reformat a.py\n",
      isError: true,
      exitCode: 1,
    });
  });

  it("reports spawn errors with a null exit code", () => {
    spawnSyncMock.mockReturnValue({
      status: null,
      stdout: "",
      stderr: "",
      error: new Error("spawnSync nbqa ENOENT"),
    });

    const result = executeCommand("nbqa", ["flake8", "./notebooks"]);

    expect(result).toEqual({
      output: 'Error executing "nbqa flake8 ./notebooks": spawnSync nbqa ENOENT',
      isError: true,
      exitCode: null,
    });
  });

  it("applies the default and custom timeouts", () => {
    spawnSyncMock.mockReturnValue({ status: 0, stdout: "", stderr: "" });

    executeCommand("flake8", ["./agents"]);
    executeCommand("flake8", ["./agents"], { timeoutMs: 5000 });

    expect(spawnSyncMock.mock.calls[0]?.[2].timeout).toBe(30000);
    expect(spawnSyncMock.mock.calls[1]?.[2]).toEqual({
      encoding: "utf-8",
      timeout: 5000,
      maxBuffer: 64 * 1024 * 1024,
    });
  });
});
