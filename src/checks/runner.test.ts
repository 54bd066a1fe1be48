/**
 * runner.test.ts - Unit tests for the sequential check runner
 *
 * The executor is faked at the CommandExecutor seam, so these tests cover
 * ordering, stop-on-failure and exit-code propagation without spawning tools.
 */

import { describe, it, expect, vi, type Mock } from "vitest";
import { runChecks } from "./runner";
import type { CheckProgressEvent, CheckTarget } from "./types";
import type { CommandExecutor, CommandResult } from "../utils/command";

const PY: CheckTarget = { kind: "python", path: "./agents" };
const NB: CheckTarget = { kind: "notebooks", path: "./notebooks" };

const pass: CommandResult = { output: "", isError: false, exitCode: 0 };

/** Renders a call as the command line a shell user would type */
function commandLines(executor: Mock<CommandExecutor>): string[] {
  return executor.mock.calls.map(([exe, args]) => [exe, ...args].join(" "));
}

describe("runChecks", () => {
  it("runs every check against both trees in order", async () => {
    const executor = vi.fn<CommandExecutor>(() => pass);

    const result = await runChecks({
      action: "run",
      checks: ["black", "isort", "flake8"],
      targets: [PY, NB],
      executor,
    });

    expect(result.exitCode).toBe(0);
    expect(result.failed).toBeUndefined();
    expect(commandLines(executor)).toEqual([
      "black --check --diff ./agents",
      "nbqa black --check --diff ./notebooks",
      "isort --check-only --diff ./agents",
      "nbqa isort --check-only --diff ./notebooks",
      "flake8 ./agents",
      "nbqa flake8 ./notebooks",
    ]);
  });

  it("stops at the first failure and propagates its exit code", async () => {
    const executor = vi.fn<CommandExecutor>((executable) =>
      executable === "isort"
        ? { output: "ERROR: imports are incorrectly sorted\n", isError: true, exitCode: 1 }
        : pass
    );

    const result = await runChecks({
      action: "run",
      checks: ["black", "isort", "flake8"],
      targets: [PY],
      executor,
    });

    expect(result.exitCode).toBe(1);
    expect(result.failed?.executable).toBe("isort");
    expect(result.executed).toHaveLength(2);
    expect(commandLines(executor)).toEqual([
      "black --check --diff ./agents",
      "isort --check-only --diff ./agents",
    ]);
  });

  it("keeps tool-specific exit codes", async () => {
    const executor = vi.fn<CommandExecutor>(() => ({
      output: "error: cannot format a.py\n",
      isError: true,
      exitCode: 123,
    }));

    const result = await runChecks({
      action: "fix",
      checks: ["black"],
      targets: [PY],
      executor,
    });

    expect(result.exitCode).toBe(123);
  });

  it("reports exit code 1 when a tool could not be started", async () => {
    const executor = vi.fn<CommandExecutor>(() => ({
      output: 'Error executing "nbqa flake8 ./notebooks": spawnSync nbqa ENOENT',
      isError: true,
      exitCode: null,
    }));

    const result = await runChecks({
      action: "run",
      checks: ["flake8"],
      targets: [NB],
      executor,
    });

    expect(result.exitCode).toBe(1);
  });

  it("emits start and output progress events", async () => {
    const executor = vi.fn<CommandExecutor>(() => ({
      output: "All done! ✨ 🍰 ✨\n",
      isError: false,
      exitCode: 0,
    }));
    const events: CheckProgressEvent[] = [];

    await runChecks({
      action: "run",
      checks: ["black"],
      targets: [PY],
      executor,
      onProgress: (event) => events.push(event),
    });

    expect(events.map((e) => e.type)).toEqual(["start", "output"]);
    expect(events[1]).toMatchObject({ output: "All done! ✨ 🍰 ✨\n", isError: false });
  });

  it("flags the output of a failing tool", async () => {
    const executor = vi.fn<CommandExecutor>(() => ({
      output: 'Error executing "flake8": spawnSync flake8 ENOENT',
      isError: true,
      exitCode: null,
    }));
    const events: CheckProgressEvent[] = [];

    await runChecks({
      action: "run",
      checks: ["flake8"],
      targets: [PY],
      executor,
      onProgress: (event) => events.push(event),
    });

    expect(events[1]).toEqual({
      type: "output",
      invocation: { label: expect.any(String), executable: "flake8", args: ["./agents"] },
      output: 'Error executing "flake8": spawnSync flake8 ENOENT',
      isError: true,
    });
  });

  it("passes the per-invocation timeout to the executor", async () => {
    const executor = vi.fn<CommandExecutor>(() => pass);

    await runChecks({
      action: "run",
      checks: ["flake8"],
      targets: [PY],
      executor,
      timeoutMs: 5000,
    });

    expect(executor).toHaveBeenCalledWith("flake8", ["./agents"], {
      timeoutMs: 5000,
    });
  });

  it("rejects flake8 under fix before running anything", async () => {
    const executor = vi.fn<CommandExecutor>(() => pass);

    await expect(
      runChecks({
        action: "fix",
        checks: ["black", "flake8"],
        targets: [PY],
        executor,
      })
    ).rejects.toThrow("cannot be used with the fix action");
    expect(executor).not.toHaveBeenCalled();
  });
});
