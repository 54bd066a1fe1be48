/**
 * tools.ts - Makes sure the external Python tools are installed
 *
 * The checks shell out to black, flake8, isort and nbqa. Before the first
 * check runs, each tool is probed with "<tool> --version"; if any probe
 * fails, all four are installed in one pip call:
 *
 *   python3 -m pip install black flake8 isort nbqa
 *
 * "python -m pip" installs into the same interpreter whose scripts are on
 * PATH, which plain "pip" does not guarantee. The interpreter defaults to
 * python3 and can be overridden with PLUMBLINE_PYTHON.
 */

import {
  executeCommand as defaultExecutor,
  type CommandExecutor,
} from "../utils/command";
import { CheckUsageError } from "./errors";
import type { ToolInstallResult } from "./types";

export const REQUIRED_TOOLS = ["black", "flake8", "isort", "nbqa"] as const;

/** pip can take minutes on a cold cache */
const INSTALL_TIMEOUT_MS = 10 * 60 * 1000;

export interface EnsureToolsOptions {
  executor?: CommandExecutor;
  python?: string;
  onInstall?: (tools: readonly string[]) => void;
}

/**
 * Returns the tools whose "--version" probe fails.
 */
export function findMissingTools(
  tools: readonly string[],
  executor: CommandExecutor = defaultExecutor
): string[] {
  return tools.filter((tool) => executor(tool, ["--version"]).isError);
}

/**
 * Installs the required tools when any of them is missing.
 *
 * @returns Which tools were missing and whether an install ran
 * @throws CheckUsageError when pip fails, with pip's output in the message
 */
export function ensureTools(
  tools: readonly string[] = REQUIRED_TOOLS,
  options: EnsureToolsOptions = {}
): ToolInstallResult {
  const executor = options.executor ?? defaultExecutor;
  const python = options.python ?? (process.env.PLUMBLINE_PYTHON || "python3");

  const missing = findMissingTools(tools, executor);
  if (missing.length === 0) {
    return { missing, installed: false };
  }

  options.onInstall?.(tools);

  const result = executor(python, ["-m", "pip", "install", ...tools], {
    timeoutMs: INSTALL_TIMEOUT_MS,
  });

  if (result.isError) {
    throw new CheckUsageError(
      `Failed to install required Python tools (${tools.join(" ")}):\n${result.output.trim()}`
    );
  }

  return { missing, installed: true };
}
