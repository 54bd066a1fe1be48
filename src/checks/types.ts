/**
 * types.ts - Shared types for the Python code-check runner
 *
 * The runner is glue: it turns an action, a target selection and a list of
 * check names into external tool invocations (Black, isort, Flake8 and nbqa
 * for notebooks) and reports how they exited. These types describe each
 * stage of that mapping.
 */

import type { CommandExecutor } from "../utils/command";

/** A check the runner knows how to invoke */
export type CheckName = "black" | "isort" | "flake8";

/** Canonical execution order when every check is requested */
export const ALL_CHECKS: readonly CheckName[] = ["black", "isort", "flake8"];

/**
 * What the run does to the files.
 * - run: verify only, never modifies files
 * - fix: apply Black and isort formatting in place
 */
export type CheckAction = "run" | "fix";

export const CHECK_ACTIONS: readonly CheckAction[] = ["run", "fix"];

/**
 * Kind of tree being checked.
 * python trees get the tools directly; notebook trees go through nbqa,
 * which extracts the code cells of each .ipynb before handing them over.
 */
export type TargetKind = "python" | "notebooks";

export interface CheckTarget {
  kind: TargetKind;
  path: string;
}

/** Directories checked when no path selector is given */
export interface CheckLayout {
  agentsDir: string;
  notebooksDir: string;
}

/** Path selector flags from the command line (mutually exclusive) */
export interface TargetSelectors {
  agentsDir?: string;
  notebooksDir?: string;
}

/** One external command the runner will execute */
export interface ToolInvocation {
  /** Heading printed before the command runs */
  label: string;
  executable: string;
  args: string[];
}

/** Progress events emitted while checks run */
export type CheckProgressEvent =
  | { type: "start"; invocation: ToolInvocation }
  | { type: "output"; invocation: ToolInvocation; output: string; isError: boolean };

export interface RunChecksOptions {
  action: CheckAction;
  checks: CheckName[];
  targets: CheckTarget[];
  /** Defaults to executeCommand (real subprocesses) */
  executor?: CommandExecutor;
  /** Per-invocation timeout; formatters over a whole tree can be slow */
  timeoutMs?: number;
  onProgress?: (event: CheckProgressEvent) => void;
}

/**
 * Outcome of a check run.
 *
 * exitCode is what the CLI exits with: 0 on success, the failing tool's own
 * status otherwise (1 when the tool could not be spawned at all).
 */
export interface CheckRunResult {
  exitCode: number;
  /** Invocations that ran, in order (including the failing one) */
  executed: ToolInvocation[];
  failed?: ToolInvocation;
}

export interface ToolInstallResult {
  /** Tools that were missing before installation */
  missing: string[];
  installed: boolean;
}
