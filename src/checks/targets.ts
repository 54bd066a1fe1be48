/**
 * targets.ts - Decides which directories a check run covers
 *
 * The repository has a fixed layout: Python sources under ./agents and
 * Jupyter notebooks under ./notebooks. Two mutually exclusive path selectors
 * narrow a run to one tree (and point it somewhere else):
 *
 *   --agents-dir <path>     check a plain .py tree
 *   --notebooks-dir <path>  check a .ipynb tree through nbqa
 *
 * "run" without a selector covers both default trees. "fix" rewrites files,
 * so it refuses to guess and requires exactly one selector.
 */

import * as fs from "fs";
import { CheckUsageError } from "./errors";
import type {
  CheckAction,
  CheckLayout,
  CheckTarget,
  TargetSelectors,
} from "./types";

/**
 * Default layout, overridable through the environment for repositories
 * that keep their trees elsewhere.
 */
export function defaultLayout(
  env: NodeJS.ProcessEnv = process.env
): CheckLayout {
  return {
    agentsDir: env.PLUMBLINE_AGENTS_DIR || "./agents",
    notebooksDir: env.PLUMBLINE_NOTEBOOKS_DIR || "./notebooks",
  };
}

/**
 * Resolves the targets for an action and validates that each exists.
 *
 * @throws CheckUsageError when both selectors are given, when "fix" has no
 *   selector, or when a selected directory is missing
 */
export function resolveTargets(
  action: CheckAction,
  selectors: TargetSelectors,
  layout: CheckLayout
): CheckTarget[] {
  const { agentsDir, notebooksDir } = selectors;

  if (agentsDir !== undefined && notebooksDir !== undefined) {
    throw new CheckUsageError(
      "--agents-dir and --notebooks-dir are mutually exclusive; pass only one."
    );
  }

  let targets: CheckTarget[];
  if (agentsDir !== undefined) {
    targets = [{ kind: "python", path: agentsDir }];
  } else if (notebooksDir !== undefined) {
    targets = [{ kind: "notebooks", path: notebooksDir }];
  } else if (action === "fix") {
    throw new CheckUsageError(
      "The fix action requires --agents-dir or --notebooks-dir."
    );
  } else {
    targets = [
      { kind: "python", path: layout.agentsDir },
      { kind: "notebooks", path: layout.notebooksDir },
    ];
  }

  for (const target of targets) {
    assertDirectory(target.path);
  }

  return targets;
}

function assertDirectory(dirPath: string): void {
  if (dirPath.trim() === "") {
    throw new CheckUsageError("Directory path must not be empty.");
  }
  if (!fs.existsSync(dirPath) || !fs.statSync(dirPath).isDirectory()) {
    throw new CheckUsageError(`Directory not found: ${dirPath}`);
  }
}
