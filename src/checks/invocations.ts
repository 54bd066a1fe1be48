/**
 * invocations.ts - Maps (check, action, target) to the external command line
 *
 * | check  | run                          | fix          |
 * |--------|------------------------------|--------------|
 * | black  | black --check --diff <dir>   | black <dir>  |
 * | isort  | isort --check-only --diff    | isort <dir>  |
 * | flake8 | flake8 <dir>                 | (no fix mode)|
 *
 * Notebook targets run the same tool through nbqa ("nbqa black ...").
 */

import { CheckUsageError } from "./errors";
import type {
  CheckAction,
  CheckName,
  CheckTarget,
  ToolInvocation,
} from "./types";

/** Human-readable tool names for headings */
const TOOL_TITLES: Record<CheckName, string> = {
  black: "Black",
  isort: "iSort",
  flake8: "Flake8",
};

function toolArgs(
  check: CheckName,
  action: CheckAction,
  dir: string
): string[] {
  switch (check) {
    case "black":
      return action === "run" ? ["--check", "--diff", dir] : [dir];
    case "isort":
      return action === "run" ? ["--check-only", "--diff", dir] : [dir];
    case "flake8":
      if (action === "fix") {
        throw new CheckUsageError(
          "Flake8 only reports problems; it cannot be used with the fix action."
        );
      }
      return [dir];
  }
}

function describe(
  check: CheckName,
  action: CheckAction,
  target: CheckTarget
): string {
  const verb =
    action === "fix"
      ? "Formatting"
      : check === "flake8"
        ? "Linting Check"
        : "Check";
  const files = target.kind === "notebooks" ? ".ipynb" : ".py";
  return `--- Running ${TOOL_TITLES[check]} ${verb} (${files} files in ${target.path}) ---`;
}

/**
 * Builds the invocation for one check against one target.
 *
 * @throws CheckUsageError for flake8 under the fix action
 */
export function buildInvocation(
  check: CheckName,
  action: CheckAction,
  target: CheckTarget
): ToolInvocation {
  const args = toolArgs(check, action, target.path);
  const label = describe(check, action, target);

  if (target.kind === "notebooks") {
    return { label, executable: "nbqa", args: [check, ...args] };
  }
  return { label, executable: check, args };
}

/**
 * Builds every invocation of a run in execution order: check by check,
 * python tree before notebooks within each check.
 *
 * All invocations are built before any runs, so an impossible combination
 * fails before a single file is touched.
 */
export function planInvocations(
  checks: readonly CheckName[],
  action: CheckAction,
  targets: readonly CheckTarget[]
): ToolInvocation[] {
  const ordered = [...targets].sort(
    (a, b) => kindOrder(a.kind) - kindOrder(b.kind)
  );
  return checks.flatMap((check) =>
    ordered.map((target) => buildInvocation(check, action, target))
  );
}

function kindOrder(kind: CheckTarget["kind"]): number {
  return kind === "python" ? 0 : 1;
}
