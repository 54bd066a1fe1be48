/**
 * Python code-check runner
 *
 * Flow for one CLI invocation:
 *   resolveChecks → resolveTargets → ensureTools → runChecks
 *
 * Usage:
 *   import { resolveChecks, resolveTargets, runChecks } from "./checks";
 */

export { resolveChecks, CHECK_VOCABULARY } from "./selection";
export { resolveTargets, defaultLayout } from "./targets";
export { buildInvocation, planInvocations } from "./invocations";
export { ensureTools, findMissingTools, REQUIRED_TOOLS } from "./tools";
export { runChecks, SUCCESS_MESSAGE } from "./runner";
export { CheckUsageError } from "./errors";
export { ALL_CHECKS, CHECK_ACTIONS } from "./types";
export type {
  CheckAction,
  CheckName,
  CheckTarget,
  CheckLayout,
  TargetSelectors,
  ToolInvocation,
  CheckRunResult,
  CheckProgressEvent,
  RunChecksOptions,
  ToolInstallResult,
} from "./types";
