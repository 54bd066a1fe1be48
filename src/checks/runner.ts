/**
 * runner.ts - Runs planned tool invocations in sequence
 *
 * Checks run one at a time in a fixed order and the run stops at the first
 * tool that exits non-zero. That tool's exit status becomes the status of
 * the whole run, so a CI job fails the same way it would if the tool had
 * been called directly.
 */

import { withCheckRunTracing } from "../tracing/context-bridge";
import { executeCommand as defaultExecutor } from "../utils/command";
import { planInvocations } from "./invocations";
import type { CheckRunResult, RunChecksOptions, ToolInvocation } from "./types";

/** Whole-tree formatter runs on large repositories take a while */
const DEFAULT_CHECK_TIMEOUT_MS = 10 * 60 * 1000;

export const SUCCESS_MESSAGE =
  "All requested Python checks completed successfully!";

/**
 * Runs the requested checks against the resolved targets.
 *
 * @returns exitCode 0 when everything passed; otherwise the failing
 *   invocation and its exit status (1 if it never started)
 * @throws CheckUsageError if the check/action combination is invalid
 *   (raised before anything runs)
 */
export async function runChecks(
  options: RunChecksOptions
): Promise<CheckRunResult> {
  const executor = options.executor ?? defaultExecutor;
  const onProgress = options.onProgress ?? (() => {});
  const timeoutMs = options.timeoutMs ?? DEFAULT_CHECK_TIMEOUT_MS;

  const invocations = planInvocations(
    options.checks,
    options.action,
    options.targets
  );

  return withCheckRunTracing(
    options.action,
    options.checks,
    invocations.length,
    async () => {
      const executed: ToolInvocation[] = [];

      for (const invocation of invocations) {
        onProgress({ type: "start", invocation });
        executed.push(invocation);

        const result = executor(invocation.executable, invocation.args, {
          timeoutMs,
        });

        if (result.output) {
          onProgress({
            type: "output",
            invocation,
            output: result.output,
            isError: result.isError,
          });
        }

        if (result.isError) {
          const exitCode =
            result.exitCode !== null && result.exitCode > 0
              ? result.exitCode
              : 1;
          return { exitCode, executed, failed: invocation };
        }
      }

      return { exitCode: 0, executed };
    }
  );
}
