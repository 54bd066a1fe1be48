/**
 * command.ts - Executes external tools (black, isort, flake8, nbqa, pip) as subprocesses
 *
 * How it works:
 * 1. Takes an executable name and an array of arguments
 *    (e.g., "black", ["--check", "--diff", "./agents"])
 * 2. Spawns the tool as a child process
 * 3. Returns its combined output, exit code and an isError flag
 *
 * Why spawnSync instead of execSync?
 * execSync(string) hands the whole string to /bin/sh, so a directory named
 * "agents; rm -rf /" would run two commands. spawnSync(cmd, args[]) bypasses
 * the shell: every array element reaches the tool as exactly one argument.
 * Directory paths come from the command line, so they always go through
 * spawnSync.
 *
 * OpenTelemetry instrumentation:
 * Each execution creates a CLIENT span named "<executable> <first arg>" with
 * OTel semconv process.* attributes. When a check run or an agent tool is
 * traced, these spans nest under it.
 */

import { spawnSync } from "child_process";
import { SpanKind, SpanStatusCode } from "@opentelemetry/api";
import { getTracer } from "../tracing";

/**
 * Result from executing an external command.
 *
 * The exit code is kept alongside the isError flag because the check runner
 * propagates the failing tool's own status as the process exit code.
 * exitCode is null when the process never ran (not installed, timed out).
 */
export interface CommandResult {
  output: string;
  isError: boolean;
  exitCode: number | null;
}

export interface CommandOptions {
  /** Kill the process after this many milliseconds (default 30 seconds) */
  timeoutMs?: number;
}

/**
 * Signature shared by executeCommand and the fakes used in tests.
 * Modules that spawn tools take one of these as an injectable dependency.
 */
export type CommandExecutor = (
  executable: string,
  args: string[],
  options?: CommandOptions
) => CommandResult;

const DEFAULT_TIMEOUT_MS = 30_000;

/** Formatter diffs over a whole tree easily exceed spawnSync's 1 MB default */
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

/**
 * Executes a command and returns a structured result.
 *
 * @param executable - Program to run (resolved through PATH)
 * @param args - Arguments passed verbatim, one array element per argument
 * @param options - Timeout in milliseconds
 * @returns Combined stdout/stderr, exit code and an isError flag
 *
 * Example:
 *   executeCommand("flake8", ["./agents"])
 *   // Returns: { output: "", isError: false, exitCode: 0 }
 *
 *   executeCommand("flake8", ["./agents"])  // with findings
 *   // Returns: { output: "./agents/a.py:1:1: F401 ...", isError: true, exitCode: 1 }
 */
export function executeCommand(
  executable: string,
  args: string[],
  options: CommandOptions = {}
): CommandResult {
  const tracer = getTracer();
  const startTime = Date.now();

  // Display form only; never passed to a shell
  const command = [executable, ...args].join(" ");
  const operation = args[0] ?? "";

  return tracer.startActiveSpan(
    operation ? `${executable} ${operation}` : executable,
    { kind: SpanKind.CLIENT },
    (span) => {
      span.setAttribute("process.executable.name", executable);
      span.setAttribute("process.command_args", [executable, ...args]);

      try {
        const result = spawnSync(executable, args, {
          encoding: "utf-8",
          timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
          maxBuffer: MAX_OUTPUT_BYTES,
        });

        span.setAttribute("plumbline.duration_ms", Date.now() - startTime);

        // Spawn errors: tool not installed, timeout, buffer overflow
        if (result.error) {
          span.setAttribute("process.exit.code", -1);
          span.setAttribute("error.type", result.error.name);
          span.recordException(result.error);
          span.setStatus({
            code: SpanStatusCode.ERROR,
            message: result.error.message,
          });

          return {
            output: `Error executing "${command}": ${result.error.message}`,
            isError: true,
            exitCode: null,
          };
        }

        span.setAttribute("process.exit.code", result.status ?? -1);

        // Linters report findings on stdout and formatters on stderr;
        // callers need both, in the order a terminal would show them.
        const output = `${result.stdout ?? ""}${result.stderr ?? ""}`;

        if (result.status !== 0) {
          span.setAttribute("error.type", "NonZeroExit");
          span.setStatus({
            code: SpanStatusCode.ERROR,
            message: `${executable} exited with status ${result.status}`,
          });

          return {
            output,
            isError: true,
            exitCode: result.status,
          };
        }

        span.setStatus({ code: SpanStatusCode.OK });

        return {
          output,
          isError: false,
          exitCode: 0,
        };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        span.setAttribute("plumbline.duration_ms", Date.now() - startTime);
        span.setAttribute("process.exit.code", -1);
        span.setAttribute(
          "error.type",
          error instanceof Error ? error.name : "UnknownError"
        );
        span.recordException(error instanceof Error ? error : new Error(message));
        span.setStatus({ code: SpanStatusCode.ERROR, message });

        return {
          output: `Error executing "${command}": ${message}`,
          isError: true,
          exitCode: null,
        };
      } finally {
        span.end();
      }
    }
  );
}
