/**
 * context-bridge.ts - Root spans for monitor questions, MCP calls and check runs
 *
 * LangGraph runs tool handlers outside the async context of the caller, so a
 * tool span started with context.active() would land in a trace of its own.
 * Each root span here is therefore also stored in AsyncLocalStorage, and
 * withToolTracing() reads it back through getStoredContext() to parent the
 * execute_tool spans explicitly.
 *
 *   plumbline.monitor | plumbline.mcp.monitor
 *   ├── anthropic.chat
 *   ├── execute_tool get_latest_error
 *   │   └── gcp.logging list_entries
 *   └── execute_tool get_cpu_utilization
 *       └── gcp.monitoring list_time_series
 *
 *   plumbline.checks
 *   ├── black --check
 *   └── nbqa black
 *
 * The question, the MCP input and the final answer are written to spans
 * only when OTEL_CAPTURE_AI_PAYLOADS=true.
 */

import { AsyncLocalStorage } from "async_hooks";
import { randomUUID } from "crypto";
import {
  context,
  trace,
  SpanKind,
  SpanStatusCode,
  type Attributes,
  type Context,
  type Span,
} from "@opentelemetry/api";
import { getTracer, isCaptureAiPayloads } from "./index";
import type { CheckAction, CheckName, CheckRunResult } from "../checks/types";

/**
 * Result shape of an MCP tool call. The index signature matches the SDK's
 * CallToolResult, which allows extra fields.
 */
export interface McpToolResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

const storedContext = new AsyncLocalStorage<Context>();
const storedRootSpan = new AsyncLocalStorage<Span>();

/** Context of the enclosing root span, or the active one outside any */
export function getStoredContext(): Context {
  return storedContext.getStore() ?? context.active();
}

/** Records the final answer on the enclosing root span (payload capture only) */
export function setTraceOutput(output: string): void {
  const span = storedRootSpan.getStore();
  if (span && isCaptureAiPayloads) {
    span.setAttribute("traceloop.entity.output", output);
  }
}

/**
 * Runs fn under a new root span stored for getStoredContext().
 * `settle` sets the status from the result; thrown errors always mark the
 * span as failed and are rethrown.
 */
async function runRootSpan<T>(
  name: string,
  attributes: Attributes,
  fn: () => Promise<T>,
  settle: (span: Span, result: T) => void = (span) =>
    span.setStatus({ code: SpanStatusCode.OK })
): Promise<T> {
  return getTracer().startActiveSpan(
    name,
    { kind: SpanKind.INTERNAL, attributes },
    async (span) => {
      const spanContext = trace.setSpan(context.active(), span);
      try {
        const result = await storedRootSpan.run(span, () =>
          storedContext.run(spanContext, fn)
        );
        settle(span, result);
        return result;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        span.recordException(error instanceof Error ? error : new Error(message));
        span.setStatus({ code: SpanStatusCode.ERROR, message });
        throw error;
      } finally {
        span.end();
      }
    }
  );
}

/** Traces one question to the monitoring agent (CLI `ask`) */
export async function withAgentTracing<T>(
  question: string,
  fn: () => Promise<T>
): Promise<T> {
  const attributes: Attributes = {
    "plumbline.operation": "monitor",
    "traceloop.span.kind": "workflow",
    "traceloop.entity.name": "monitor",
  };
  const project = process.env.GOOGLE_CLOUD_PROJECT;
  if (project) {
    attributes["gcp.project_id"] = project;
  }
  if (isCaptureAiPayloads) {
    attributes["plumbline.monitor.question"] = question;
    attributes["traceloop.entity.input"] = question;
  }

  return runRootSpan("plumbline.monitor", attributes, fn);
}

/**
 * Traces one MCP tool call. An `isError` result marks the span as failed
 * with the result text as the status message.
 */
export async function withMcpRequestTracing(
  toolName: string,
  input: Record<string, unknown>,
  fn: () => Promise<McpToolResult>
): Promise<McpToolResult> {
  const attributes: Attributes = {
    "plumbline.operation": toolName,
    "plumbline.mcp.tool.name": toolName,
    "traceloop.span.kind": "workflow",
    "traceloop.entity.name": toolName,
    "gen_ai.operation.name": "execute_tool",
    "gen_ai.tool.name": toolName,
    "gen_ai.tool.type": "function",
    "gen_ai.tool.call.id": randomUUID(),
  };
  if (isCaptureAiPayloads) {
    attributes["traceloop.entity.input"] = JSON.stringify(input);
  }

  return runRootSpan(`plumbline.mcp.${toolName}`, attributes, fn, (span, result) => {
    const text = result.content
      .map((block) => block.text)
      .filter((blockText) => blockText !== "")
      .join("\n");
    span.setStatus(
      result.isError
        ? { code: SpanStatusCode.ERROR, message: text || "MCP tool returned an error" }
        : { code: SpanStatusCode.OK }
    );
    if (isCaptureAiPayloads && text) {
      span.setAttribute("traceloop.entity.output", text);
    }
  });
}

/**
 * Traces a check run. The subprocess spans of the tools nest under it; a
 * failing tool's exit code and command become span attributes.
 */
export async function withCheckRunTracing(
  action: CheckAction,
  checks: readonly CheckName[],
  invocationCount: number,
  fn: () => Promise<CheckRunResult>
): Promise<CheckRunResult> {
  const attributes: Attributes = {
    "plumbline.operation": "checks",
    "plumbline.checks.action": action,
    "plumbline.checks.names": checks.join(","),
    "plumbline.checks.invocations": invocationCount,
  };

  return runRootSpan("plumbline.checks", attributes, fn, (span, result) => {
    span.setAttribute("plumbline.checks.executed", result.executed.length);
    span.setAttribute("process.exit.code", result.exitCode);
    if (result.failed) {
      span.setAttribute("plumbline.checks.failed", result.failed.executable);
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: `${result.failed.executable} failed`,
      });
    } else {
      span.setStatus({ code: SpanStatusCode.OK });
    }
  });
}
