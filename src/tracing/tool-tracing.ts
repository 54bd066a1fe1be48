/**
 * tool-tracing.ts - OpenTelemetry instrumentation for monitoring tool calls
 *
 * What this file does:
 * Provides a wrapper function that adds tracing to any core tool handler.
 * When a tool is called, it creates a span with timing, inputs, and
 * success/failure info. The Cloud Logging and Cloud Monitoring client spans
 * nest beneath it.
 *
 * Attribute strategy:
 * OTel GenAI semantic conventions for tool execution, so LLM observability
 * backends show tool calls alongside the model calls around them.
 */

import { randomUUID } from "crypto";
import { SpanKind, SpanStatusCode, context, trace } from "@opentelemetry/api";
import { getTracer } from "./index";
import { getStoredContext } from "./context-bridge";

/**
 * Tool result with isError flag - used to record tool failures.
 * We only need the isError property for tracing; the rest passes through.
 */
interface ResultWithError {
  isError?: boolean;
}

/**
 * Wraps a tool handler with OpenTelemetry tracing.
 *
 * Creates a span for each tool invocation with:
 * - Span name: "execute_tool {toolName}" (following semconv pattern)
 * - Span kind: INTERNAL (business logic, not an outbound call)
 * - Parent: the agent's root span when one is stored (see context-bridge.ts)
 *
 * Attributes captured (OTel GenAI semconv):
 * | Attribute                    | Required?   | Description                      |
 * |------------------------------|-------------|----------------------------------|
 * | gen_ai.operation.name        | Required    | Always "execute_tool"            |
 * | gen_ai.tool.name             | Required    | Tool name (e.g., get_latest_logs)|
 * | gen_ai.tool.type             | Recommended | Always "function"                |
 * | gen_ai.tool.call.id          | Recommended | Unique UUID per invocation       |
 * | gen_ai.tool.call.arguments   | Required    | JSON stringified input args      |
 *
 * Error handling:
 * - Exceptions (thrown errors): recorded with span.recordException(), status ERROR
 * - Tool failures (isError: true): span status stays OK (the tool worked, the
 *   backend query failed); plumbline.tool.is_error records it
 */
export function withToolTracing<TInput, TResult extends ResultWithError>(
  toolName: string,
  handler: (input: TInput) => Promise<TResult>
): (input: TInput) => Promise<TResult> {
  return async (input: TInput): Promise<TResult> => {
    const tracer = getTracer();

    // startActiveSpan with async callbacks doesn't reliably propagate context
    // through LangGraph, so the span is parented explicitly
    const span = tracer.startSpan(
      `execute_tool ${toolName}`,
      { kind: SpanKind.INTERNAL },
      getStoredContext()
    );

    span.setAttribute("gen_ai.operation.name", "execute_tool");
    span.setAttribute("gen_ai.tool.name", toolName);
    span.setAttribute("gen_ai.tool.type", "function");
    span.setAttribute("gen_ai.tool.call.id", randomUUID());
    span.setAttribute("gen_ai.tool.call.arguments", JSON.stringify(input, null, 2));

    const activeContext = trace.setSpan(getStoredContext(), span);

    return context.with(activeContext, async () => {
      try {
        const result = await handler(input);
        span.setAttribute("plumbline.tool.is_error", result.isError === true);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        span.recordException(error instanceof Error ? error : new Error(message));
        span.setStatus({ code: SpanStatusCode.ERROR, message });
        throw error;
      } finally {
        span.end();
      }
    });
  };
}
