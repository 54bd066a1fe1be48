/**
 * tool-definitions-processor.ts - Injects tool definitions into LLM chat spans
 *
 * What this file does:
 * Adds gen_ai.tool.definitions to the anthropic.chat spans created by OpenLLMetry's
 * auto-instrumentation, so LLM observability backends show which monitoring
 * tools were available to the model at each reasoning step.
 *
 * Why a SpanProcessor?
 * The anthropic.chat spans are created by OpenLLMetry's Anthropic SDK instrumentation;
 * we don't control their creation. A SpanProcessor sees every span at start time,
 * letting us add attributes to spans we didn't create.
 *
 * Registration:
 * Passed to traceloop.initialize() via the `processor` option in src/tracing/index.ts.
 *
 * Lazy imports:
 * The tool catalog is required inside getToolDefinitionsJson() instead of at the
 * top level. This breaks a circular dependency chain: tracing/index → this file →
 * tools/core → utils/cloud-logging → tracing/index. By the time the first
 * anthropic.chat span fires, all modules are fully initialized.
 */

import type { Span, Context } from "@opentelemetry/api";
import type { SpanProcessor, ReadableSpan } from "@opentelemetry/sdk-trace-base";

/** Cached JSON string, computed on the first LLM span */
let cachedToolDefinitionsJson: string | null = null;

/**
 * Builds the tool definitions JSON from the core tool catalog.
 *
 * Uses the OpenAI-style format (type: "function" with nested function object),
 * with each tool's Zod schema converted to JSON Schema.
 */
export function getToolDefinitionsJson(): string {
  if (!cachedToolDefinitionsJson) {
    const { zodToJsonSchema }: typeof import("zod-to-json-schema") = require("zod-to-json-schema");
    const { TOOL_DEFINITIONS }: typeof import("../tools/core/catalog") = require("../tools/core/catalog");

    cachedToolDefinitionsJson = JSON.stringify(
      TOOL_DEFINITIONS.map((tool) => ({
        type: "function",
        function: {
          name: tool.name,
          description: tool.description,
          parameters: zodToJsonSchema(tool.schema),
        },
      }))
    );
  }

  return cachedToolDefinitionsJson;
}

/**
 * SpanProcessor that adds gen_ai.tool.definitions to "anthropic.chat" spans.
 * Each of those spans is one model call in the ReAct loop.
 */
export class ToolDefinitionsProcessor implements SpanProcessor {
  onStart(span: Span, _parentContext: Context): void {
    // The API Span type doesn't expose .name; the SDK's span object does
    if ("name" in span && span.name === "anthropic.chat") {
      span.setAttribute("gen_ai.tool.definitions", getToolDefinitionsJson());
    }
  }

  onEnd(_span: ReadableSpan): void {}
  async shutdown(): Promise<void> {}
  async forceFlush(): Promise<void> {}
}
