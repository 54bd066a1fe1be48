/**
 * tracing/index.ts - OpenTelemetry setup for plumbline
 *
 * Off unless OTEL_TRACING_ENABLED=true; until then getTracer() hands out the
 * API's no-op tracer. When enabled, OpenLLMetry (@traceloop/node-server-sdk)
 * registers the global TracerProvider and instruments the LangChain and
 * Anthropic calls. The spans plumbline creates itself (check runs, tool
 * subprocesses, gcp.logging and gcp.monitoring queries, agent tool calls)
 * come from the same provider and go to the same exporter.
 *
 *   OTEL_EXPORTER_TYPE           console (default) | otlp
 *   OTEL_EXPORTER_OTLP_ENDPOINT  collector base URL, required for otlp
 *   OTEL_CAPTURE_AI_PAYLOADS     true to record questions, answers and prompts
 *
 * The SDK packages are optional peer dependencies (see optional-deps.ts).
 */

import { trace, type Tracer } from "@opentelemetry/api";
import type { SpanExporter } from "@opentelemetry/sdk-trace-node";
import { ToolDefinitionsProcessor } from "./tool-definitions-processor";
import {
  loadTraceloop,
  loadSdkTraceNode,
  loadExporterOtlpProto,
} from "./optional-deps";

export const SERVICE_NAME = "plumbline";

export interface TracingConfig {
  enabled: boolean;
  captureAiPayloads: boolean;
  exporter: string;
  otlpEndpoint?: string;
}

export function readTracingConfig(env: NodeJS.ProcessEnv): TracingConfig {
  return {
    enabled: env.OTEL_TRACING_ENABLED === "true",
    captureAiPayloads: env.OTEL_CAPTURE_AI_PAYLOADS === "true",
    exporter: env.OTEL_EXPORTER_TYPE || "console",
    otlpEndpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT || undefined,
  };
}

/** Appends the OTLP/HTTP traces path unless the endpoint already ends in it */
export function otlpTracesUrl(endpoint: string): string {
  const base = endpoint.replace(/\/+$/, "");
  return base.endsWith("/v1/traces") ? base : `${base}/v1/traces`;
}

const config = readTracingConfig(process.env);

/** Read by the root and tool spans before writing user text to attributes */
export const isCaptureAiPayloads = config.captureAiPayloads;

/**
 * @throws Error naming the missing package or setting for the chosen exporter
 */
function createSpanExporter(settings: TracingConfig): SpanExporter {
  if (settings.exporter === "otlp") {
    const otlp = loadExporterOtlpProto();
    if (!otlp) {
      throw new Error(
        "OTEL_EXPORTER_TYPE=otlp requires @opentelemetry/exporter-trace-otlp-proto. " +
          "Install it: npm install @opentelemetry/exporter-trace-otlp-proto"
      );
    }
    if (!settings.otlpEndpoint) {
      throw new Error(
        "OTEL_EXPORTER_OTLP_ENDPOINT is required when OTEL_EXPORTER_TYPE=otlp, " +
          "e.g. http://localhost:4318"
      );
    }
    const url = otlpTracesUrl(settings.otlpEndpoint);
    console.log(`[OTel] Exporting spans to ${url}`);
    return new otlp.OTLPTraceExporter({ url });
  }

  if (settings.exporter !== "console") {
    throw new Error(
      `Unsupported OTEL_EXPORTER_TYPE: "${settings.exporter}". Valid options: "console", "otlp".`
    );
  }

  const sdkTraceNode = loadSdkTraceNode();
  if (!sdkTraceNode) {
    throw new Error(
      "Console exporter requires @opentelemetry/sdk-trace-node. " +
        "Install it: npm install @opentelemetry/sdk-trace-node"
    );
  }
  console.log("[OTel] Printing spans to the console");
  return new sdkTraceNode.ConsoleSpanExporter();
}

function initializeTracing(settings: TracingConfig): void {
  const traceloop = loadTraceloop();
  if (!traceloop) {
    console.warn(
      "[OTel] OTEL_TRACING_ENABLED=true but @traceloop/node-server-sdk is not installed; " +
        "spans will not be recorded."
    );
    return;
  }

  traceloop.initialize({
    appName: SERVICE_NAME,
    exporter: createSpanExporter(settings),
    // a CLI run is short; batching would lose the tail of the trace
    disableBatch: true,
    traceContent: settings.captureAiPayloads,
    silenceInitializationMessage: true,
    processor: new ToolDefinitionsProcessor(),
  });
  console.log(`[OTel] Tracing enabled for ${SERVICE_NAME}`);

  // The 0.22 SDK has forceFlush() but no shutdown()
  const flush = async () => {
    try {
      await traceloop.forceFlush();
    } catch (error) {
      console.error("[OTel] Failed to flush spans:", error);
    }
  };
  process.on("SIGTERM", flush);
  process.on("SIGINT", flush);
}

if (config.enabled) {
  initializeTracing(config);
}

/** Tracer from the global provider; a no-op tracer while tracing is off */
export function getTracer(): Tracer {
  return trace.getTracer(SERVICE_NAME);
}
