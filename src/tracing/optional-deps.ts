/**
 * optional-deps.ts - Loaders for the optional tracing packages
 *
 * Each loader returns the package, or null when it isn't installed. Any
 * other load failure is rethrown so a broken install shows up at startup.
 *
 * Kept in its own module so tests can vi.mock("./optional-deps"); Vitest
 * cannot intercept the require() calls below.
 */

function loadOptional<T>(packageName: string, load: () => T): T | null {
  try {
    return load();
  } catch (error) {
    const missing =
      error instanceof Error &&
      "code" in error &&
      error.code === "MODULE_NOT_FOUND" &&
      error.message.includes(packageName);
    if (missing) return null;
    throw error;
  }
}

/** OpenLLMetry: LLM auto-instrumentation and the TracerProvider */
export function loadTraceloop(): typeof import("@traceloop/node-server-sdk") | null {
  return loadOptional("@traceloop/node-server-sdk", () =>
    require("@traceloop/node-server-sdk")
  );
}

/** ConsoleSpanExporter for OTEL_EXPORTER_TYPE=console */
export function loadSdkTraceNode(): typeof import("@opentelemetry/sdk-trace-node") | null {
  return loadOptional("@opentelemetry/sdk-trace-node", () =>
    require("@opentelemetry/sdk-trace-node")
  );
}

/** OTLPTraceExporter for OTEL_EXPORTER_TYPE=otlp */
export function loadExporterOtlpProto(): typeof import("@opentelemetry/exporter-trace-otlp-proto") | null {
  return loadOptional("@opentelemetry/exporter-trace-otlp-proto", () =>
    require("@opentelemetry/exporter-trace-otlp-proto")
  );
}
