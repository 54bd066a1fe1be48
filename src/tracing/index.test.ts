/**
 * index.test.ts - Tracing bootstrap with and without the optional SDKs
 *
 * Tracing initializes when the module loads, so every test resets the
 * module registry and imports it fresh. The optional packages are swapped
 * through the ./optional-deps mock.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";


const { mockConfig } = vi.hoisted(() => {
  const traceloopSpy = {
    initialize: vi.fn(),
    forceFlush: vi.fn().mockResolvedValue(undefined),
  };
  // function expressions, so `new` works on them
  const consoleSpanExporterSpy = vi.fn().mockImplementation(function () {});
  const otlpTraceExporterSpy = vi.fn().mockImplementation(function () {});

  return {
    mockConfig: {
      traceloopAvailable: true,
      sdkTraceNodeAvailable: true,
      exporterOtlpProtoAvailable: true,

      traceloopSpy,
      consoleSpanExporterSpy,
      otlpTraceExporterSpy,
    },
  };
});

vi.mock("./optional-deps", () => ({
  loadTraceloop: () =>
    mockConfig.traceloopAvailable ? mockConfig.traceloopSpy : null,
  loadSdkTraceNode: () =>
    mockConfig.sdkTraceNodeAvailable
      ? { ConsoleSpanExporter: mockConfig.consoleSpanExporterSpy }
      : null,
  loadExporterOtlpProto: () =>
    mockConfig.exporterOtlpProtoAvailable
      ? { OTLPTraceExporter: mockConfig.otlpTraceExporterSpy }
      : null,
}));

const ORIGINAL_ENV = { ...process.env };

beforeEach(() => {
  vi.resetModules();

  for (const name of [
    "OTEL_TRACING_ENABLED",
    "OTEL_CAPTURE_AI_PAYLOADS",
    "OTEL_EXPORTER_TYPE",
    "OTEL_EXPORTER_OTLP_ENDPOINT",
  ]) {
    delete process.env[name];
  }

  mockConfig.traceloopSpy.initialize.mockClear();
  mockConfig.traceloopSpy.forceFlush.mockClear();
  mockConfig.consoleSpanExporterSpy.mockClear();
  mockConfig.otlpTraceExporterSpy.mockClear();

  mockConfig.traceloopAvailable = true;
  mockConfig.sdkTraceNodeAvailable = true;
  mockConfig.exporterOtlpProtoAvailable = true;
});

afterEach(() => {
  vi.restoreAllMocks();
  process.env = { ...ORIGINAL_ENV };
});

/** Strings passed to a console spy that carry the [OTel] prefix */
function otelMessages(spy: { mock: { calls: unknown[][] } }): string[] {
  return spy.mock.calls
    .flat()
    .filter((msg): msg is string => typeof msg === "string" && msg.startsWith("[OTel]"));
}

describe("without the optional SDKs", () => {
  beforeEach(() => {
    mockConfig.traceloopAvailable = false;
    mockConfig.sdkTraceNodeAvailable = false;
    mockConfig.exporterOtlpProtoAvailable = false;
  });

  it("still hands out a usable no-op tracer", async () => {
    const tracing = await import("./index");
    const tracer = tracing.getTracer();

    expect(tracing.SERVICE_NAME).toBe("plumbline");
    expect(tracer.startSpan).toBeTypeOf("function");
    expect(tracer.startActiveSpan).toBeTypeOf("function");
  });

  it("warns once tracing is requested", async () => {
    process.env.OTEL_TRACING_ENABLED = "true";
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});

    await import("./index");

    expect(otelMessages(warnSpy)).toEqual([
      "[OTel] OTEL_TRACING_ENABLED=true but @traceloop/node-server-sdk is not installed; " +
        "spans will not be recorded.",
    ]);
  });

  it("stays silent while tracing is off", async () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});

    await import("./index");

    expect(otelMessages(warnSpy)).toEqual([]);
  });
});

describe("with the SDKs installed", () => {
  it("does nothing until OTEL_TRACING_ENABLED=true", async () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    await import("./index");

    expect(mockConfig.traceloopSpy.initialize).not.toHaveBeenCalled();
    expect(otelMessages(logSpy)).toEqual([]);
  });

  describe("when enabled", () => {
    beforeEach(() => {
      process.env.OTEL_TRACING_ENABLED = "true";
    });

    it("initializes OpenLLMetry with the exporter and tool processor", async () => {
      const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
      const { ToolDefinitionsProcessor } = await import(
        "./tool-definitions-processor"
      );

      await import("./index");

      expect(mockConfig.traceloopSpy.initialize).toHaveBeenCalledOnce();
      expect(mockConfig.traceloopSpy.initialize).toHaveBeenCalledWith(
        expect.objectContaining({
          appName: "plumbline",
          disableBatch: true,
          traceContent: false,
          silenceInitializationMessage: true,
          exporter: expect.anything(),
          processor: expect.any(ToolDefinitionsProcessor),
        })
      );
      expect(otelMessages(logSpy)).toContain("[OTel] Tracing enabled for plumbline");
    });

    it("captures prompt content when OTEL_CAPTURE_AI_PAYLOADS=true", async () => {
      process.env.OTEL_CAPTURE_AI_PAYLOADS = "true";
      vi.spyOn(console, "log").mockImplementation(() => {});

      const tracing = await import("./index");

      expect(tracing.isCaptureAiPayloads).toBe(true);
      expect(mockConfig.traceloopSpy.initialize).toHaveBeenCalledWith(
        expect.objectContaining({ traceContent: true })
      );
    });
  });
});

describe("exporter selection", () => {
  beforeEach(() => {
    process.env.OTEL_TRACING_ENABLED = "true";
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it.each([
    ["http://localhost:4318", "http://localhost:4318/v1/traces"],
    ["http://localhost:4318/", "http://localhost:4318/v1/traces"],
    ["http://localhost:4318/v1/traces", "http://localhost:4318/v1/traces"],
  ])("sends OTLP spans for endpoint %s to %s", async (endpoint, url) => {
    process.env.OTEL_EXPORTER_TYPE = "otlp";
    process.env.OTEL_EXPORTER_OTLP_ENDPOINT = endpoint;

    await import("./index");

    expect(mockConfig.otlpTraceExporterSpy).toHaveBeenCalledWith({ url });
  });

  it("uses the console exporter by default", async () => {
    await import("./index");

    expect(mockConfig.consoleSpanExporterSpy).toHaveBeenCalledOnce();
    expect(mockConfig.otlpTraceExporterSpy).not.toHaveBeenCalled();
  });

  it.each([
    {
      name: "otlp without its package",
      env: { OTEL_EXPORTER_TYPE: "otlp", OTEL_EXPORTER_OTLP_ENDPOINT: "http://localhost:4318" },
      missing: "otlp",
      error: "OTEL_EXPORTER_TYPE=otlp requires @opentelemetry/exporter-trace-otlp-proto",
    },
    {
      name: "otlp without an endpoint",
      env: { OTEL_EXPORTER_TYPE: "otlp" },
      missing: "",
      error: "OTEL_EXPORTER_OTLP_ENDPOINT is required",
    },
    {
      name: "console without sdk-trace-node",
      env: { OTEL_EXPORTER_TYPE: "console" },
      missing: "console",
      error: "Console exporter requires @opentelemetry/sdk-trace-node",
    },
    {
      name: "an unknown exporter type",
      env: { OTEL_EXPORTER_TYPE: "zipkin" },
      missing: "",
      error: 'Unsupported OTEL_EXPORTER_TYPE: "zipkin"',
    },
  ])("fails to load for $name", async ({ env, missing, error }) => {
    Object.assign(process.env, env);
    mockConfig.exporterOtlpProtoAvailable = missing !== "otlp";
    mockConfig.sdkTraceNodeAvailable = missing !== "console";

    await expect(import("./index")).rejects.toThrow(error);
  });
});

describe("isCaptureAiPayloads", () => {
  it.each([
    [undefined, false],
    ["true", true],
    ["yes", false],
  ])("OTEL_CAPTURE_AI_PAYLOADS=%s gives %s", async (value, expected) => {
    if (value !== undefined) {
      process.env.OTEL_CAPTURE_AI_PAYLOADS = value;
    }

    const tracing = await import("./index");

    expect(tracing.isCaptureAiPayloads).toBe(expected);
  });
});

describe("readTracingConfig", () => {
  it("defaults to disabled tracing with the console exporter", async () => {
    const { readTracingConfig } = await import("./index");

    expect(readTracingConfig({})).toEqual({
      enabled: false,
      captureAiPayloads: false,
      exporter: "console",
      otlpEndpoint: undefined,
    });
  });

  it("reads every OTEL_* setting", async () => {
    const { readTracingConfig } = await import("./index");

    expect(
      readTracingConfig({
        OTEL_TRACING_ENABLED: "true",
        OTEL_CAPTURE_AI_PAYLOADS: "true",
        OTEL_EXPORTER_TYPE: "otlp",
        OTEL_EXPORTER_OTLP_ENDPOINT: "http://collector:4318",
      })
    ).toEqual({
      enabled: true,
      captureAiPayloads: true,
      exporter: "otlp",
      otlpEndpoint: "http://collector:4318",
    });
  });
});
