/**
 * cloud-monitoring.ts - Reads metric time series from Google Cloud Monitoring
 *
 * Mirrors cloud-logging.ts: the tools depend on a one-method interface
 * (listTimeSeries) so tests can substitute an in-process fake, and each
 * query is wrapped in a CLIENT span.
 */

import { MetricServiceClient, type protos } from "@google-cloud/monitoring";
import { SpanKind, SpanStatusCode } from "@opentelemetry/api";
import { getTracer } from "../tracing";

export type ListTimeSeriesRequest =
  protos.google.monitoring.v3.IListTimeSeriesRequest;
export type TimeSeries = protos.google.monitoring.v3.ITimeSeries;

/** The slice of MetricServiceClient the tools depend on */
export interface TimeSeriesSource {
  listTimeSeries(
    request: ListTimeSeriesRequest
  ): Promise<[TimeSeries[], ...unknown[]]>;
}

/** Creates a Monitoring client using Application Default Credentials */
export function createMetricSource(): TimeSeriesSource {
  return new MetricServiceClient();
}

/**
 * Runs a time series query and returns every matching series.
 * Errors from the client propagate to the caller.
 */
export async function listTimeSeries(
  source: TimeSeriesSource,
  request: ListTimeSeriesRequest
): Promise<TimeSeries[]> {
  const tracer = getTracer();

  return tracer.startActiveSpan(
    "gcp.monitoring list_time_series",
    { kind: SpanKind.CLIENT },
    async (span) => {
      span.setAttribute("gcp.monitoring.name", request.name ?? "");
      span.setAttribute("gcp.monitoring.filter", request.filter ?? "");

      try {
        const [series] = await source.listTimeSeries(request);
        span.setAttribute("gcp.monitoring.series_count", series.length);
        span.setStatus({ code: SpanStatusCode.OK });
        return series;
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
