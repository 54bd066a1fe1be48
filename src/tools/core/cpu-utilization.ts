/**
 * cpu-utilization core - Recent CPU utilization of Compute Engine instances
 *
 * Queries Cloud Monitoring for the last five minutes of
 * compute.googleapis.com/instance/cpu/utilization, aligned to one-minute
 * means and averaged per instance and zone. Values are fractions (0..1) in
 * the API and percentages in the report:
 *
 *   CPU Utilization Data:
 *     Instance ID: 1234567890, Zone: us-central1-a
 *       Timestamp: 2025-07-11T02:51:00.000Z, Value: 42.50%
 */

import { z } from "zod";
import {
  defaultMonitoringContext,
  failure,
  MISSING_PROJECT_MESSAGE,
  projectIdField,
  resolveProjectId,
  type MonitoringContext,
  type ToolResult,
} from "./common";
import { quoteFilterValue } from "./filters";
import { formatTimestamp } from "../../utils/cloud-logging";
import {
  listTimeSeries,
  type ListTimeSeriesRequest,
  type TimeSeries,
} from "../../utils/cloud-monitoring";

export const CPU_UTILIZATION_METRIC =
  "compute.googleapis.com/instance/cpu/utilization";

export const NO_CPU_DATA_MESSAGE =
  "No CPU utilization data found for the specified project and time range.";

const WINDOW_MS = 5 * 60 * 1000;
const ALIGNMENT_SECONDS = 60;

export const getCpuUtilizationSchema = z.object({
  projectId: projectIdField,
});

export type GetCpuUtilizationInput = z.infer<typeof getCpuUtilizationSchema>;

export const getCpuUtilizationDescription = `Fetch CPU utilization of the Compute Engine instances in a Google Cloud project over the last 5 minutes.

Returns one block per instance (instance ID and zone) with a one-minute
average per line, as a percentage. Use this to spot overloaded or idle VMs,
including Dataproc cluster nodes.`;

/** Builds the Monitoring query for the five minutes before `now` */
export function buildCpuUtilizationRequest(
  projectId: string,
  now: Date
): ListTimeSeriesRequest {
  const endSeconds = Math.floor(now.getTime() / 1000);
  const startSeconds = Math.floor((now.getTime() - WINDOW_MS) / 1000);

  return {
    name: `projects/${projectId}`,
    filter: `metric.type = ${quoteFilterValue(CPU_UTILIZATION_METRIC)}`,
    interval: {
      startTime: { seconds: startSeconds },
      endTime: { seconds: endSeconds },
    },
    aggregation: {
      alignmentPeriod: { seconds: ALIGNMENT_SECONDS },
      perSeriesAligner: "ALIGN_MEAN",
      crossSeriesReducer: "REDUCE_MEAN",
      groupByFields: ["resource.labels.instance_id", "resource.labels.zone"],
    },
    view: "FULL",
  };
}

/** Renders series as the indented per-instance report */
export function formatCpuUtilization(series: TimeSeries[]): string {
  if (series.length === 0) {
    return NO_CPU_DATA_MESSAGE;
  }

  const lines = ["CPU Utilization Data:"];
  for (const entry of series) {
    const labels = entry.resource?.labels ?? {};
    lines.push(
      `  Instance ID: ${labels.instance_id ?? "unknown"}, Zone: ${labels.zone ?? "unknown"}`
    );
    for (const point of entry.points ?? []) {
      const value = point.value?.doubleValue;
      if (typeof value !== "number") continue;
      const timestamp = formatTimestamp(point.interval?.endTime);
      lines.push(
        `    Timestamp: ${timestamp}, Value: ${(value * 100).toFixed(2)}%`
      );
    }
  }
  return lines.join("\n");
}

export async function getCpuUtilization(
  input: GetCpuUtilizationInput,
  context: MonitoringContext = defaultMonitoringContext
): Promise<ToolResult> {
  const projectId = resolveProjectId(input.projectId, context.env);
  if (!projectId) {
    return { output: MISSING_PROJECT_MESSAGE, isError: true };
  }

  try {
    const series = await listTimeSeries(
      context.metricSource(),
      buildCpuUtilizationRequest(projectId, context.now())
    );
    return { output: formatCpuUtilization(series), isError: false };
  } catch (error) {
    return failure("fetch CPU utilization", error);
  }
}
