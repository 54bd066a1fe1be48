/**
 * time-range-logs core - Log entries between two points in time
 *
 * Both bounds are optional ISO 8601 times. The end defaults to now and the
 * start to 90 days before the end.
 */

import { z } from "zod";
import {
  defaultMonitoringContext,
  errorMessage,
  limitField,
  projectIdField,
  runLogQuery,
  severityField,
  type MonitoringContext,
  type ToolResult,
} from "./common";
import {
  buildSeverityFilter,
  joinFilters,
  lookbackStart,
  parseTimeBound,
  quoteFilterValue,
} from "./filters";

export const getLogsSchema = z.object({
  projectId: projectIdField,
  severity: severityField,
  startTime: z
    .string()
    .optional()
    .describe(
      "Start of the range, ISO 8601 (e.g., '2025-07-11T00:00:00Z'). Defaults to 90 days before endTime"
    ),
  endTime: z
    .string()
    .optional()
    .describe("End of the range, ISO 8601. Defaults to now"),
  limit: limitField,
});

export type GetLogsInput = z.infer<typeof getLogsSchema>;

export const getLogsDescription = `Fetch log entries in a Google Cloud project within a time range.

Use this when the user mentions a time ("last night", "between 2 and 3 PM
UTC on July 11"): convert it to ISO 8601 startTime/endTime. Optionally
filter by severity. Entries come back newest first (default 10).`;

export async function getLogs(
  input: GetLogsInput,
  context: MonitoringContext = defaultMonitoringContext
): Promise<ToolResult> {
  let start: Date;
  let end: Date;
  try {
    end = parseTimeBound("endTime", input.endTime) ?? context.now();
    start = parseTimeBound("startTime", input.startTime) ?? lookbackStart(end);
  } catch (error) {
    return { output: errorMessage(error), isError: true };
  }

  if (start.getTime() > end.getTime()) {
    return {
      output: `startTime (${start.toISOString()}) must not be after endTime (${end.toISOString()})`,
      isError: true,
    };
  }

  return runLogQuery(
    {
      projectId: input.projectId,
      filter: joinFilters([
        buildSeverityFilter(input.severity),
        `timestamp >= ${quoteFilterValue(start.toISOString())}`,
        `timestamp <= ${quoteFilterValue(end.toISOString())}`,
      ]),
      limit: input.limit,
      header: "Fetched filtered log entries:",
      action: "fetch logs",
    },
    context
  );
}
