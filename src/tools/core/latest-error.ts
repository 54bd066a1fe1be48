/**
 * latest-error core - The single most recent ERROR entry
 */

import { z } from "zod";
import {
  defaultMonitoringContext,
  projectIdField,
  runLogQuery,
  type MonitoringContext,
  type ToolResult,
} from "./common";
import { joinFilters, lookbackFilter } from "./filters";
import { formatLogRecord } from "./format-entries";

export const NO_ERROR_ENTRIES_MESSAGE = "No ERROR log entries found.";

export const getLatestErrorSchema = z.object({
  projectId: projectIdField,
});

export type GetLatestErrorInput = z.infer<typeof getLatestErrorSchema>;

export const getLatestErrorDescription = `Fetch the most recent log entry with severity ERROR in a Google Cloud project.

Looks back up to 90 days. Use this when asked "what went wrong last?" or to
find a starting point for an investigation; then use get_logs or
get_latest_resource_based_logs to see the surrounding activity.`;

export async function getLatestError(
  input: GetLatestErrorInput,
  context: MonitoringContext = defaultMonitoringContext
): Promise<ToolResult> {
  return runLogQuery(
    {
      projectId: input.projectId,
      filter: joinFilters(["severity = ERROR", lookbackFilter(context.now())]),
      limit: 1,
      header: "Latest Error Log:",
      action: "fetch latest error log",
      emptyMessage: NO_ERROR_ENTRIES_MESSAGE,
      render: ([latest]) => `Latest Error Log: ${formatLogRecord(latest)}`,
    },
    context
  );
}
