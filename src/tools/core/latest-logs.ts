/**
 * latest-logs core - The ten most recent log entries in a project
 *
 * The quickest "what's happening right now?" view. An optional severity
 * narrows it to, say, warnings and above.
 */

import { z } from "zod";
import {
  defaultMonitoringContext,
  projectIdField,
  runLogQuery,
  severityField,
  type MonitoringContext,
  type ToolResult,
} from "./common";
import { buildSeverityFilter, joinFilters, lookbackFilter } from "./filters";

export const LATEST_LOGS_LIMIT = 10;

export const getLatestLogsSchema = z.object({
  projectId: projectIdField,
  severity: severityField,
});

export type GetLatestLogsInput = z.infer<typeof getLatestLogsSchema>;

export const getLatestLogsDescription = `Fetch the 10 most recent log entries in a Google Cloud project.

Use this first to get a feel for current activity. Optionally filter by
severity ('ERROR', 'WARNING', or 'severity >= WARNING').

Entries come back newest first, one line each:
[timestamp] SEVERITY resource_type{labels} log_name: message`;

export async function getLatestLogs(
  input: GetLatestLogsInput,
  context: MonitoringContext = defaultMonitoringContext
): Promise<ToolResult> {
  return runLogQuery(
    {
      projectId: input.projectId,
      filter: joinFilters([
        buildSeverityFilter(input.severity),
        lookbackFilter(context.now()),
      ]),
      limit: LATEST_LOGS_LIMIT,
      header: "Fetched recent log entries:",
      action: "fetch latest logs",
    },
    context
  );
}
