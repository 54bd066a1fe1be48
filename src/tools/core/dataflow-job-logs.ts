/**
 * dataflow-job-logs core - Worker and step logs for one Dataflow job
 */

import { z } from "zod";
import {
  defaultMonitoringContext,
  limitField,
  projectIdField,
  runLogQuery,
  type MonitoringContext,
  type ToolResult,
} from "./common";
import { equalsClause, joinFilters, lookbackFilter } from "./filters";

export const getDataflowJobLogsSchema = z.object({
  projectId: projectIdField,
  jobId: z
    .string()
    .min(1)
    .describe("Dataflow job ID (e.g., '2025-07-11_02_51_43-1234567890123456789')"),
  limit: limitField,
});

export type GetDataflowJobLogsInput = z.infer<typeof getDataflowJobLogsSchema>;

export const getDataflowJobLogsDescription = `Fetch the most recent log entries for a Dataflow job, by job ID.

Covers the job's steps (resource type dataflow_step). Use this to see why a
pipeline failed, stalled or ran slowly. Default 10 entries, newest first.`;

export async function getDataflowJobLogs(
  input: GetDataflowJobLogsInput,
  context: MonitoringContext = defaultMonitoringContext
): Promise<ToolResult> {
  return runLogQuery(
    {
      projectId: input.projectId,
      filter: joinFilters([
        equalsClause("resource.type", "dataflow_step"),
        equalsClause("resource.labels.job_id", input.jobId),
        lookbackFilter(context.now()),
      ]),
      limit: input.limit,
      header: `Fetched log entries for Dataflow job ${input.jobId}:`,
      action: "fetch Dataflow job logs",
    },
    context
  );
}
