/**
 * dataproc-job-logs core - Driver logs for one Dataproc job
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

export const getDataprocJobLogsSchema = z.object({
  projectId: projectIdField,
  jobId: z.string().min(1).describe("Dataproc job ID"),
  limit: limitField,
});

export type GetDataprocJobLogsInput = z.infer<typeof getDataprocJobLogsSchema>;

export const getDataprocJobLogsDescription = `Fetch the most recent log entries for a Dataproc job, by job ID.

Covers resource type cloud_dataproc_job. Default 10 entries, newest first.`;

export async function getDataprocJobLogs(
  input: GetDataprocJobLogsInput,
  context: MonitoringContext = defaultMonitoringContext
): Promise<ToolResult> {
  return runLogQuery(
    {
      projectId: input.projectId,
      filter: joinFilters([
        equalsClause("resource.type", "cloud_dataproc_job"),
        equalsClause("resource.labels.job_id", input.jobId),
        lookbackFilter(context.now()),
      ]),
      limit: input.limit,
      header: `Fetched log entries for Dataproc job ${input.jobId}:`,
      action: "fetch Dataproc job logs",
    },
    context
  );
}
