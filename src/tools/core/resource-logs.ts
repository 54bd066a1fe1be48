/**
 * resource-logs core - Recent log entries for one monitored resource type
 *
 * Narrows the log stream to a single kind of resource (gce_instance,
 * gcs_bucket, dataflow_step, ...), optionally by severity.
 */

import { z } from "zod";
import {
  defaultMonitoringContext,
  limitField,
  projectIdField,
  runLogQuery,
  severityField,
  type MonitoringContext,
  type ToolResult,
} from "./common";
import {
  buildSeverityFilter,
  equalsClause,
  joinFilters,
  lookbackFilter,
  parseResourceType,
} from "./filters";

export const getResourceLogsSchema = z.object({
  projectId: projectIdField,
  resource: z
    .string()
    .min(1)
    .describe(
      "Monitored resource type, bare or prefixed (e.g., 'gce_instance' or 'resource.type=gcs_bucket')"
    ),
  severity: severityField,
  limit: limitField,
});

export type GetResourceLogsInput = z.infer<typeof getResourceLogsSchema>;

export const getResourceLogsDescription = `Fetch recent log entries for one monitored resource type in a Google Cloud project.

Common types: gce_instance, gcs_bucket, dataflow_step, cloud_dataproc_cluster,
cloud_dataproc_job, pubsub_topic, service_account, audited_resource, project.
Optionally filter by severity and cap the number of entries (default 10).`;

export async function getResourceLogs(
  input: GetResourceLogsInput,
  context: MonitoringContext = defaultMonitoringContext
): Promise<ToolResult> {
  const resourceType = parseResourceType(input.resource);
  if (!resourceType) {
    return {
      output: `Invalid resource type "${input.resource}": expected a name such as gce_instance or resource.type=gce_instance`,
      isError: true,
    };
  }

  return runLogQuery(
    {
      projectId: input.projectId,
      filter: joinFilters([
        equalsClause("resource.type", resourceType),
        buildSeverityFilter(input.severity),
        lookbackFilter(context.now()),
      ]),
      limit: input.limit,
      header: "Fetched recent log entries:",
      action: "fetch resource logs",
    },
    context
  );
}
