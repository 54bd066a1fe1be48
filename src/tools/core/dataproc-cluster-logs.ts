/**
 * dataproc-cluster-logs core - Cluster logs by cluster name or cluster UUID
 *
 * Two tools over one query shape: names are what users usually know, while
 * UUIDs distinguish a recreated cluster from its predecessor of the same name.
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

type ClusterLabel = "cluster_name" | "cluster_uuid";

function clusterLogs(
  projectId: string | undefined,
  label: ClusterLabel,
  value: string,
  limit: number | undefined,
  context: MonitoringContext
): Promise<ToolResult> {
  return runLogQuery(
    {
      projectId,
      filter: joinFilters([
        equalsClause("resource.type", "cloud_dataproc_cluster"),
        equalsClause(`resource.labels.${label}`, value),
        lookbackFilter(context.now()),
      ]),
      limit,
      header: `Fetched log entries for Dataproc cluster ${value}:`,
      action: "fetch Dataproc cluster logs",
    },
    context
  );
}

export const getDataprocClusterLogsSchema = z.object({
  projectId: projectIdField,
  clusterName: z.string().min(1).describe("Dataproc cluster name"),
  limit: limitField,
});

export type GetDataprocClusterLogsInput = z.infer<
  typeof getDataprocClusterLogsSchema
>;

export const getDataprocClusterLogsDescription = `Fetch the most recent log entries for a Dataproc cluster, by cluster name.

Covers resource type cloud_dataproc_cluster: provisioning, autoscaling, node
and agent messages. Default 10 entries, newest first. If several clusters
have shared this name over time, use get_dataproc_cluster_logs_by_uuid.`;

export async function getDataprocClusterLogs(
  input: GetDataprocClusterLogsInput,
  context: MonitoringContext = defaultMonitoringContext
): Promise<ToolResult> {
  return clusterLogs(
    input.projectId,
    "cluster_name",
    input.clusterName,
    input.limit,
    context
  );
}

export const getDataprocClusterLogsByUuidSchema = z.object({
  projectId: projectIdField,
  clusterUuid: z
    .string()
    .uuid()
    .describe("Dataproc cluster UUID (e.g., '6f1c2d3e-4a5b-4c6d-8e7f-9a0b1c2d3e4f')"),
  limit: limitField,
});

export type GetDataprocClusterLogsByUuidInput = z.infer<
  typeof getDataprocClusterLogsByUuidSchema
>;

export const getDataprocClusterLogsByUuidDescription = `Fetch the most recent log entries for a Dataproc cluster, by cluster UUID.

Same as get_dataproc_cluster_logs but matches one specific cluster instance.
Default 10 entries, newest first.`;

export async function getDataprocClusterLogsByUuid(
  input: GetDataprocClusterLogsByUuidInput,
  context: MonitoringContext = defaultMonitoringContext
): Promise<ToolResult> {
  return clusterLogs(
    input.projectId,
    "cluster_uuid",
    input.clusterUuid,
    input.limit,
    context
  );
}
