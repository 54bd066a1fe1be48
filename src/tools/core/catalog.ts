/**
 * catalog.ts - Names, descriptions and schemas of every monitoring tool
 *
 * One list for everything that needs tool metadata without running a tool:
 * the span processor that records tool definitions on LLM spans, and the
 * tests that check the LangChain wrappers expose the same set.
 */

import type { z } from "zod";
import { getLatestLogsDescription, getLatestLogsSchema } from "./latest-logs";
import { getLatestErrorDescription, getLatestErrorSchema } from "./latest-error";
import { getResourceLogsDescription, getResourceLogsSchema } from "./resource-logs";
import { getLogsDescription, getLogsSchema } from "./time-range-logs";
import {
  getDataflowJobLogsDescription,
  getDataflowJobLogsSchema,
} from "./dataflow-job-logs";
import {
  getDataprocJobLogsDescription,
  getDataprocJobLogsSchema,
} from "./dataproc-job-logs";
import {
  getDataprocClusterLogsByUuidDescription,
  getDataprocClusterLogsByUuidSchema,
  getDataprocClusterLogsDescription,
  getDataprocClusterLogsSchema,
} from "./dataproc-cluster-logs";
import {
  getCpuUtilizationDescription,
  getCpuUtilizationSchema,
} from "./cpu-utilization";

export interface ToolDefinition {
  name: string;
  description: string;
  schema: z.ZodTypeAny;
}

export const TOOL_DEFINITIONS: readonly ToolDefinition[] = [
  { name: "get_latest_logs", description: getLatestLogsDescription, schema: getLatestLogsSchema },
  { name: "get_latest_error", description: getLatestErrorDescription, schema: getLatestErrorSchema },
  {
    name: "get_latest_resource_based_logs",
    description: getResourceLogsDescription,
    schema: getResourceLogsSchema,
  },
  { name: "get_logs", description: getLogsDescription, schema: getLogsSchema },
  {
    name: "get_dataflow_job_logs",
    description: getDataflowJobLogsDescription,
    schema: getDataflowJobLogsSchema,
  },
  {
    name: "get_dataproc_job_logs",
    description: getDataprocJobLogsDescription,
    schema: getDataprocJobLogsSchema,
  },
  {
    name: "get_dataproc_cluster_logs",
    description: getDataprocClusterLogsDescription,
    schema: getDataprocClusterLogsSchema,
  },
  {
    name: "get_dataproc_cluster_logs_by_uuid",
    description: getDataprocClusterLogsByUuidDescription,
    schema: getDataprocClusterLogsByUuidSchema,
  },
  {
    name: "get_cpu_utilization",
    description: getCpuUtilizationDescription,
    schema: getCpuUtilizationSchema,
  },
];
