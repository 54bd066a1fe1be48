/**
 * LangChain tool wrappers for the monitoring tools
 *
 * This module wraps the core functions with LangChain's tool() helper.
 * The monitoring agent imports from here to get tools it can use in the
 * agentic loop.
 *
 * Why separate wrappers?
 * The core logic (schemas, query building, formatting) lives in ../core/.
 * The `logs` CLI command calls the core directly; the agent needs the same
 * functions in LangChain's Tool shape.
 *
 * Core functions return { output, isError }. LangChain tools return a string,
 * so the wrappers pass on just the output: the agent reads error messages
 * ("Failed to fetch ...") as text and adjusts its next step.
 *
 * OpenTelemetry tracing:
 * Each tool is wrapped with withToolTracing(), creating the hierarchy
 *   execute_tool get_latest_error → gcp.logging list_entries
 */

import { tool } from "@langchain/core/tools";
import {
  defaultMonitoringContext,
  getLatestLogs,
  getLatestLogsSchema,
  getLatestLogsDescription,
  getLatestError,
  getLatestErrorSchema,
  getLatestErrorDescription,
  getResourceLogs,
  getResourceLogsSchema,
  getResourceLogsDescription,
  getLogs,
  getLogsSchema,
  getLogsDescription,
  getDataflowJobLogs,
  getDataflowJobLogsSchema,
  getDataflowJobLogsDescription,
  getDataprocJobLogs,
  getDataprocJobLogsSchema,
  getDataprocJobLogsDescription,
  getDataprocClusterLogs,
  getDataprocClusterLogsSchema,
  getDataprocClusterLogsDescription,
  getDataprocClusterLogsByUuid,
  getDataprocClusterLogsByUuidSchema,
  getDataprocClusterLogsByUuidDescription,
  getCpuUtilization,
  getCpuUtilizationSchema,
  getCpuUtilizationDescription,
  type GetLatestLogsInput,
  type GetLatestErrorInput,
  type GetResourceLogsInput,
  type GetLogsInput,
  type GetDataflowJobLogsInput,
  type GetDataprocJobLogsInput,
  type GetDataprocClusterLogsInput,
  type GetDataprocClusterLogsByUuidInput,
  type GetCpuUtilizationInput,
  type MonitoringContext,
  type ToolResult,
} from "../core";
import { withToolTracing } from "../../tracing/tool-tracing";

/** Traces a core tool and reduces its result to the text the agent reads */
function asAgentHandler<TInput>(
  name: string,
  run: (input: TInput) => Promise<ToolResult>
): (input: TInput) => Promise<string> {
  const traced = withToolTracing(name, run);
  return async (input: TInput) => (await traced(input)).output;
}

/**
 * Creates the LangChain tools bound to a monitoring context.
 *
 * @param ctx - Clients and clock; tests pass fakes
 */
export function createMonitoringTools(
  ctx: MonitoringContext = defaultMonitoringContext
) {
  return [
    tool(
      asAgentHandler("get_latest_logs", (input: GetLatestLogsInput) =>
        getLatestLogs(input, ctx)
      ),
      {
        name: "get_latest_logs",
        description: getLatestLogsDescription,
        schema: getLatestLogsSchema,
      }
    ),
    tool(
      asAgentHandler("get_latest_error", (input: GetLatestErrorInput) =>
        getLatestError(input, ctx)
      ),
      {
        name: "get_latest_error",
        description: getLatestErrorDescription,
        schema: getLatestErrorSchema,
      }
    ),
    tool(
      asAgentHandler(
        "get_latest_resource_based_logs",
        (input: GetResourceLogsInput) => getResourceLogs(input, ctx)
      ),
      {
        name: "get_latest_resource_based_logs",
        description: getResourceLogsDescription,
        schema: getResourceLogsSchema,
      }
    ),
    tool(
      asAgentHandler("get_logs", (input: GetLogsInput) =>
        getLogs(input, ctx)
      ),
      {
        name: "get_logs",
        description: getLogsDescription,
        schema: getLogsSchema,
      }
    ),
    tool(
      asAgentHandler(
        "get_dataflow_job_logs",
        (input: GetDataflowJobLogsInput) => getDataflowJobLogs(input, ctx)
      ),
      {
        name: "get_dataflow_job_logs",
        description: getDataflowJobLogsDescription,
        schema: getDataflowJobLogsSchema,
      }
    ),
    tool(
      asAgentHandler(
        "get_dataproc_job_logs",
        (input: GetDataprocJobLogsInput) => getDataprocJobLogs(input, ctx)
      ),
      {
        name: "get_dataproc_job_logs",
        description: getDataprocJobLogsDescription,
        schema: getDataprocJobLogsSchema,
      }
    ),
    tool(
      asAgentHandler(
        "get_dataproc_cluster_logs",
        (input: GetDataprocClusterLogsInput) =>
          getDataprocClusterLogs(input, ctx)
      ),
      {
        name: "get_dataproc_cluster_logs",
        description: getDataprocClusterLogsDescription,
        schema: getDataprocClusterLogsSchema,
      }
    ),
    tool(
      asAgentHandler(
        "get_dataproc_cluster_logs_by_uuid",
        (input: GetDataprocClusterLogsByUuidInput) =>
          getDataprocClusterLogsByUuid(input, ctx)
      ),
      {
        name: "get_dataproc_cluster_logs_by_uuid",
        description: getDataprocClusterLogsByUuidDescription,
        schema: getDataprocClusterLogsByUuidSchema,
      }
    ),
    tool(
      asAgentHandler(
        "get_cpu_utilization",
        (input: GetCpuUtilizationInput) => getCpuUtilization(input, ctx)
      ),
      {
        name: "get_cpu_utilization",
        description: getCpuUtilizationDescription,
        schema: getCpuUtilizationSchema,
      }
    ),
  ];
}
