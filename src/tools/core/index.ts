/**
 * Core monitoring tools - Shared logic for all interfaces
 *
 * This module re-exports all core tool functions, schemas, and descriptions.
 * The LangChain wrappers and the `logs` CLI command both import from here.
 *
 * Usage:
 *   import { getLatestLogs, getLatestLogsSchema } from "./tools/core";
 */

export {
  defaultMonitoringContext,
  resolveProjectId,
  runLogQuery,
  DEFAULT_LIMIT,
  MAX_LIMIT,
  MISSING_PROJECT_MESSAGE,
  type MonitoringContext,
  type ToolResult,
} from "./common";

export {
  getLatestLogs,
  getLatestLogsSchema,
  getLatestLogsDescription,
  type GetLatestLogsInput,
} from "./latest-logs";

export {
  getLatestError,
  getLatestErrorSchema,
  getLatestErrorDescription,
  type GetLatestErrorInput,
} from "./latest-error";

export {
  getResourceLogs,
  getResourceLogsSchema,
  getResourceLogsDescription,
  type GetResourceLogsInput,
} from "./resource-logs";

export {
  getLogs,
  getLogsSchema,
  getLogsDescription,
  type GetLogsInput,
} from "./time-range-logs";

export {
  getDataflowJobLogs,
  getDataflowJobLogsSchema,
  getDataflowJobLogsDescription,
  type GetDataflowJobLogsInput,
} from "./dataflow-job-logs";

export {
  getDataprocJobLogs,
  getDataprocJobLogsSchema,
  getDataprocJobLogsDescription,
  type GetDataprocJobLogsInput,
} from "./dataproc-job-logs";

export {
  getDataprocClusterLogs,
  getDataprocClusterLogsSchema,
  getDataprocClusterLogsDescription,
  getDataprocClusterLogsByUuid,
  getDataprocClusterLogsByUuidSchema,
  getDataprocClusterLogsByUuidDescription,
  type GetDataprocClusterLogsInput,
  type GetDataprocClusterLogsByUuidInput,
} from "./dataproc-cluster-logs";

export {
  getCpuUtilization,
  getCpuUtilizationSchema,
  getCpuUtilizationDescription,
  type GetCpuUtilizationInput,
} from "./cpu-utilization";

export { formatLogRecord, formatLogReport } from "./format-entries";
export { SEVERITY_LEVELS, type SeverityLevel } from "./filters";
export { TOOL_DEFINITIONS, type ToolDefinition } from "./catalog";
