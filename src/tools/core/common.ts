/**
 * common.ts - Shared inputs and plumbing for the monitoring tools
 *
 * Every log tool follows the same shape: resolve the project, build a
 * filter, fetch the latest N entries, format them. runLogQuery() does the
 * fetch-and-format half and turns failures into `{ output, isError }`
 * results, so the agent sees an error message instead of a thrown exception.
 *
 * MonitoringContext carries the clients and the clock. Production code uses
 * defaultMonitoringContext; tests pass fakes.
 */

import { z } from "zod";
import {
  createLogSource,
  listLogEntries,
  type LogEntrySource,
  type LogRecord,
} from "../../utils/cloud-logging";
import {
  createMetricSource,
  type TimeSeriesSource,
} from "../../utils/cloud-monitoring";
import { formatLogReport, NO_ENTRIES_MESSAGE } from "./format-entries";

/** What every core tool returns; isError is surfaced to MCP clients */
export interface ToolResult {
  output: string;
  isError: boolean;
}

export interface MonitoringContext {
  logSource(projectId: string): LogEntrySource;
  metricSource(): TimeSeriesSource;
  now(): Date;
  env: NodeJS.ProcessEnv;
}

export const defaultMonitoringContext: MonitoringContext = {
  logSource: createLogSource,
  metricSource: createMetricSource,
  now: () => new Date(),
  env: process.env,
};

export const DEFAULT_LIMIT = 10;
export const MAX_LIMIT = 1000;

export const MISSING_PROJECT_MESSAGE =
  "A Google Cloud project ID is required. Pass projectId or set GOOGLE_CLOUD_PROJECT.";

export const projectIdField = z
  .string()
  .min(1)
  .optional()
  .describe(
    "Google Cloud project ID (e.g., 'my-project'). Omit to use GOOGLE_CLOUD_PROJECT"
  );

export const limitField = z
  .number()
  .int()
  .min(1)
  .max(MAX_LIMIT)
  .optional()
  .describe(`Maximum number of entries to return, newest first (default ${DEFAULT_LIMIT})`);

export const severityField = z
  .string()
  .optional()
  .describe(
    "Severity to match: a level such as 'ERROR' or a comparison such as 'severity >= WARNING'. Omit for all severities"
  );

/** Input project ID, else GOOGLE_CLOUD_PROJECT, else undefined */
export function resolveProjectId(
  projectId: string | undefined,
  env: NodeJS.ProcessEnv
): string | undefined {
  const candidate = projectId?.trim() || env.GOOGLE_CLOUD_PROJECT?.trim();
  return candidate ? candidate : undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function failure(action: string, error: unknown): ToolResult {
  return { output: `Failed to ${action}: ${errorMessage(error)}`, isError: true };
}

export interface LogQueryRequest {
  projectId: string | undefined;
  filter: string;
  limit?: number;
  /** First line of the report */
  header: string;
  /** Completes "Failed to ..." when the query throws */
  action: string;
  emptyMessage?: string;
  /** Replaces the numbered report when a tool needs a different layout */
  render?: (records: LogRecord[]) => string;
}

/**
 * Fetches the latest entries matching a filter and formats the report.
 * Never throws: a missing project or a client error becomes an error result.
 */
export async function runLogQuery(
  request: LogQueryRequest,
  context: MonitoringContext
): Promise<ToolResult> {
  const projectId = resolveProjectId(request.projectId, context.env);
  if (!projectId) {
    return { output: MISSING_PROJECT_MESSAGE, isError: true };
  }

  try {
    const records = await listLogEntries(context.logSource(projectId), {
      projectId,
      filter: request.filter,
      limit: request.limit ?? DEFAULT_LIMIT,
    });
    const emptyMessage = request.emptyMessage ?? NO_ENTRIES_MESSAGE;
    if (records.length > 0 && request.render) {
      return { output: request.render(records), isError: false };
    }
    return {
      output: formatLogReport(request.header, records, emptyMessage),
      isError: false,
    };
  } catch (error) {
    return failure(request.action, error);
  }
}
