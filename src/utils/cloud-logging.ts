/**
 * cloud-logging.ts - Reads log entries from Google Cloud Logging
 *
 * How it works:
 * 1. A LogEntrySource (the @google-cloud/logging client, or a fake in tests)
 *    receives a filter, an order and a page size
 * 2. The returned Entry objects are flattened into LogRecord values that
 *    the formatting code can render without knowing the SDK's types
 *
 * Why an interface instead of using Logging directly?
 * The monitoring tools only ever call getEntries(). Typing the dependency as
 * that one method lets tests hand in an object with a stubbed getEntries,
 * with no credentials and no network.
 *
 * OpenTelemetry instrumentation:
 * Every query creates a CLIENT span "gcp.logging list_entries" carrying the
 * project, the filter and the number of entries returned.
 */

import { Logging, type Entry } from "@google-cloud/logging";
import type { GetEntriesRequest } from "@google-cloud/logging/build/src/log";
import { SpanKind, SpanStatusCode } from "@opentelemetry/api";
import { getTracer } from "../tracing";

/** The slice of the Logging client the tools depend on */
export interface LogEntrySource {
  getEntries(options: GetEntriesRequest): Promise<[Entry[], ...unknown[]]>;
}

/**
 * A log entry reduced to the fields the tools display.
 * Fields the backend left empty become "" (or {} for labels).
 */
export interface LogRecord {
  timestamp: string;
  severity: string;
  logName: string;
  resourceType: string;
  resourceLabels: Record<string, string>;
  message: string;
}

export interface LogQuery {
  projectId: string;
  filter: string;
  /** Maximum number of entries to return (most recent first) */
  limit: number;
}

/** Cloud Logging returns severities as enum numbers in some code paths */
const SEVERITY_BY_NUMBER: Readonly<Record<number, string>> = {
  0: "DEFAULT",
  100: "DEBUG",
  200: "INFO",
  300: "NOTICE",
  400: "WARNING",
  500: "ERROR",
  600: "CRITICAL",
  700: "ALERT",
  800: "EMERGENCY",
};

/**
 * Creates a Logging client bound to a project.
 * Credentials come from Application Default Credentials.
 */
export function createLogSource(projectId: string): LogEntrySource {
  return new Logging({ projectId });
}

/**
 * Runs a log query and returns the matching records, most recent first.
 *
 * Only one page is requested: the tools always want "the latest N", never
 * the whole history. Errors from the client propagate to the caller.
 */
export async function listLogEntries(
  source: LogEntrySource,
  query: LogQuery
): Promise<LogRecord[]> {
  const tracer = getTracer();

  return tracer.startActiveSpan(
    "gcp.logging list_entries",
    { kind: SpanKind.CLIENT },
    async (span) => {
      span.setAttribute("gcp.project_id", query.projectId);
      span.setAttribute("gcp.logging.filter", query.filter);
      span.setAttribute("gcp.logging.limit", query.limit);

      try {
        const [entries] = await source.getEntries({
          resourceNames: [`projects/${query.projectId}`],
          filter: query.filter,
          orderBy: "timestamp desc",
          pageSize: query.limit,
          maxResults: query.limit,
          autoPaginate: false,
        });

        const records = entries.slice(0, query.limit).map(toLogRecord);
        span.setAttribute("gcp.logging.entry_count", records.length);
        span.setStatus({ code: SpanStatusCode.OK });
        return records;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        span.recordException(error instanceof Error ? error : new Error(message));
        span.setStatus({ code: SpanStatusCode.ERROR, message });
        throw error;
      } finally {
        span.end();
      }
    }
  );
}

/**
 * Flattens an SDK Entry into a LogRecord.
 *
 * The message comes from textPayload when present; otherwise from the
 * entry's data (the decoded text, JSON or proto payload).
 */
export function toLogRecord(entry: Pick<Entry, "metadata" | "data">): LogRecord {
  const { metadata } = entry;

  return {
    timestamp: formatTimestamp(metadata.timestamp),
    severity: formatSeverity(metadata.severity),
    logName: metadata.logName ?? "",
    resourceType: metadata.resource?.type ?? "",
    resourceLabels: { ...(metadata.resource?.labels ?? {}) },
    message: metadata.textPayload ?? formatPayload(entry.data),
  };
}

/**
 * Normalizes the timestamp shapes the SDK produces (Date, RFC 3339 string,
 * or a protobuf {seconds, nanos} object) to an ISO string.
 */
export function formatTimestamp(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "object" && value !== null && "seconds" in value) {
    const seconds = Number(String(value.seconds));
    const nanos =
      "nanos" in value && typeof value.nanos === "number" ? value.nanos : 0;
    if (Number.isFinite(seconds)) {
      return new Date(seconds * 1000 + Math.floor(nanos / 1e6)).toISOString();
    }
  }
  return "";
}

function formatSeverity(value: unknown): string {
  if (typeof value === "number") {
    return SEVERITY_BY_NUMBER[value] ?? String(value);
  }
  if (typeof value === "string" && value !== "") {
    return value.toUpperCase();
  }
  return "DEFAULT";
}

function formatPayload(data: unknown): string {
  if (data === undefined || data === null) {
    return "";
  }
  if (typeof data === "string") {
    return data;
  }
  return JSON.stringify(data);
}
