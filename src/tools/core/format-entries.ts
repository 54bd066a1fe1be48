/**
 * format-entries.ts - Renders log records as numbered text reports
 *
 * The agent reads these reports as plain text, so each entry is one line
 * (continuation lines of multi-line messages are indented under it):
 *
 *   Fetched recent log entries:
 *   Entry 1: [2025-07-11T02:51:43.000Z] ERROR gce_instance{instance_id=42} projects/p/logs/syslog: disk full
 */

import type { LogRecord } from "../../utils/cloud-logging";

export const NO_ENTRIES_MESSAGE = "No log entries found matching the criteria.";

/** Formats one record as `[timestamp] SEVERITY resource logName: message` */
export function formatLogRecord(record: LogRecord): string {
  const labels = Object.entries(record.resourceLabels)
    .map(([key, value]) => `${key}=${value}`)
    .join(",");
  const resource = record.resourceType
    ? `${record.resourceType}${labels ? `{${labels}}` : ""}`
    : "";

  const prefix = [
    record.timestamp ? `[${record.timestamp}]` : "",
    record.severity,
    resource,
    record.logName,
  ]
    .filter((part) => part !== "")
    .join(" ");

  return `${prefix}: ${record.message.replace(/\n/g, "\n   ")}`;
}

/**
 * Formats records under a header line, numbered from 1.
 * Returns `emptyMessage` when there are no records.
 */
export function formatLogReport(
  header: string,
  records: LogRecord[],
  emptyMessage: string = NO_ENTRIES_MESSAGE
): string {
  if (records.length === 0) {
    return emptyMessage;
  }

  const lines = records.map(
    (record, i) => `Entry ${i + 1}: ${formatLogRecord(record)}`
  );
  return `${header}\n${lines.join("\n")}`;
}
