/**
 * format-entries.test.ts - Unit tests for log report rendering
 */

import { describe, it, expect } from "vitest";
import { formatLogRecord, formatLogReport, NO_ENTRIES_MESSAGE } from "./format-entries";
import type { LogRecord } from "../../utils/cloud-logging";

const record: LogRecord = {
  timestamp: "2025-07-11T11:59:00.000Z",
  severity: "ERROR",
  logName: "projects/test-project/logs/syslog",
  resourceType: "gce_instance",
  resourceLabels: { instance_id: "42", zone: "us-central1-a" },
  message: "disk full",
};

describe("formatLogRecord", () => {
  it("renders timestamp, severity, resource, log name and message", () => {
    expect(formatLogRecord(record)).toBe(
      "[2025-07-11T11:59:00.000Z] ERROR gce_instance{instance_id=42,zone=us-central1-a} projects/test-project/logs/syslog: disk full"
    );
  });

  it("omits empty parts", () => {
    expect(
      formatLogRecord({
        ...record,
        timestamp: "",
        logName: "",
        resourceLabels: {},
      })
    ).toBe("ERROR gce_instance: disk full");
  });

  it("indents continuation lines of multi-line messages", () => {
    expect(
      formatLogRecord({ ...record, resourceLabels: {}, logName: "", message: "Traceback:\n  line 1" })
    ).toBe("[2025-07-11T11:59:00.000Z] ERROR gce_instance: Traceback:\n     line 1");
  });
});

describe("formatLogReport", () => {
  it("numbers entries under the header", () => {
    const second: LogRecord = { ...record, severity: "INFO", message: "booted" };
    expect(formatLogReport("Fetched recent log entries:", [record, second])).toBe(
      "Fetched recent log entries:\n" +
        `Entry 1: ${formatLogRecord(record)}\n` +
        `Entry 2: ${formatLogRecord(second)}`
    );
  });

  it("returns the empty message when there are no entries", () => {
    expect(formatLogReport("Fetched recent log entries:", [])).toBe(NO_ENTRIES_MESSAGE);
    expect(formatLogReport("h", [], "nothing")).toBe("nothing");
  });
});
