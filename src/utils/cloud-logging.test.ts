/**
 * cloud-logging.test.ts - Unit tests for log entry flattening and querying
 */

import { describe, it, expect, vi } from "vitest";
import { Entry } from "@google-cloud/logging";
import {
  formatTimestamp,
  listLogEntries,
  toLogRecord,
  type LogEntrySource,
} from "./cloud-logging";

describe("formatTimestamp", () => {
  it("handles Date, string and protobuf timestamps", () => {
    expect(formatTimestamp(new Date("2025-07-11T02:51:43Z"))).toBe("2025-07-11T02:51:43.000Z");
    expect(formatTimestamp("2025-07-11T02:51:43.123456Z")).toBe("2025-07-11T02:51:43.123456Z");
    expect(formatTimestamp({ seconds: "1752235200", nanos: 250000000 })).toBe(
      "2025-07-11T12:00:00.250Z"
    );
  });

  it("returns an empty string for anything else", () => {
    expect(formatTimestamp(undefined)).toBe("");
    expect(formatTimestamp({ seconds: "soon" })).toBe("");
  });
});

describe("toLogRecord", () => {
  it("prefers textPayload over data", () => {
    const entry = new Entry({
      timestamp: new Date("2025-07-11T02:51:43Z"),
      severity: "WARNING",
      logName: "projects/test-project/logs/dataflow.googleapis.com%2Fworker",
      resource: { type: "dataflow_step", labels: { job_id: "j-1" } },
      textPayload: "Worker pool is resizing",
    }, "ignored");

    expect(toLogRecord(entry)).toEqual({
      timestamp: "2025-07-11T02:51:43.000Z",
      severity: "WARNING",
      logName: "projects/test-project/logs/dataflow.googleapis.com%2Fworker",
      resourceType: "dataflow_step",
      resourceLabels: { job_id: "j-1" },
      message: "Worker pool is resizing",
    });
  });

  it("serializes structured payloads and maps numeric severities", () => {
    const entry = new Entry(
      { timestamp: new Date("2025-07-11T02:51:43Z"), severity: 500 },
      { message: "boom", code: 13 }
    );

    const record = toLogRecord(entry);

    expect(record.severity).toBe("ERROR");
    expect(record.message).toBe('{"message":"boom","code":13}');
    expect(record.resourceType).toBe("");
    expect(record.resourceLabels).toEqual({});
  });

  it("defaults a missing severity to DEFAULT", () => {
    const entry = new Entry({ timestamp: new Date("2025-07-11T02:51:43Z") }, "hello");
    expect(toLogRecord(entry).severity).toBe("DEFAULT");
  });
});

describe("listLogEntries", () => {
  it("requests one page and caps the result at the limit", async () => {
    const entries = [1, 2, 3].map(
      (n) => new Entry({ timestamp: new Date(Date.UTC(2025, 6, 11, 0, n)) }, `entry ${n}`)
    );
    const getEntries = vi.fn<LogEntrySource["getEntries"]>(async () => [entries]);

    const records = await listLogEntries(
      { getEntries },
      { projectId: "test-project", filter: "severity = ERROR", limit: 2 }
    );

    expect(records.map((r) => r.message)).toEqual(["entry 1", "entry 2"]);
    expect(getEntries).toHaveBeenCalledWith({
      resourceNames: ["projects/test-project"],
      filter: "severity = ERROR",
      orderBy: "timestamp desc",
      pageSize: 2,
      maxResults: 2,
      autoPaginate: false,
    });
  });

  it("propagates client errors", async () => {
    const getEntries = vi.fn<LogEntrySource["getEntries"]>(async () => {
      throw new Error("16 UNAUTHENTICATED");
    });

    await expect(
      listLogEntries({ getEntries }, { projectId: "test-project", filter: "", limit: 10 })
    ).rejects.toThrow("16 UNAUTHENTICATED");
  });
});
