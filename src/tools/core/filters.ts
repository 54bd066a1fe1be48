/**
 * filters.ts - Builds Cloud Logging filter expressions from tool inputs
 *
 * Agents pass loosely formatted values ("error", "severity >= WARNING",
 * "resource.type=gce_instance", "2025-07-11T02:51:43Z"). These helpers turn
 * them into valid clauses of the Logging query language, joined with AND:
 *
 *   resource.type="dataflow_step" AND resource.labels.job_id="2025-07-11_..."
 *     AND severity >= WARNING AND timestamp >= "2025-04-12T00:00:00.000Z"
 *
 * Every user-supplied value is emitted as a quoted string, so a job ID
 * containing quotes or "OR" can't change the shape of the query.
 */

import { z } from "zod";

/** Cloud Logging severities, lowest to highest */
export const SEVERITY_LEVELS = [
  "DEFAULT",
  "DEBUG",
  "INFO",
  "NOTICE",
  "WARNING",
  "ERROR",
  "CRITICAL",
  "ALERT",
  "EMERGENCY",
] as const;

export type SeverityLevel = (typeof SEVERITY_LEVELS)[number];

/** How far back queries without explicit times look */
export const LOOKBACK_DAYS = 90;

const DAY_MS = 24 * 60 * 60 * 1000;

/** "severity >= WARNING", "severity=error", "severity = \"INFO\"" */
const SEVERITY_COMPARISON =
  /^severity\s*(>=|<=|!=|=|>|<)\s*"?([A-Za-z]+)"?$/i;

/** "resource.type=gce_instance", "resource.type = \"gcs_bucket\"" */
const RESOURCE_TYPE_PREFIX = /^resource\.type\s*=\s*"?([^"]*)"?$/i;

const RESOURCE_TYPE_NAME = /^[A-Za-z0-9_./-]+$/;

function isSeverityLevel(value: string): value is SeverityLevel {
  return (SEVERITY_LEVELS as readonly string[]).includes(value);
}

/**
 * Builds a severity clause.
 *
 * Accepts a bare level ("error", "WARN") or a comparison
 * ("severity >= WARNING"). Anything else, including an empty string,
 * yields undefined: the query then covers every severity.
 */
export function buildSeverityFilter(input: string | undefined): string | undefined {
  const trimmed = input?.trim() ?? "";
  if (trimmed === "") {
    return undefined;
  }

  const comparison = SEVERITY_COMPARISON.exec(trimmed);
  const operator = comparison ? comparison[1] : "=";
  const word = (comparison ? comparison[2] : trimmed).toUpperCase();
  const level = word === "WARN" ? "WARNING" : word;

  return isSeverityLevel(level) ? `severity ${operator} ${level}` : undefined;
}

/**
 * Extracts a resource type name from "gce_instance" or
 * "resource.type=gce_instance".
 *
 * @returns The bare type name, or undefined when the input isn't a
 *   plausible monitored resource type
 */
export function parseResourceType(input: string): string | undefined {
  const trimmed = input.trim();
  const prefixed = RESOURCE_TYPE_PREFIX.exec(trimmed);
  const name = (prefixed ? prefixed[1] : trimmed).trim();
  return RESOURCE_TYPE_NAME.test(name) ? name : undefined;
}

/**
 * Quotes a value for the Logging query language.
 * Backslashes and double quotes are escaped.
 */
export function quoteFilterValue(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

/** field="value" with the value quoted */
export function equalsClause(field: string, value: string): string {
  return `${field}=${quoteFilterValue(value)}`;
}

/** Excludes entries older than LOOKBACK_DAYS before `now` */
export function lookbackFilter(now: Date, days: number = LOOKBACK_DAYS): string {
  const since = new Date(now.getTime() - days * DAY_MS);
  return `timestamp >= ${quoteFilterValue(since.toISOString())}`;
}

/** Joins the defined clauses with AND */
export function joinFilters(clauses: Array<string | undefined>): string {
  return clauses
    .filter((clause): clause is string => clause !== undefined && clause !== "")
    .join(" AND ");
}

/** Date and time with a Z or numeric offset; zone-less times are rejected */
const isoTimeSchema = z.string().datetime({ offset: true });

/**
 * Parses an ISO 8601 time bound.
 *
 * @returns undefined for an absent or blank value
 * @throws Error naming the field when the value isn't an ISO 8601 date-time
 */
export function parseTimeBound(
  field: string,
  value: string | undefined
): Date | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  const trimmed = value.trim();
  if (!isoTimeSchema.safeParse(trimmed).success) {
    throw new Error(
      `Invalid ${field} "${value}": expected an ISO 8601 time such as 2025-07-11T02:51:43Z`
    );
  }
  return new Date(trimmed);
}

/** Subtracts the default lookback window from a date */
export function lookbackStart(end: Date, days: number = LOOKBACK_DAYS): Date {
  return new Date(end.getTime() - days * DAY_MS);
}
