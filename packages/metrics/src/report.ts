import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { ERROR_KINDS } from "@lightbench/protocol-adapters";
import type { MetricsSink, MetricsSnapshot } from "./sink.ts";

export interface ReportRow {
  protocol: string;
  count: number;
  p50: number | null;
  p90: number | null;
  p95: number | null;
  p99: number | null;
  /** Failures over attempts, 0-1 */
  errorRate: number;
  bytes: number;
}

export interface BaselineData {
  timestamp: string;
  rows: ReportRow[];
}

export interface ReportOptions {
  /** Rows of a previous run; p50 is shown with its change against them */
  baseline: ReportRow[] | null;
  /** Heading for the latency table */
  title?: string;
}

export function toReportRow(snapshot: MetricsSnapshot): ReportRow {
  return {
    protocol: snapshot.protocol,
    count: snapshot.count,
    p50: snapshot.p50,
    p90: snapshot.p90,
    p95: snapshot.p95,
    p99: snapshot.p99,
    errorRate: snapshot.count === 0 ? 0 : snapshot.failureCount / snapshot.count,
    bytes: snapshot.totalBytes,
  };
}

export function buildReport(sink: MetricsSink): ReportRow[] {
  return sink.snapshotAll().map(toReportRow);
}

// ============================================================================
// CSV
// ============================================================================

const CSV_COLUMNS = ["protocol", "count", "p50", "p90", "p95", "p99", "errorRate", "bytes"] as const;

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replaceAll('"', '""')}"` : value;
}

function formatMs(value: number | null): string {
  return value === null ? "" : value.toFixed(2);
}

/**
 * Render rows as CSV with a header line. Latencies in ms with two decimals,
 * empty when there were no samples.
 */
export function formatCsv(rows: readonly ReportRow[]): string {
  const lines = [CSV_COLUMNS.join(",")];
  for (const row of rows) {
    lines.push(
      [
        csvField(row.protocol),
        String(row.count),
        formatMs(row.p50),
        formatMs(row.p90),
        formatMs(row.p95),
        formatMs(row.p99),
        row.errorRate.toFixed(4),
        String(row.bytes),
      ].join(",")
    );
  }
  return lines.join("\n") + "\n";
}

// ============================================================================
// Console tables
// ============================================================================

export function formatDiff(current: number | null, baseline: number | null | undefined): string {
  if (current === null || baseline === null || baseline === undefined || baseline <= 0) return "";
  const diff = ((current - baseline) / baseline) * 100;
  const sign = diff > 0 ? "+" : "";
  return ` (${sign}${diff.toFixed(1)}%)`;
}

function baselineP50(baseline: ReportRow[] | null, protocol: string): number | null | undefined {
  return baseline?.find((r) => r.protocol === protocol)?.p50;
}

export function printReport(
  rows: readonly ReportRow[],
  snapshots: readonly MetricsSnapshot[],
  options: ReportOptions
): void {
  if (options.baseline) {
    console.log("\n(Comparing against saved baseline)");
  }

  console.log(`\n=== ${options.title ?? "Latency by protocol"} ===\n`);
  console.table(
    rows.map((r) => ({
      Protocol: r.protocol,
      Requests: r.count,
      "p50 (ms)": formatMs(r.p50) + formatDiff(r.p50, baselineP50(options.baseline, r.protocol)),
      "p90 (ms)": formatMs(r.p90),
      "p95 (ms)": formatMs(r.p95),
      "p99 (ms)": formatMs(r.p99),
      "Error rate": `${(r.errorRate * 100).toFixed(2)}%`,
      Bytes: r.bytes,
    }))
  );

  const failing = snapshots.filter((s) => s.failureCount > 0);
  if (failing.length === 0) {
    return;
  }

  console.log("\n=== Errors by kind ===\n");
  console.table(
    failing.map((s) => {
      const row: Record<string, string | number> = { Protocol: s.protocol };
      for (const kind of ERROR_KINDS) {
        row[kind] = s.errorBreakdown[kind];
      }
      return row;
    })
  );
}

// ============================================================================
// Baseline
// ============================================================================

function isNullableNumber(value: unknown): value is number | null {
  return value === null || typeof value === "number";
}

function isReportRow(value: unknown): value is ReportRow {
  if (typeof value !== "object" || value === null) return false;
  const row: Record<string, unknown> = { ...value };
  return (
    typeof row.protocol === "string" &&
    typeof row.count === "number" &&
    isNullableNumber(row.p50) &&
    isNullableNumber(row.p90) &&
    isNullableNumber(row.p95) &&
    isNullableNumber(row.p99) &&
    typeof row.errorRate === "number" &&
    typeof row.bytes === "number"
  );
}

/**
 * Read the rows of a saved baseline. Null when the file is missing or does not
 * hold a baseline.
 */
export function loadBaseline(path: string): ReportRow[] | null {
  if (!existsSync(path)) {
    return null;
  }
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    console.warn(`Ignoring unreadable baseline ${path}:`, err instanceof Error ? err.message : err);
    return null;
  }
  const rows: unknown =
    typeof data === "object" && data !== null && "rows" in data ? data.rows : undefined;
  if (!Array.isArray(rows) || !rows.every(isReportRow)) {
    console.warn(`Ignoring baseline ${path}: unexpected format`);
    return null;
  }
  return rows;
}

export function saveBaseline(path: string, rows: readonly ReportRow[]): void {
  const data: BaselineData = {
    timestamp: new Date().toISOString(),
    rows: [...rows],
  };
  writeFileSync(path, JSON.stringify(data, null, 2) + "\n");
  console.log(`\nBaseline saved to ${path}`);
}
