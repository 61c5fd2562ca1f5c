/**
 * @lightbench/metrics
 *
 * Per-protocol outcome aggregation, latency percentiles and report output.
 */

export { LatencyReservoir } from "./reservoir.ts";

export {
  MetricsSink,
  type MetricsSinkOptions,
  type MetricsSnapshot,
  type ErrorBreakdown,
} from "./sink.ts";

export {
  buildReport,
  toReportRow,
  formatCsv,
  formatDiff,
  printReport,
  loadBaseline,
  saveBaseline,
  type ReportRow,
  type ReportOptions,
  type BaselineData,
} from "./report.ts";
