import { test, describe, before, after, afterEach, mock } from "node:test";
import assert from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { RequestOutcome } from "@lightbench/protocol-adapters";
import { MetricsSink } from "./sink.ts";
import {
  buildReport,
  formatCsv,
  formatDiff,
  loadBaseline,
  printReport,
  saveBaseline,
  type ReportRow,
} from "./report.ts";

function record(sink: MetricsSink, elapsedMs: number, bytes: number, failed?: "Timeout" | "DecodeError"): void {
  const outcome: RequestOutcome = {
    protocol: "COAP",
    requestName: "fetch",
    startedAt: 0,
    elapsedMs,
    responseBytes: bytes,
    success: failed === undefined,
    error: failed ? { kind: failed, message: "failed" } : undefined,
  };
  sink.record(outcome);
}

function sampleSink(): MetricsSink {
  const sink = new MetricsSink();
  record(sink, 10, 40);
  record(sink, 20, 40);
  record(sink, 30, 0, "Timeout");
  record(sink, 40, 5, "DecodeError");
  return sink;
}

describe("buildReport", () => {
  test("builds one row per protocol", () => {
    assert.deepStrictEqual(buildReport(sampleSink()), [
      { protocol: "COAP", count: 4, p50: 20, p90: 40, p95: 40, p99: 40, errorRate: 0.5, bytes: 85 },
    ]);
  });

  test("is empty for an empty sink", () => {
    assert.deepStrictEqual(buildReport(new MetricsSink()), []);
  });
});

describe("formatCsv", () => {
  test("writes a header and fixed-precision rows", () => {
    assert.strictEqual(
      formatCsv(buildReport(sampleSink())),
      "protocol,count,p50,p90,p95,p99,errorRate,bytes\nCOAP,4,20.00,40.00,40.00,40.00,0.5000,85\n"
    );
  });

  test("leaves missing latencies empty and quotes awkward labels", () => {
    const row: ReportRow = {
      protocol: 'A,"B"',
      count: 0,
      p50: null,
      p90: null,
      p95: null,
      p99: null,
      errorRate: 0,
      bytes: 0,
    };
    assert.strictEqual(
      formatCsv([row]),
      'protocol,count,p50,p90,p95,p99,errorRate,bytes\n"A,""B""",0,,,,,0.0000,0\n'
    );
  });
});

describe("formatDiff", () => {
  test("formats signed percentage changes", () => {
    assert.strictEqual(formatDiff(20, 16), " (+25.0%)");
    assert.strictEqual(formatDiff(12, 16), " (-25.0%)");
    assert.strictEqual(formatDiff(16, 16), " (0.0%)");
  });

  test("is blank without a usable baseline", () => {
    assert.strictEqual(formatDiff(20, undefined), "");
    assert.strictEqual(formatDiff(20, 0), "");
    assert.strictEqual(formatDiff(null, 10), "");
  });
});

describe("printReport", () => {
  afterEach(() => {
    mock.restoreAll();
  });

  test("prints latency and error tables", () => {
    const tables = mock.method(console, "table", () => {});
    mock.method(console, "log", () => {});
    const sink = sampleSink();
    const baseline: ReportRow[] = [
      { protocol: "COAP", count: 1, p50: 16, p90: 16, p95: 16, p99: 16, errorRate: 0, bytes: 1 },
    ];

    printReport(buildReport(sink), sink.snapshotAll(), { baseline });

    assert.strictEqual(tables.mock.callCount(), 2);
    assert.deepStrictEqual(tables.mock.calls[0].arguments[0], [
      {
        Protocol: "COAP",
        Requests: 4,
        "p50 (ms)": "20.00 (+25.0%)",
        "p90 (ms)": "40.00",
        "p95 (ms)": "40.00",
        "p99 (ms)": "40.00",
        "Error rate": "50.00%",
        Bytes: 85,
      },
    ]);
    assert.deepStrictEqual(tables.mock.calls[1].arguments[0], [
      { Protocol: "COAP", Timeout: 1, TransportError: 0, ProtocolError: 0, DecodeError: 1 },
    ]);
  });

  test("skips the error table when nothing failed", () => {
    const tables = mock.method(console, "table", () => {});
    mock.method(console, "log", () => {});
    const sink = new MetricsSink();
    record(sink, 5, 10);

    printReport(buildReport(sink), sink.snapshotAll(), { baseline: null });

    assert.strictEqual(tables.mock.callCount(), 1);
  });
});

describe("baseline files", () => {
  let dir: string;

  before(() => {
    dir = mkdtempSync(join(tmpdir(), "lightbench-report-"));
  });

  after(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  afterEach(() => {
    mock.restoreAll();
  });

  test("saves and loads rows", () => {
    mock.method(console, "log", () => {});
    const path = join(dir, "baseline.json");
    const rows = buildReport(sampleSink());

    saveBaseline(path, rows);

    assert.deepStrictEqual(loadBaseline(path), rows);
  });

  test("returns null for a missing file", () => {
    assert.strictEqual(loadBaseline(join(dir, "missing.json")), null);
  });

  test("returns null for a file that is not a baseline", () => {
    const warn = mock.method(console, "warn", () => {});
    const broken = join(dir, "broken.json");
    const other = join(dir, "other.json");
    writeFileSync(broken, "{ not json");
    writeFileSync(other, JSON.stringify({ rows: [{ protocol: 1 }] }));

    assert.strictEqual(loadBaseline(broken), null);
    assert.strictEqual(loadBaseline(other), null);
    assert.strictEqual(warn.mock.callCount(), 2);
  });
});
