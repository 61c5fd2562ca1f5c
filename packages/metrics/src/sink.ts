import type { ErrorKind, RequestOutcome } from "@lightbench/protocol-adapters";
import { LatencyReservoir } from "./reservoir.ts";

export type ErrorBreakdown = Record<ErrorKind, number>;

/**
 * Point-in-time copy of one protocol's aggregate. Frozen.
 */
export interface MetricsSnapshot {
  readonly protocol: string;
  readonly count: number;
  readonly successCount: number;
  readonly failureCount: number;
  readonly totalBytes: number;
  readonly minMs: number | null;
  readonly maxMs: number | null;
  readonly meanMs: number | null;
  readonly p50: number | null;
  readonly p90: number | null;
  readonly p95: number | null;
  readonly p99: number | null;
  readonly errorBreakdown: Readonly<ErrorBreakdown>;
}

export interface MetricsSinkOptions {
  /** Latency samples kept per protocol (default: 10000) */
  reservoirCapacity?: number;
  /** Source of randomness for reservoir replacement */
  random?: () => number;
}

const PERCENTILE_RANKS = [50, 90, 95, 99] as const;

function emptyBreakdown(): ErrorBreakdown {
  return { Timeout: 0, TransportError: 0, ProtocolError: 0, DecodeError: 0 };
}

class ProtocolAggregate {
  count = 0;
  successCount = 0;
  failureCount = 0;
  totalBytes = 0;
  totalMs = 0;
  minMs = Infinity;
  maxMs = -Infinity;
  readonly errorBreakdown = emptyBreakdown();
  readonly latencies: LatencyReservoir;

  constructor(capacity: number | undefined, random: (() => number) | undefined) {
    this.latencies = new LatencyReservoir(capacity, random);
  }

  add(outcome: RequestOutcome): void {
    this.count++;
    this.totalBytes += outcome.responseBytes;
    this.totalMs += outcome.elapsedMs;
    this.minMs = Math.min(this.minMs, outcome.elapsedMs);
    this.maxMs = Math.max(this.maxMs, outcome.elapsedMs);
    this.latencies.add(outcome.elapsedMs);

    if (outcome.success) {
      this.successCount++;
    } else {
      this.failureCount++;
      this.errorBreakdown[outcome.error?.kind ?? "TransportError"]++;
    }
  }

  snapshot(protocol: string): MetricsSnapshot {
    const [p50, p90, p95, p99] = this.latencies.percentiles(PERCENTILE_RANKS);
    const empty = this.count === 0;
    return Object.freeze({
      protocol,
      count: this.count,
      successCount: this.successCount,
      failureCount: this.failureCount,
      totalBytes: this.totalBytes,
      minMs: empty ? null : this.minMs,
      maxMs: empty ? null : this.maxMs,
      meanMs: empty ? null : this.totalMs / this.count,
      p50: p50 ?? null,
      p90: p90 ?? null,
      p95: p95 ?? null,
      p99: p99 ?? null,
      errorBreakdown: Object.freeze({ ...this.errorBreakdown }),
    });
  }
}

/**
 * Collects request outcomes per protocol label.
 *
 * Every update is one synchronous step on the event loop, so records for a
 * label never interleave and a snapshot reflects every record before it.
 */
export class MetricsSink {
  private readonly options: MetricsSinkOptions;
  private readonly aggregates = new Map<string, ProtocolAggregate>();

  constructor(options: MetricsSinkOptions = {}) {
    this.options = options;
  }

  record(outcome: RequestOutcome): void {
    let aggregate = this.aggregates.get(outcome.protocol);
    if (!aggregate) {
      aggregate = new ProtocolAggregate(this.options.reservoirCapacity, this.options.random);
      this.aggregates.set(outcome.protocol, aggregate);
    }
    aggregate.add(outcome);
  }

  /**
   * Snapshot one label. A label with no records yields zero counts and null
   * latencies.
   */
  snapshot(protocol: string): MetricsSnapshot {
    const aggregate =
      this.aggregates.get(protocol) ??
      new ProtocolAggregate(this.options.reservoirCapacity, this.options.random);
    return aggregate.snapshot(protocol);
  }

  /** Labels in first-recorded order */
  labels(): string[] {
    return [...this.aggregates.keys()];
  }

  snapshotAll(): MetricsSnapshot[] {
    return this.labels().map((label) => this.snapshot(label));
  }

  reset(): void {
    this.aggregates.clear();
  }
}
