import { setTimeout as delay } from "node:timers/promises";
import {
  createOutcome,
  startTimer,
  type ProtocolAdapter,
  type RequestOutcome,
} from "@lightbench/protocol-adapters";

export interface StubAdapterOptions {
  label?: string;
  /** Simulated round trip (default: 5ms) */
  latencyMs?: number;
  /** Error every call fails with */
  failWith?: Error;
  /** Reject instead of returning an outcome */
  reject?: boolean;
}

/**
 * In-process adapter with a fixed latency, for driving the harness in tests.
 */
export class StubAdapter implements ProtocolAdapter {
  readonly label: string;
  readonly requestName = "fetch";
  calls = 0;
  inFlight = 0;
  maxInFlight = 0;

  private readonly options: StubAdapterOptions;

  constructor(options: StubAdapterOptions = {}) {
    this.options = options;
    this.label = options.label ?? "STUB";
  }

  async fetch(_vehicleName: string): Promise<RequestOutcome> {
    this.calls++;
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    const timer = startTimer();
    try {
      await delay(this.options.latencyMs ?? 5);
    } finally {
      this.inFlight--;
    }

    if (this.options.reject) {
      throw new Error("stub adapter broke its contract");
    }
    return createOutcome({
      protocol: this.label,
      requestName: this.requestName,
      timer,
      responseBytes: this.options.failWith ? 0 : 16,
      error: this.options.failWith,
    });
  }
}
