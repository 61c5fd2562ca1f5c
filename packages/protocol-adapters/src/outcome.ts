import { BridgeTimeoutError } from "@lightbench/execution-bridge";
import { DecodeError } from "@lightbench/status-codec";
import type { ErrorKind, OutcomeError, RequestOutcome } from "./types.ts";

export const DEFAULT_TIMEOUT = 10000;

/**
 * Raised by adapters when a response arrives with an unexpected status.
 */
export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolError";
  }
}

/**
 * Raised by adapters when no complete response arrives in time.
 */
export class RequestTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`No response within ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

function isAbortLike(err: unknown): boolean {
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}

/**
 * Map an error raised during a request onto an outcome error.
 */
export function classifyError(err: unknown): OutcomeError {
  const message = err instanceof Error ? err.message : String(err);
  let kind: ErrorKind;

  if (err instanceof RequestTimeoutError || err instanceof BridgeTimeoutError || isAbortLike(err)) {
    kind = "Timeout";
  } else if (err instanceof ProtocolError) {
    kind = "ProtocolError";
  } else if (err instanceof DecodeError) {
    kind = "DecodeError";
  } else {
    kind = "TransportError";
  }

  return { kind, message };
}

export interface RequestTimer {
  startedAt: number;
  elapsed(): number;
}

export function startTimer(): RequestTimer {
  const startedAt = Date.now();
  const start = performance.now();
  return {
    startedAt,
    elapsed: () => performance.now() - start,
  };
}

export interface OutcomeInit {
  protocol: string;
  requestName: string;
  timer: RequestTimer;
  responseBytes?: number;
  error?: unknown;
}

/**
 * Build the frozen outcome for a finished attempt. An `error` makes it a failure.
 */
export function createOutcome(init: OutcomeInit): RequestOutcome {
  const base = {
    protocol: init.protocol,
    requestName: init.requestName,
    startedAt: init.timer.startedAt,
    elapsedMs: init.timer.elapsed(),
    responseBytes: init.responseBytes ?? 0,
  };

  if (init.error === undefined) {
    return Object.freeze({ ...base, success: true });
  }

  return Object.freeze({
    ...base,
    success: false,
    error: Object.freeze(classifyError(init.error)),
  });
}
