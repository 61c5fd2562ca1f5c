/**
 * Shared types for the protocol adapters.
 */

/**
 * Failure classes a request can end in.
 */
export const ERROR_KINDS = ["Timeout", "TransportError", "ProtocolError", "DecodeError"] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export interface OutcomeError {
  kind: ErrorKind;
  message: string;
}

/**
 * One completed or failed fetch attempt. Frozen on creation.
 */
export interface RequestOutcome {
  /** Protocol label the outcome is aggregated under, e.g. "COAP" */
  readonly protocol: string;
  /** Operation name as reported, e.g. "fetch" */
  readonly requestName: string;
  /** Wall-clock start (epoch ms) */
  readonly startedAt: number;
  readonly elapsedMs: number;
  /** Raw response body length; 0 when nothing arrived */
  readonly responseBytes: number;
  readonly success: boolean;
  readonly error?: Readonly<OutcomeError>;
}

/**
 * One "fetch light status" round trip over a transport.
 *
 * `fetch` never rejects: every failure is classified into the outcome.
 */
export interface ProtocolAdapter {
  readonly label: string;
  readonly requestName: string;
  fetch(vehicleName: string): Promise<RequestOutcome>;
}

export interface HttpAdapterOptions {
  url: string;
  /** Whole-exchange timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
}

export interface DatagramTarget {
  host: string;
  port: number;
  /** Resource path, normally the fetch SID (default: "60001") */
  path?: string;
}
