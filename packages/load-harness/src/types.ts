import type { ProtocolAdapter, RequestOutcome } from "@lightbench/protocol-adapters";

/**
 * Lifecycle of one virtual user.
 */
export type UserState = "Idle" | "Requesting" | "Waiting" | "Stopped";

/** Returns the next pause between requests, in milliseconds */
export type WaitTime = () => number;

export interface WeightedTarget {
  adapter: ProtocolAdapter;
  /** Relative share of users; 0 leaves the target unused */
  weight: number;
}

export type StopReason = "duration" | "stopped" | "aborted";

export interface HarnessRunOptions {
  userCount: number;
  /** Users started per second */
  spawnRate: number;
  /** Run length in milliseconds; Infinity runs until stopped */
  durationMs: number;
  targets: ProtocolAdapter | readonly WeightedTarget[];
  vehicleName: string;
  waitTime?: WaitTime;
  signal?: AbortSignal;
  /** Called after each outcome is recorded */
  onOutcome?: (outcome: RequestOutcome, userId: number) => void;
}

export interface LoadHarnessOptions {
  /** Wait time for runs that do not set one (default: between(10, 50)) */
  waitTime?: WaitTime;
}

export interface RunSummary {
  usersSpawned: number;
  outcomes: number;
  elapsedMs: number;
  stopReason: StopReason;
}
