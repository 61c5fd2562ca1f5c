import { setTimeout as delay } from "node:timers/promises";
import {
  startTimer,
  type ProtocolAdapter,
  type RequestOutcome,
} from "@lightbench/protocol-adapters";
import type { MetricsSink } from "@lightbench/metrics";
import { MAX_TIMER_MS, MIN_SPAWN_RATE, between } from "./wait-time.ts";
import type {
  HarnessRunOptions,
  LoadHarnessOptions,
  RunSummary,
  StopReason,
  UserState,
  WaitTime,
  WeightedTarget,
} from "./types.ts";

interface ActiveRun {
  controller: AbortController;
  stopReason: StopReason;
  outcomes: number;
}

/**
 * Assign each of `userCount` users a target, in proportion to the weights.
 *
 * Uses smooth weighted round robin, so the same inputs always give the same
 * interleaving and every prefix stays close to the weight ratio.
 */
export function assignTargets(
  targets: readonly WeightedTarget[],
  userCount: number
): ProtocolAdapter[] {
  const active = targets.filter((target) => target.weight > 0);
  if (active.length === 0) {
    throw new RangeError("At least one target needs a positive weight");
  }
  const totalWeight = active.reduce((sum, target) => sum + target.weight, 0);
  const current = active.map(() => 0);
  const assigned: ProtocolAdapter[] = [];

  for (let user = 0; user < userCount; user++) {
    let best = 0;
    for (let i = 0; i < active.length; i++) {
      current[i] += active[i].weight;
      if (current[i] > current[best]) {
        best = i;
      }
    }
    current[best] -= totalWeight;
    assigned.push(active[best].adapter);
  }
  return assigned;
}

function isWeightedTargets(
  targets: HarnessRunOptions["targets"]
): targets is readonly WeightedTarget[] {
  return Array.isArray(targets);
}

/**
 * Sleep for `ms`, returning early once `signal` aborts.
 */
async function pause(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted || ms <= 0) {
    return;
  }
  await delay(ms, undefined, { signal }).catch((err: unknown) => {
    if (!signal.aborted) {
      throw err;
    }
  });
}

function untilAborted(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

/**
 * Call the adapter, turning a rejection into a TransportError outcome.
 */
async function attempt(adapter: ProtocolAdapter, vehicleName: string): Promise<RequestOutcome> {
  const timer = startTimer();
  try {
    return await adapter.fetch(vehicleName);
  } catch (err) {
    return Object.freeze({
      protocol: adapter.label,
      requestName: adapter.requestName,
      startedAt: timer.startedAt,
      elapsedMs: timer.elapsed(),
      responseBytes: 0,
      success: false,
      error: Object.freeze({
        kind: "TransportError" as const,
        message: err instanceof Error ? err.message : String(err),
      }),
    });
  }
}

function validate(options: HarnessRunOptions): void {
  if (!Number.isInteger(options.userCount) || options.userCount < 0) {
    throw new RangeError(`userCount must be a non-negative integer, got ${options.userCount}`);
  }
  if (!(options.spawnRate >= MIN_SPAWN_RATE)) {
    throw new RangeError(
      `spawnRate must be at least ${MIN_SPAWN_RATE} users/s, got ${options.spawnRate}`
    );
  }
  if (
    !(options.durationMs >= 0) ||
    (Number.isFinite(options.durationMs) && options.durationMs > MAX_TIMER_MS)
  ) {
    throw new RangeError(
      `durationMs must be within 0-${MAX_TIMER_MS} or Infinity, got ${options.durationMs}`
    );
  }
}

/**
 * Drives virtual users against protocol adapters and records every outcome.
 *
 * Each user is an async loop: request, record, pause, repeat. Stopping is
 * observed at loop boundaries; a request already in flight runs to completion
 * or timeout and is still recorded before `start` resolves.
 */
export class LoadHarness {
  private readonly sink: MetricsSink;
  private readonly defaultWaitTime: WaitTime;
  private readonly states = new Map<number, UserState>();
  private run: ActiveRun | null = null;

  constructor(sink: MetricsSink, options: LoadHarnessOptions = {}) {
    this.sink = sink;
    this.defaultWaitTime = options.waitTime ?? between(10, 50);
  }

  get running(): boolean {
    return this.run !== null;
  }

  /** State of every user spawned by the current or last run */
  userStates(): ReadonlyMap<number, UserState> {
    return new Map(this.states);
  }

  async start(options: HarnessRunOptions): Promise<RunSummary> {
    if (this.run) {
      throw new Error("Load harness is already running");
    }
    validate(options);

    const { targets } = options;
    const adapters: ProtocolAdapter[] = isWeightedTargets(targets)
      ? assignTargets(targets, options.userCount)
      : Array.from({ length: options.userCount }, () => targets);
    const waitTime = options.waitTime ?? this.defaultWaitTime;

    const run: ActiveRun = {
      controller: new AbortController(),
      stopReason: "duration",
      outcomes: 0,
    };
    this.run = run;
    this.states.clear();

    const halt = (reason: StopReason): void => {
      if (!run.controller.signal.aborted) {
        run.stopReason = reason;
        run.controller.abort();
      }
    };
    const onExternalAbort = (): void => halt("aborted");
    const durationTimer = Number.isFinite(options.durationMs)
      ? setTimeout(() => halt("duration"), options.durationMs)
      : undefined;

    if (options.signal?.aborted) {
      halt("aborted");
    } else {
      options.signal?.addEventListener("abort", onExternalAbort, { once: true });
    }

    const timer = startTimer();
    const users: Promise<void>[] = [];
    const spawnIntervalMs = 1000 / options.spawnRate;

    try {
      for (const [userId, adapter] of adapters.entries()) {
        if (userId > 0) {
          await pause(spawnIntervalMs, run.controller.signal);
        }
        if (run.controller.signal.aborted) {
          break;
        }
        users.push(this.runUser(userId, adapter, run, options, waitTime));
      }

      await untilAborted(run.controller.signal);
      await Promise.all(users);
    } finally {
      clearTimeout(durationTimer);
      options.signal?.removeEventListener("abort", onExternalAbort);
      this.run = null;
    }

    return {
      usersSpawned: users.length,
      outcomes: run.outcomes,
      elapsedMs: timer.elapsed(),
      stopReason: run.stopReason,
    };
  }

  /**
   * Ask every user of the current run to stop. `start` resolves once they have.
   */
  stop(): void {
    const run = this.run;
    if (run && !run.controller.signal.aborted) {
      run.stopReason = "stopped";
      run.controller.abort();
    }
  }

  private async runUser(
    userId: number,
    adapter: ProtocolAdapter,
    run: ActiveRun,
    options: HarnessRunOptions,
    waitTime: WaitTime
  ): Promise<void> {
    const { signal } = run.controller;
    this.states.set(userId, "Idle");

    while (!signal.aborted) {
      this.states.set(userId, "Requesting");
      const outcome = await attempt(adapter, options.vehicleName);
      this.sink.record(outcome);
      run.outcomes++;

      if (options.onOutcome) {
        try {
          options.onOutcome(outcome, userId);
        } catch (err) {
          console.error(`Outcome observer failed for user ${userId}:`, err);
        }
      }

      if (signal.aborted) {
        break;
      }
      this.states.set(userId, "Waiting");
      await pause(waitTime(), signal);
    }

    this.states.set(userId, "Stopped");
  }
}
