import type { WaitTime } from "./types.ts";

/** Longest delay a Node.js timer can hold (2^31 - 1 ms) */
export const MAX_TIMER_MS = 2147483647;

/** Slowest spawn rate (users/s) whose interval still fits in one timer */
export const MIN_SPAWN_RATE = 1000 / MAX_TIMER_MS;

/**
 * Uniformly random pause between `minMs` and `maxMs`.
 */
export function between(minMs: number, maxMs: number, random: () => number = Math.random): WaitTime {
  if (!(minMs >= 0) || !(maxMs >= minMs) || maxMs > MAX_TIMER_MS) {
    throw new RangeError(`Invalid wait interval [${minMs}, ${maxMs}]`);
  }
  return () => minMs + random() * (maxMs - minMs);
}

export function constant(ms: number): WaitTime {
  if (!(ms >= 0) || ms > MAX_TIMER_MS) {
    throw new RangeError(`Invalid wait time ${ms}`);
  }
  return () => ms;
}
