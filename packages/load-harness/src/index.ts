/**
 * @lightbench/load-harness
 *
 * Virtual users driving protocol adapters, plus the configuration and target
 * wiring used by the `lightbench` CLI.
 */

export { LoadHarness, assignTargets } from "./harness.ts";
export { between, constant, MAX_TIMER_MS, MIN_SPAWN_RATE } from "./wait-time.ts";
export {
  resolveConfig,
  parseDuration,
  ConfigError,
  type HarnessConfig,
  type HttpTargetConfig,
  type DatagramTargetConfig,
  type Environment,
} from "./config.ts";
export { buildTargets, type BuildTargetsOptions } from "./targets.ts";
export type {
  HarnessRunOptions,
  LoadHarnessOptions,
  RunSummary,
  StopReason,
  UserState,
  WaitTime,
  WeightedTarget,
} from "./types.ts";
