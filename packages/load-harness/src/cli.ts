#!/usr/bin/env -S node --import tsx

/**
 * CLI entry point for the light status benchmark.
 *
 * Usage:
 *   lightbench [options]
 *
 * Targets, weights and timeouts come from the environment; see --help.
 */

import { writeFileSync } from "node:fs";
import { shutdownBridges } from "@lightbench/execution-bridge";
import {
  MetricsSink,
  buildReport,
  formatCsv,
  loadBaseline,
  printReport,
  saveBaseline,
} from "@lightbench/metrics";
import { ConfigError, resolveConfig } from "./config.ts";
import { LoadHarness } from "./harness.ts";
import { buildTargets } from "./targets.ts";
import { between } from "./wait-time.ts";

const STATS_INTERVAL_MS = 10000;

const HELP = `
lightbench - Compare light status latency over JSON-RPC, REST and CoAP

Usage:
  lightbench [options]

Options:
  -u, --users <n>          Virtual users (env USERS, default: 10)
  -r, --spawn-rate <n>     Users started per second (env SPAWN_RATE, default: 2)
  -t, --run-time <time>    Run length, e.g. 45s, 10m, 1h30m (env RUN_TIME, default: 10m)
  --car-name <name>        Vehicle to query (env CAR_NAME, default: roadrunner)
  --csv <path>             Write the report table as CSV
  --baseline <path>        Compare against a saved baseline
  --save                   Save this run as the baseline (needs --baseline)
  --help, -h               Show this help message

Environment:
  JSONRPC_URL, REST_URL, COAP_HOST, COAP_PORT, COAP_PATH (or FETCH_SID)
  ENABLE_JSONRPC, ENABLE_REST, ENABLE_COAP   "1" enables (default: 1)
  JSONRPC_WEIGHT, REST_WEIGHT, COAP_WEIGHT   share of users (default: 1)
  WAIT_MIN_MS, WAIT_MAX_MS                   pause between requests (default: 10-50)
  REQUEST_TIMEOUT_MS                         per-request timeout (default: 10000)
`;

function formatMs(value: number | null): string {
  return value === null ? "-" : value.toFixed(1);
}

async function main() {
  const config = resolveConfig(process.env, process.argv.slice(2));
  if (config.help) {
    console.log(HELP);
    return;
  }

  const targets = await buildTargets(config);
  if (targets.length === 0) {
    await shutdownBridges();
    throw new ConfigError("No protocol is enabled");
  }

  const sink = new MetricsSink();
  const harness = new LoadHarness(sink);
  const baseline = config.baselinePath ? loadBaseline(config.baselinePath) : null;

  // Handle shutdown signals
  const shutdown = () => {
    console.log("\nStopping users...");
    harness.stop();
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  // Log stats periodically
  const statsTimer = setInterval(() => {
    for (const s of sink.snapshotAll()) {
      console.log(
        `[stats] ${s.protocol}: requests: ${s.count}, failures: ${s.failureCount}, p50: ${formatMs(s.p50)}ms, p95: ${formatMs(s.p95)}ms`
      );
    }
  }, STATS_INTERVAL_MS);

  const labels = targets.map((t) => `${t.adapter.label} x${t.weight}`).join(", ");
  console.log(
    `Starting ${config.users} users at ${config.spawnRate}/s for ${config.runTimeMs / 1000}s (${labels})`
  );

  try {
    const summary = await harness.start({
      userCount: config.users,
      spawnRate: config.spawnRate,
      durationMs: config.runTimeMs,
      targets,
      vehicleName: config.vehicleName,
      waitTime: between(config.waitMinMs, config.waitMaxMs),
    });
    console.log(
      `Run finished (${summary.stopReason}): ${summary.outcomes} requests from ${summary.usersSpawned} users in ${(summary.elapsedMs / 1000).toFixed(1)}s`
    );
  } finally {
    clearInterval(statsTimer);
    process.off("SIGINT", shutdown);
    process.off("SIGTERM", shutdown);
    await shutdownBridges();
  }

  const rows = buildReport(sink);
  printReport(rows, sink.snapshotAll(), { baseline });

  if (config.csvPath) {
    writeFileSync(config.csvPath, formatCsv(rows));
    console.log(`\nCSV written to ${config.csvPath}`);
  }
  if (config.saveBaseline && config.baselinePath) {
    saveBaseline(config.baselinePath, rows);
  }
}

main().catch((err) => {
  if (err instanceof ConfigError) {
    console.error(err.message);
  } else {
    console.error("Benchmark failed:", err);
  }
  process.exit(1);
});
