import { DEFAULT_COAP_PATH, DEFAULT_TIMEOUT } from "@lightbench/protocol-adapters";
import { MAX_TIMER_MS, MIN_SPAWN_RATE } from "./wait-time.ts";

/**
 * Thrown for an environment variable or flag that cannot be used.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface HttpTargetConfig {
  enabled: boolean;
  url: string;
  weight: number;
}

export interface DatagramTargetConfig {
  enabled: boolean;
  host: string;
  port: number;
  path: string;
  weight: number;
}

export interface HarnessConfig {
  jsonRpc: HttpTargetConfig;
  rest: HttpTargetConfig;
  coap: DatagramTargetConfig;
  vehicleName: string;
  users: number;
  spawnRate: number;
  runTimeMs: number;
  waitMinMs: number;
  waitMaxMs: number;
  requestTimeoutMs: number;
  csvPath: string | null;
  baselinePath: string | null;
  saveBaseline: boolean;
  help: boolean;
}

export type Environment = Readonly<Record<string, string | undefined>>;

const DEFAULTS = {
  jsonRpcUrl: "http://localhost:4000/jsonrpc",
  restUrl: "http://localhost:5000/externalLights",
  coapHost: "localhost",
  coapPort: "5683",
  vehicleName: "roadrunner",
  users: "10",
  spawnRate: "2",
  runTime: "10m",
  waitMinMs: "10",
  waitMaxMs: "50",
} as const;

const DURATION_UNITS_MS = { h: 3600000, m: 60000, s: 1000 } as const;

/**
 * Parse a run time such as "10m", "1h30m", "45s" or bare seconds ("90").
 *
 * @returns the duration in milliseconds
 */
export function parseDuration(value: string): number {
  const text = value.trim();
  if (/^\d+$/.test(text)) {
    return checkTimerRange(value, Number(text) * 1000);
  }

  const match = /^(?:(\d+)h)?(?:(\d+)m)?(?:(\d+)s)?$/.exec(text);
  if (!match || text.length === 0) {
    throw new ConfigError(`Invalid run time "${value}" (expected e.g. 45s, 10m, 1h30m)`);
  }
  const [, hours, minutes, seconds] = match;
  return checkTimerRange(
    value,
    Number(hours ?? 0) * DURATION_UNITS_MS.h +
      Number(minutes ?? 0) * DURATION_UNITS_MS.m +
      Number(seconds ?? 0) * DURATION_UNITS_MS.s
  );
}

function checkTimerRange(value: string, ms: number): number {
  if (ms > MAX_TIMER_MS) {
    throw new ConfigError(`Run time "${value}" exceeds the ${MAX_TIMER_MS}ms timer limit`);
  }
  return ms;
}

function parseInteger(name: string, value: string, min: number, max = Number.MAX_SAFE_INTEGER): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigError(`${name} must be an integer, got "${value}"`);
  }
  const parsed = Number(value);
  if (parsed < min || parsed > max) {
    throw new ConfigError(`${name} must be between ${min} and ${max}, got ${parsed}`);
  }
  return parsed;
}

function parseRate(name: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigError(`${name} must be a positive number, got "${value}"`);
  }
  if (parsed < MIN_SPAWN_RATE) {
    throw new ConfigError(`${name} must be at least ${MIN_SPAWN_RATE}, got ${parsed}`);
  }
  return parsed;
}

function parseUrl(name: string, value: string): string {
  if (!URL.canParse(value)) {
    throw new ConfigError(`${name} is not a valid URL: "${value}"`);
  }
  return value;
}

interface FlagValues {
  users?: string;
  spawnRate?: string;
  runTime?: string;
  vehicleName?: string;
  csvPath?: string;
  baselinePath?: string;
  saveBaseline: boolean;
  help: boolean;
}

function parseFlags(args: readonly string[]): FlagValues {
  const flags: FlagValues = { saveBaseline: false, help: false };

  const valueOf = (flag: string, index: number): string => {
    const value = args[index];
    if (value === undefined || value.startsWith("-")) {
      throw new ConfigError(`Missing value for ${flag}`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case "-u":
      case "--users":
        flags.users = valueOf(arg, ++i);
        break;
      case "-r":
      case "--spawn-rate":
        flags.spawnRate = valueOf(arg, ++i);
        break;
      case "-t":
      case "--run-time":
        flags.runTime = valueOf(arg, ++i);
        break;
      case "--car-name":
        flags.vehicleName = valueOf(arg, ++i);
        break;
      case "--csv":
        flags.csvPath = valueOf(arg, ++i);
        break;
      case "--baseline":
        flags.baselinePath = valueOf(arg, ++i);
        break;
      case "--save":
        flags.saveBaseline = true;
        break;
      case "--help":
      case "-h":
        flags.help = true;
        break;
      default:
        throw new ConfigError(`Unknown option: ${arg}`);
    }
  }

  return flags;
}

/**
 * Resolve the run configuration from environment variables, with command line
 * flags taking precedence.
 *
 * @throws ConfigError for unknown flags or unusable values
 */
export function resolveConfig(env: Environment, args: readonly string[]): HarnessConfig {
  const flags = parseFlags(args);
  const read = (name: string, fallback: string): string => env[name] ?? fallback;
  const enabled = (name: string): boolean => read(name, "1") === "1";

  const waitMinMs = parseInteger(
    "WAIT_MIN_MS",
    read("WAIT_MIN_MS", DEFAULTS.waitMinMs),
    0,
    MAX_TIMER_MS
  );
  const waitMaxMs = parseInteger(
    "WAIT_MAX_MS",
    read("WAIT_MAX_MS", DEFAULTS.waitMaxMs),
    0,
    MAX_TIMER_MS
  );
  if (waitMaxMs < waitMinMs) {
    throw new ConfigError(`WAIT_MAX_MS (${waitMaxMs}) is below WAIT_MIN_MS (${waitMinMs})`);
  }
  if (flags.saveBaseline && flags.baselinePath === undefined) {
    throw new ConfigError("--save needs --baseline <path>");
  }

  const vehicleName = flags.vehicleName ?? read("CAR_NAME", DEFAULTS.vehicleName);
  if (vehicleName.length === 0) {
    throw new ConfigError("CAR_NAME must not be empty");
  }

  return {
    jsonRpc: {
      enabled: enabled("ENABLE_JSONRPC"),
      url: parseUrl("JSONRPC_URL", read("JSONRPC_URL", DEFAULTS.jsonRpcUrl)),
      weight: parseInteger("JSONRPC_WEIGHT", read("JSONRPC_WEIGHT", "1"), 0),
    },
    rest: {
      enabled: enabled("ENABLE_REST"),
      url: parseUrl("REST_URL", read("REST_URL", DEFAULTS.restUrl)),
      weight: parseInteger("REST_WEIGHT", read("REST_WEIGHT", "1"), 0),
    },
    coap: {
      enabled: enabled("ENABLE_COAP"),
      host: read("COAP_HOST", DEFAULTS.coapHost),
      port: parseInteger("COAP_PORT", read("COAP_PORT", DEFAULTS.coapPort), 1, 65535),
      path: env.COAP_PATH ?? env.FETCH_SID ?? DEFAULT_COAP_PATH,
      weight: parseInteger("COAP_WEIGHT", read("COAP_WEIGHT", "1"), 0),
    },
    vehicleName,
    users: parseInteger("users", flags.users ?? read("USERS", DEFAULTS.users), 1),
    spawnRate: parseRate("spawn rate", flags.spawnRate ?? read("SPAWN_RATE", DEFAULTS.spawnRate)),
    runTimeMs: parseDuration(flags.runTime ?? read("RUN_TIME", DEFAULTS.runTime)),
    waitMinMs,
    waitMaxMs,
    requestTimeoutMs: parseInteger(
      "REQUEST_TIMEOUT_MS",
      read("REQUEST_TIMEOUT_MS", String(DEFAULT_TIMEOUT)),
      1,
      MAX_TIMER_MS
    ),
    csvPath: flags.csvPath ?? null,
    baselinePath: flags.baselinePath ?? null,
    saveBaseline: flags.saveBaseline,
    help: flags.help,
  };
}
