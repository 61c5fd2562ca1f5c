import { DecodeError, UnknownStatusError } from "./errors.ts";

/**
 * Exterior light states, in code order. The index of each entry is its wire code.
 */
export const LIGHT_STATUSES = [
  "lowBeamHeadlightsOn",
  "highBeamHeadlightsOn",
  "leftTurnSignalOn",
  "rightTurnSignalOn",
  "daytimeRunningLightsOn",
  "reverseLightOn",
  "fogLightOn",
  "parkingLightsOn",
] as const;

export type LightStatus = (typeof LIGHT_STATUSES)[number];

/**
 * A named vehicle paired with its current light status.
 */
export interface StatusEnvelope {
  name: string;
  status: LightStatus;
}

const CODE_BY_STATUS: ReadonlyMap<string, number> = new Map(
  LIGHT_STATUSES.map((status, code) => [status, code])
);

export function isLightStatus(value: unknown): value is LightStatus {
  return typeof value === "string" && CODE_BY_STATUS.has(value);
}

/**
 * Look up the wire code of a status name.
 *
 * @throws UnknownStatusError if the name is not one of the eight states
 */
export function lookupCodeForStatus(name: string): number {
  const code = CODE_BY_STATUS.get(name);
  if (code === undefined) {
    throw new UnknownStatusError(name);
  }
  return code;
}

/**
 * Map a wire code back to its status name.
 *
 * @throws DecodeError if the code is not an integer in 0-7
 */
export function statusForCode(code: number): LightStatus {
  if (!Number.isInteger(code) || code < 0 || code >= LIGHT_STATUSES.length) {
    throw new DecodeError(`Light status code out of range: ${code}`);
  }
  return LIGHT_STATUSES[code];
}

/**
 * Pick a status uniformly at random. Stub servers use this to vary replies.
 */
export function randomLightStatus(random: () => number = Math.random): LightStatus {
  const index = Math.min(
    Math.floor(random() * LIGHT_STATUSES.length),
    LIGHT_STATUSES.length - 1
  );
  return LIGHT_STATUSES[index];
}
