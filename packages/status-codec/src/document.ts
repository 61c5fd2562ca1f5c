import { DecodeError } from "./errors.ts";
import { isLightStatus, type LightStatus, type StatusEnvelope } from "./light-status.ts";

/**
 * JSON shape of the `fetch` operation output, as served over REST and JSON-RPC.
 */
export interface StatusDocument {
  fetch: {
    output: {
      carStatus: {
        name: string;
        exteriorLight: LightStatus;
      };
    };
  };
}

export function buildStatusDocument(envelope: StatusEnvelope): StatusDocument {
  return {
    fetch: {
      output: {
        carStatus: {
          name: envelope.name,
          exteriorLight: envelope.status,
        },
      },
    },
  };
}

function member(value: unknown, key: string, at: string): unknown {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new DecodeError(`Expected an object at ${at}`);
  }
  if (!Object.hasOwn(value, key)) {
    throw new DecodeError(`Missing "${key}" at ${at}`);
  }
  return Object.getOwnPropertyDescriptor(value, key)?.value;
}

/**
 * Validate a parsed JSON body as a status document.
 *
 * @throws DecodeError on any shape mismatch or unknown light status
 */
export function parseStatusDocument(value: unknown): StatusEnvelope {
  const fetch = member(value, "fetch", "$");
  const output = member(fetch, "output", "$.fetch");
  const carStatus = member(output, "carStatus", "$.fetch.output");
  const name = member(carStatus, "name", "$.fetch.output.carStatus");
  const exteriorLight = member(carStatus, "exteriorLight", "$.fetch.output.carStatus");

  if (typeof name !== "string") {
    throw new DecodeError("carStatus.name must be a string");
  }
  if (!isLightStatus(exteriorLight)) {
    throw new DecodeError(`Unknown exteriorLight value: ${JSON.stringify(exteriorLight)}`);
  }

  return { name, status: exteriorLight };
}
