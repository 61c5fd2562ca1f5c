import { BridgeStartupError } from "@lightbench/execution-bridge";
import {
  DatagramAdapter,
  JsonRpcAdapter,
  RestAdapter,
  type CoapBridge,
} from "@lightbench/protocol-adapters";
import type { HarnessConfig } from "./config.ts";
import type { WeightedTarget } from "./types.ts";

export interface BuildTargetsOptions {
  /** Bridge for the CoAP adapter (default: the process-wide one) */
  coapBridge?: CoapBridge;
}

/**
 * Create an adapter for every enabled protocol with a positive weight.
 *
 * A CoAP bridge that fails to start is logged and the protocol left out, so
 * the other protocols still run.
 */
export async function buildTargets(
  config: HarnessConfig,
  options: BuildTargetsOptions = {}
): Promise<WeightedTarget[]> {
  const targets: WeightedTarget[] = [];
  const timeoutMs = config.requestTimeoutMs;

  if (config.jsonRpc.enabled && config.jsonRpc.weight > 0) {
    targets.push({
      adapter: new JsonRpcAdapter({ url: config.jsonRpc.url, timeoutMs }),
      weight: config.jsonRpc.weight,
    });
  }

  if (config.rest.enabled && config.rest.weight > 0) {
    targets.push({
      adapter: new RestAdapter({ url: config.rest.url, timeoutMs }),
      weight: config.rest.weight,
    });
  }

  if (config.coap.enabled && config.coap.weight > 0) {
    try {
      const adapter = await DatagramAdapter.create({
        host: config.coap.host,
        port: config.coap.port,
        path: config.coap.path,
        timeoutMs,
        bridge: options.coapBridge,
      });
      targets.push({ adapter, weight: config.coap.weight });
    } catch (err) {
      if (!(err instanceof BridgeStartupError)) {
        throw err;
      }
      console.error(`Skipping COAP: ${err.message}`);
    }
  }

  return targets;
}
