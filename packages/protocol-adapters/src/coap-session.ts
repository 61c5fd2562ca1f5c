/**
 * CoAP client session helpers. An Agent is one UDP socket plus its message-id
 * and token bookkeeping; the datagram bridge owns exactly one.
 */

import { Agent, type IncomingMessage } from "coap";
import type { DatagramTarget } from "./types.ts";

export const DEFAULT_COAP_PATH = "60001";

export interface CoapResponse {
  /** Response code in dotted form, e.g. "2.05" */
  code: string;
  payload: Buffer;
}

export async function createCoapSession(): Promise<Agent> {
  return new Agent({ type: "udp4" });
}

/**
 * Close the agent's socket. The agent may already have closed it after its
 * last exchange; it then reports through the `close` event only.
 */
export function closeCoapSession(agent: Agent): Promise<void> {
  return new Promise((resolve, reject) => {
    let settled = false;
    const finish = (err?: Error): void => {
      if (settled) {
        return;
      }
      settled = true;
      agent.removeListener("close", onClose);
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    };
    const onClose = (): void => finish();

    agent.once("close", onClose);
    agent.close((err?: Error) => finish(err));
  });
}

/**
 * Send one FETCH request carrying `body` as plain text and wait for the response.
 * Has no timeout of its own; the bridge bounds it.
 */
export function coapFetch(
  agent: Agent,
  target: DatagramTarget,
  body: Buffer,
  confirmable: boolean
): Promise<CoapResponse> {
  return new Promise((resolve, reject) => {
    const request = agent.request({
      hostname: target.host,
      port: target.port,
      pathname: `/${target.path ?? DEFAULT_COAP_PATH}`,
      method: "FETCH",
      confirmable,
      options: { "Content-Format": "text/plain" },
    });

    request.on("response", (response: IncomingMessage) => {
      resolve({ code: response.code, payload: response.payload });
    });
    request.on("error", (err: Error) => {
      reject(err);
    });
    request.on("timeout", (err: Error) => {
      reject(err);
    });

    request.end(body);
  });
}

export function isSuccessCode(code: string): boolean {
  return code.startsWith("2.");
}
