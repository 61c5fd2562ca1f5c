import { parseJsonBody, postJson } from "./http.ts";
import { DEFAULT_TIMEOUT, ProtocolError, createOutcome, startTimer } from "./outcome.ts";
import type { HttpAdapterOptions, ProtocolAdapter, RequestOutcome } from "./types.ts";

export interface JsonRpcRequest {
  jsonrpc: "2.0";
  method: string;
  params: unknown[];
  id: number;
}

function rpcError(body: unknown): string | null {
  if (typeof body !== "object" || body === null || !Object.hasOwn(body, "error")) {
    return null;
  }
  const error: unknown = Object.getOwnPropertyDescriptor(body, "error")?.value;
  return error === null || error === undefined ? null : JSON.stringify(error);
}

/**
 * JSON-RPC 2.0 client calling `fetch(vehicleName)` over HTTP.
 */
export class JsonRpcAdapter implements ProtocolAdapter {
  readonly label = "JSONRPC";
  readonly requestName = "fetch";

  private readonly url: string;
  private readonly timeoutMs: number;
  private nextRequestId = 1;

  constructor(options: HttpAdapterOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT;
  }

  async fetch(vehicleName: string): Promise<RequestOutcome> {
    const request: JsonRpcRequest = {
      jsonrpc: "2.0",
      method: "fetch",
      params: [vehicleName],
      id: this.nextRequestId++,
    };
    const timer = startTimer();
    let responseBytes = 0;

    try {
      const exchange = await postJson(this.url, request, this.timeoutMs);
      responseBytes = exchange.body.length;

      if (exchange.status !== 200) {
        throw new ProtocolError(`Unexpected HTTP status ${exchange.status}`);
      }

      const error = rpcError(parseJsonBody(exchange.body));
      if (error !== null) {
        throw new ProtocolError(`JSON-RPC error: ${error}`);
      }

      return createOutcome({ protocol: this.label, requestName: this.requestName, timer, responseBytes });
    } catch (err) {
      return createOutcome({
        protocol: this.label,
        requestName: this.requestName,
        timer,
        responseBytes,
        error: err,
      });
    }
  }
}
