import { parseStatusDocument } from "@lightbench/status-codec";
import { parseJsonBody, postJson } from "./http.ts";
import { DEFAULT_TIMEOUT, ProtocolError, createOutcome, startTimer } from "./outcome.ts";
import type { HttpAdapterOptions, ProtocolAdapter, RequestOutcome } from "./types.ts";

/**
 * Resource-style client POSTing `{"carName": ...}` to the external lights endpoint.
 */
export class RestAdapter implements ProtocolAdapter {
  readonly label = "REST";
  readonly requestName = "externalLights";

  private readonly url: string;
  private readonly timeoutMs: number;

  constructor(options: HttpAdapterOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT;
  }

  async fetch(vehicleName: string): Promise<RequestOutcome> {
    const timer = startTimer();
    let responseBytes = 0;

    try {
      const exchange = await postJson(this.url, { carName: vehicleName }, this.timeoutMs);
      responseBytes = exchange.body.length;

      if (exchange.status < 200 || exchange.status > 299) {
        throw new ProtocolError(`Unexpected HTTP status ${exchange.status}`);
      }
      parseStatusDocument(parseJsonBody(exchange.body));

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
