import type { Agent } from "coap";
import {
  LazyBridge,
  type BridgeOptions,
  type ExecutionBridge,
} from "@lightbench/execution-bridge";
import { DEFAULT_TEMPLATE, decode, type CompiledTemplate } from "@lightbench/status-codec";
import {
  closeCoapSession,
  coapFetch,
  createCoapSession,
  isSuccessCode,
} from "./coap-session.ts";
import { DEFAULT_TIMEOUT, ProtocolError, createOutcome, startTimer } from "./outcome.ts";
import type { DatagramTarget, ProtocolAdapter, RequestOutcome } from "./types.ts";

export type CoapBridge = LazyBridge<Agent>;

/**
 * Create a lazily started bridge owning one CoAP session.
 */
export function createCoapBridge(
  options: Partial<Pick<BridgeOptions<Agent>, "name" | "startupTimeoutMs">> = {}
): CoapBridge {
  return new LazyBridge<Agent>({
    name: options.name ?? "coap",
    createSession: createCoapSession,
    disposeSession: closeCoapSession,
    startupTimeoutMs: options.startupTimeoutMs,
  });
}

/** Process-wide CoAP bridge used unless an adapter is given its own. */
export const sharedCoapBridge: CoapBridge = createCoapBridge();

export interface DatagramAdapterOptions extends DatagramTarget {
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** Send confirmable messages (default: true) */
  confirmable?: boolean;
  /** Layout used to read the response record */
  template?: CompiledTemplate;
  bridge?: CoapBridge;
}

/**
 * CoAP client issuing FETCH with the vehicle name as body and decoding the
 * CBOR record it gets back.
 */
export class DatagramAdapter implements ProtocolAdapter {
  readonly label = "COAP";
  readonly requestName = "fetch";

  private readonly bridge: ExecutionBridge<Agent>;
  private readonly target: DatagramTarget;
  private readonly timeoutMs: number;
  private readonly confirmable: boolean;
  private readonly template: CompiledTemplate;

  private constructor(bridge: ExecutionBridge<Agent>, options: DatagramAdapterOptions) {
    this.bridge = bridge;
    this.target = { host: options.host, port: options.port, path: options.path };
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT;
    this.confirmable = options.confirmable ?? true;
    this.template = options.template ?? DEFAULT_TEMPLATE;
  }

  /**
   * Acquire the CoAP bridge and build an adapter on it.
   *
   * @throws BridgeStartupError if the bridge session cannot be started
   */
  static async create(options: DatagramAdapterOptions): Promise<DatagramAdapter> {
    const bridge = await (options.bridge ?? sharedCoapBridge).acquire();
    return new DatagramAdapter(bridge, options);
  }

  async fetch(vehicleName: string): Promise<RequestOutcome> {
    const timer = startTimer();
    const body = Buffer.from(vehicleName, "utf-8");
    let responseBytes = 0;

    try {
      const response = await this.bridge.submit(
        (agent) => coapFetch(agent, this.target, body, this.confirmable),
        this.timeoutMs
      );
      responseBytes = response.payload.length;

      if (!isSuccessCode(response.code)) {
        throw new ProtocolError(`Unexpected CoAP response code ${response.code}`);
      }
      decode(response.payload, this.template);

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
