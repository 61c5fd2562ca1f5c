/**
 * @lightbench/protocol-adapters
 *
 * One adapter per transport, all answering "what is the light status of this
 * vehicle?" and all reporting through the same outcome record.
 */

export {
  ERROR_KINDS,
  type ErrorKind,
  type OutcomeError,
  type RequestOutcome,
  type ProtocolAdapter,
  type HttpAdapterOptions,
  type DatagramTarget,
} from "./types.ts";

export {
  DEFAULT_TIMEOUT,
  ProtocolError,
  RequestTimeoutError,
  classifyError,
  createOutcome,
  startTimer,
  type OutcomeInit,
  type RequestTimer,
} from "./outcome.ts";

export { JsonRpcAdapter, type JsonRpcRequest } from "./json-rpc.ts";
export { RestAdapter } from "./rest.ts";
export {
  DatagramAdapter,
  createCoapBridge,
  sharedCoapBridge,
  type CoapBridge,
  type DatagramAdapterOptions,
} from "./datagram.ts";
export { DEFAULT_COAP_PATH, type CoapResponse } from "./coap-session.ts";
