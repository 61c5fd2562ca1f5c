/**
 * @lightbench/test-utils
 *
 * In-process stand-ins for the servers the adapters talk to.
 */

export {
  startIntegrationServer,
  type IntegrationServer,
  type MockServerResponse,
  type RecordedRequest,
} from "./server.ts";

export {
  startCoapStubServer,
  findFreeUdpPort,
  NO_OP_PAYLOAD,
  type CoapStubOptions,
  type CoapStubServer,
  type RecordedCoapRequest,
} from "./coap-server.ts";
