import { createSocket, type Socket } from "node:dgram";
import { createServer } from "coap";
import {
  DEFAULT_TEMPLATE,
  FETCH_SID,
  encodeStatus,
  randomLightStatus,
  type CompiledTemplate,
  type LightStatus,
} from "@lightbench/status-codec";

const HOST = "127.0.0.1";

/** Reply sent when the body names a vehicle the stub does not know */
export const NO_OP_PAYLOAD = "no-op";

export interface CoapStubOptions {
  /** Vehicle the stub answers for (default: "roadrunner") */
  vehicleName?: string;
  /** Resource path without the leading slash (default: the fetch SID) */
  path?: string;
  /** Fixed status to report; random per request when omitted */
  status?: LightStatus;
  template?: CompiledTemplate;
  /** Hold every reply back this long */
  delayMs?: number;
}

export interface RecordedCoapRequest {
  method: string;
  url: string;
  body: string;
}

export interface CoapStubServer {
  host: string;
  port: number;
  path: string;
  getRequests(): RecordedCoapRequest[];
  close(): Promise<void>;
}

function bindSocket(socket: Socket, port: number): Promise<number> {
  return new Promise((resolve, reject) => {
    socket.once("error", reject);
    socket.bind(port, HOST, () => {
      socket.removeListener("error", reject);
      resolve(socket.address().port);
    });
  });
}

function closeSocket(socket: Socket): Promise<void> {
  return new Promise((resolve) => {
    socket.close(() => resolve());
  });
}

/**
 * Ask the OS for a UDP port that is free right now.
 */
export async function findFreeUdpPort(): Promise<number> {
  const socket = createSocket("udp4");
  const port = await bindSocket(socket, 0);
  await closeSocket(socket);
  return port;
}

/**
 * Start a CoAP server answering FETCH on one resource with a CBOR status record.
 *
 * Unknown paths get 4.04, other methods 4.05, unknown vehicle names a plain
 * "no-op" payload.
 */
export async function startCoapStubServer(options: CoapStubOptions = {}): Promise<CoapStubServer> {
  const vehicleName = options.vehicleName ?? "roadrunner";
  const path = options.path ?? String(FETCH_SID);
  const template = options.template ?? DEFAULT_TEMPLATE;
  const requests: RecordedCoapRequest[] = [];

  const server = createServer({ type: "udp4" }, (req, res) => {
    const body = req.payload.toString("utf-8");
    requests.push({ method: req.method, url: req.url, body });

    if (req.url !== `/${path}`) {
      res.code = "4.04";
      res.end();
      return;
    }
    if (req.method !== "FETCH") {
      res.code = "4.05";
      res.end();
      return;
    }

    const reply = (): void => {
      if (body === vehicleName) {
        const status = options.status ?? randomLightStatus();
        res.setOption("Content-Format", "application/octet-stream");
        res.end(Buffer.from(encodeStatus(template, vehicleName, status)));
      } else {
        res.end(Buffer.from(NO_OP_PAYLOAD));
      }
    };

    if (options.delayMs) {
      setTimeout(reply, options.delayMs);
    } else {
      reply();
    }
  });

  const port = await findFreeUdpPort();
  await new Promise<void>((resolve, reject) => {
    server.listen(port, HOST, (err?: Error) => {
      if (err) reject(err);
      else resolve();
    });
  });

  return {
    host: HOST,
    port,
    path,
    getRequests: () => [...requests],
    close: () =>
      new Promise((resolve, reject) => {
        server.close((err?: Error) => {
          if (err) reject(err);
          else resolve();
        });
      }),
  };
}
