import { createServer, type Server } from "node:http";
import { setTimeout as delay } from "node:timers/promises";
import { createServerAdapter } from "@whatwg-node/server";

export interface MockServerResponse {
  status?: number;
  body?: string;
  headers?: Record<string, string>;
  /** Hold the response back this long */
  delayMs?: number;
}

export interface RecordedRequest {
  method: string;
  path: string;
  headers: Record<string, string>;
  body?: string;
}

export interface IntegrationServer {
  /** The base URL of the server (e.g., "http://localhost:3000") */
  url: string;
  /** The port the server is listening on */
  port: number;
  /** Close the server and drop open connections */
  close(): Promise<void>;
  /** Set the response for a specific path */
  setResponse(path: string, response: MockServerResponse): void;
  /** Set a default response for any unmatched path */
  setDefaultResponse(response: MockServerResponse): void;
  /** Get all recorded requests */
  getRequests(): RecordedRequest[];
  /** Clear all recorded requests */
  clearRequests(): void;
  /** Clear all configured responses */
  clearResponses(): void;
}

/**
 * Start an HTTP server answering with canned responses per path.
 *
 * @example
 * const server = await startIntegrationServer();
 *
 * server.setResponse("/jsonrpc", {
 *   status: 200,
 *   body: JSON.stringify({ jsonrpc: "2.0", result: null, id: 1 }),
 *   headers: { "Content-Type": "application/json" }
 * });
 *
 * const adapter = new JsonRpcAdapter({ url: `${server.url}/jsonrpc` });
 * await adapter.fetch("roadrunner");
 *
 * server.getRequests()[0].body; // '{"jsonrpc":"2.0","method":"fetch",...}'
 *
 * await server.close();
 */
export async function startIntegrationServer(port?: number): Promise<IntegrationServer> {
  const responses = new Map<string, MockServerResponse>();
  const requests: RecordedRequest[] = [];
  let defaultResponse: MockServerResponse = { status: 404, body: "Not Found" };

  const adapter = createServerAdapter(async (request: Request) => {
    const url = new URL(request.url);
    const body = await request.text();

    const headers: Record<string, string> = {};
    request.headers.forEach((value, key) => {
      headers[key] = value;
    });
    requests.push({
      method: request.method,
      path: url.pathname,
      headers,
      body: body.length > 0 ? body : undefined,
    });

    const mockResponse = responses.get(url.pathname) ?? defaultResponse;
    if (mockResponse.delayMs) {
      await delay(mockResponse.delayMs);
    }

    return new Response(mockResponse.body ?? "", {
      status: mockResponse.status ?? 200,
      headers: mockResponse.headers,
    });
  });

  const server: Server = createServer(adapter);

  const actualPort = await new Promise<number>((resolve, reject) => {
    server.on("error", reject);
    server.listen(port ?? 0, "127.0.0.1", () => {
      server.removeListener("error", reject);
      const address = server.address();
      if (address && typeof address === "object") {
        resolve(address.port);
      } else {
        reject(new Error("Failed to get server address"));
      }
    });
  });

  return {
    url: `http://127.0.0.1:${actualPort}`,
    port: actualPort,

    async close() {
      server.closeAllConnections();
      return new Promise((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    },

    setResponse(path: string, response: MockServerResponse) {
      responses.set(path, response);
    },

    setDefaultResponse(response: MockServerResponse) {
      defaultResponse = response;
    },

    getRequests() {
      return [...requests];
    },

    clearRequests() {
      requests.length = 0;
    },

    clearResponses() {
      responses.clear();
      defaultResponse = { status: 404, body: "Not Found" };
    },
  };
}
