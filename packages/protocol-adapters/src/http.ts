import { DecodeError } from "@lightbench/status-codec";
import { RequestTimeoutError } from "./outcome.ts";

export interface HttpExchange {
  status: number;
  body: Uint8Array;
}

const textDecoder = new TextDecoder();

/**
 * POST a JSON body and read the full response body.
 *
 * The timeout covers connect, headers and body. Rejects with
 * RequestTimeoutError when it fires, or with the fetch error otherwise.
 */
export async function postJson(
  url: string,
  payload: unknown,
  timeoutMs: number
): Promise<HttpExchange> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort(new RequestTimeoutError(timeoutMs));
  }, timeoutMs);

  try {
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
      signal: controller.signal,
    });
    const body = new Uint8Array(await response.arrayBuffer());
    return { status: response.status, body };
  } catch (err) {
    if (controller.signal.aborted) {
      throw new RequestTimeoutError(timeoutMs);
    }
    throw err;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Parse a response body as JSON.
 *
 * @throws DecodeError if the body is not valid JSON
 */
export function parseJsonBody(body: Uint8Array): unknown {
  try {
    return JSON.parse(textDecoder.decode(body));
  } catch (err) {
    throw new DecodeError(
      `Response body is not JSON: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }
}
