import { test, describe, before, after } from "node:test";
import assert from "node:assert";
import { decode } from "@lightbench/status-codec";
import { startCoapStubServer, type CoapStubServer } from "@lightbench/test-utils";
import { closeCoapSession, coapFetch, createCoapSession } from "./coap-session.ts";

async function within<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new Error(`still pending after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}

describe("coap session", () => {
  let stub: CoapStubServer;

  before(async () => {
    stub = await startCoapStubServer({ status: "fogLightOn" });
  });

  after(async () => {
    await stub.close();
  });

  test("FETCH with a plain text body gets the status record", async () => {
    const agent = await createCoapSession();
    try {
      const response = await within(
        coapFetch(agent, { host: stub.host, port: stub.port }, Buffer.from("roadrunner"), true),
        2000
      );

      assert.strictEqual(response.code, "2.05");
      assert.deepStrictEqual(decode(response.payload), { name: "roadrunner", status: "fogLightOn" });
      assert.deepStrictEqual(stub.getRequests().at(-1), {
        method: "FETCH",
        url: "/60001",
        body: "roadrunner",
      });
    } finally {
      await within(closeCoapSession(agent), 2000);
    }
  });

  test("closes a session after a completed request", async () => {
    const agent = await createCoapSession();
    await within(
      coapFetch(agent, { host: stub.host, port: stub.port }, Buffer.from("roadrunner"), true),
      2000
    );

    await within(closeCoapSession(agent), 2000);
  });

  test("closes a session that never sent anything", async () => {
    const agent = await createCoapSession();
    await within(closeCoapSession(agent), 2000);
  });
});
