import { describe, it, afterEach } from "node:test";
import assert from "node:assert";
import { setTimeout as delay } from "node:timers/promises";
import {
  BridgeStartupError,
  BridgeTimeoutError,
  ExecutionBridge,
  LazyBridge,
  shutdownBridges,
} from "./index.ts";

interface FakeSession {
  id: number;
  disposed: boolean;
}

function createFactory() {
  let created = 0;
  return {
    get created() {
      return created;
    },
    createSession: async (): Promise<FakeSession> => {
      created++;
      await delay(10);
      return { id: created, disposed: false };
    },
    disposeSession: (session: FakeSession) => {
      session.disposed = true;
    },
  };
}

describe("ExecutionBridge", () => {
  afterEach(async () => {
    await shutdownBridges();
  });

  it("runs submitted work against the owned session", async () => {
    const factory = createFactory();
    const bridge = await ExecutionBridge.start({ name: "test", ...factory });

    const id = await bridge.submit(async (session) => session.id, 1000);
    assert.strictEqual(id, 1);
    assert.strictEqual(bridge.pendingCount, 0);
    await bridge.shutdown();
  });

  it("delivers out-of-order completions to their own callers", async () => {
    const bridge = await ExecutionBridge.start({ name: "test", ...createFactory() });
    const finished: string[] = [];

    const slow = bridge.submit(async () => {
      await delay(40);
      finished.push("slow");
      return "slow";
    }, 1000);
    const fast = bridge.submit(async () => {
      await delay(5);
      finished.push("fast");
      return "fast";
    }, 1000);

    assert.deepStrictEqual(await Promise.all([slow, fast]), ["slow", "fast"]);
    assert.deepStrictEqual(finished, ["fast", "slow"]);
    await bridge.shutdown();
  });

  it("propagates errors thrown by the work", async () => {
    const bridge = await ExecutionBridge.start({ name: "test", ...createFactory() });

    await assert.rejects(
      bridge.submit(async () => {
        throw new Error("boom");
      }, 1000),
      /boom/
    );
    await bridge.shutdown();
  });

  it("times out a slow submission and drops its late result", async () => {
    const bridge = await ExecutionBridge.start({ name: "test", ...createFactory() });
    let lateValueProduced = false;

    await assert.rejects(
      bridge.submit(async () => {
        await delay(80);
        lateValueProduced = true;
        return 1;
      }, 20),
      BridgeTimeoutError
    );
    assert.strictEqual(bridge.pendingCount, 0);

    await delay(100);
    assert.strictEqual(lateValueProduced, true);
    assert.strictEqual(bridge.pendingCount, 0);
    await bridge.shutdown();
  });

  it("rejects pending and new submissions after shutdown", async () => {
    const factory = createFactory();
    const sessions: FakeSession[] = [];
    const bridge = await ExecutionBridge.start({
      name: "test",
      createSession: async () => {
        const session = await factory.createSession();
        sessions.push(session);
        return session;
      },
      disposeSession: factory.disposeSession,
    });

    const pending = bridge.submit(() => delay(500), 1000);
    await delay(5);
    await bridge.shutdown();

    await assert.rejects(pending, /shut down before completion/);
    await assert.rejects(bridge.submit(async () => 1, 1000), /is shut down/);
    assert.deepStrictEqual(sessions, [{ id: 1, disposed: true }]);
    assert.strictEqual(bridge.isClosed, true);
  });

  it("fails startup when the session never arrives", async () => {
    const started = Date.now();
    await assert.rejects(
      ExecutionBridge.start({
        name: "stuck",
        createSession: () => new Promise<never>(() => {}),
        startupTimeoutMs: 50,
      }),
      (err: unknown) => err instanceof BridgeStartupError && err.bridgeName === "stuck"
    );
    assert.ok(Date.now() - started >= 45);
  });

  it("wraps factory failures in BridgeStartupError", async () => {
    await assert.rejects(
      ExecutionBridge.start({
        name: "broken",
        createSession: async () => {
          throw new Error("socket bind failed");
        },
      }),
      (err: unknown) =>
        err instanceof BridgeStartupError &&
        err.message === 'Bridge "broken" failed to start: socket bind failed'
    );
  });
});

describe("LazyBridge", () => {
  afterEach(async () => {
    await shutdownBridges();
  });

  it("creates one session for concurrent first callers", async () => {
    const factory = createFactory();
    const lazy = new LazyBridge({ name: "lazy", ...factory });

    const bridges = await Promise.all([lazy.acquire(), lazy.acquire(), lazy.acquire()]);
    assert.strictEqual(factory.created, 1);
    assert.strictEqual(bridges[0], bridges[1]);
    assert.strictEqual(bridges[1], bridges[2]);
    assert.strictEqual(lazy.started, true);
  });

  it("keeps a failed startup final", async () => {
    let attempts = 0;
    const lazy = new LazyBridge<FakeSession>({
      name: "doomed",
      createSession: async () => {
        attempts++;
        throw new Error("no route");
      },
    });

    await assert.rejects(lazy.acquire(), BridgeStartupError);
    await assert.rejects(lazy.acquire(), BridgeStartupError);
    assert.strictEqual(attempts, 1);
  });

  it("disposes started sessions through shutdownBridges", async () => {
    const factory = createFactory();
    const lazy = new LazyBridge({ name: "lazy", ...factory });
    const bridge = await lazy.acquire();
    const session = await bridge.submit(async (s) => s, 1000);

    await shutdownBridges();
    assert.strictEqual(session.disposed, true);
    assert.strictEqual(bridge.isClosed, true);
  });
});
