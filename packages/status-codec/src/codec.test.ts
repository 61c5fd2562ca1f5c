import { describe, it } from "node:test";
import assert from "node:assert";
import { decode, encode, encodeCompact, encodeStatus } from "./codec.ts";
import { DecodeError, TemplateError, UnknownStatusError } from "./errors.ts";
import { LIGHT_STATUSES } from "./light-status.ts";
import {
  CODE_PLACEHOLDER,
  DEFAULT_TEMPLATE,
  FETCH_SID,
  NAME_PLACEHOLDER,
  compileTemplate,
  type CompactRecord,
} from "./template.ts";

function leaf(record: CompactRecord, path: readonly number[]): unknown {
  let node: unknown = record;
  for (const key of path) {
    node = node instanceof Map ? node.get(key) : undefined;
  }
  return node;
}

describe("compileTemplate", () => {
  it("builds nested maps with placeholder leaves", () => {
    const template = compileTemplate({ namePath: [1, 2], codePath: [1, 3] });
    const inner = template.record.get(1);
    assert.ok(inner instanceof Map);
    assert.strictEqual(inner.get(2), NAME_PLACEHOLDER);
    assert.strictEqual(inner.get(3), CODE_PLACEHOLDER);
  });

  it("rejects overlapping paths", () => {
    assert.throws(
      () => compileTemplate({ namePath: [1, 2], codePath: [1, 2, 3] }),
      TemplateError
    );
    assert.throws(() => compileTemplate({ namePath: [], codePath: [1] }), TemplateError);
  });

  it("places the default leaves under the fetch SID", () => {
    assert.deepStrictEqual([...DEFAULT_TEMPLATE.record.keys()], [FETCH_SID]);
    assert.strictEqual(leaf(DEFAULT_TEMPLATE.record, [FETCH_SID, 4, 1, 1]), CODE_PLACEHOLDER);
    assert.strictEqual(leaf(DEFAULT_TEMPLATE.record, [FETCH_SID, 4, 1, 2]), NAME_PLACEHOLDER);
  });
});

describe("encode", () => {
  it("writes both leaves", () => {
    const record = encode(DEFAULT_TEMPLATE, "roadrunner", "fogLightOn");
    assert.strictEqual(leaf(record, DEFAULT_TEMPLATE.codePath), 6);
    assert.strictEqual(leaf(record, DEFAULT_TEMPLATE.namePath), "roadrunner");
  });

  it("leaves the template untouched", () => {
    encode(DEFAULT_TEMPLATE, "roadrunner", "reverseLightOn");
    assert.strictEqual(leaf(DEFAULT_TEMPLATE.record, DEFAULT_TEMPLATE.codePath), CODE_PLACEHOLDER);
    assert.strictEqual(leaf(DEFAULT_TEMPLATE.record, DEFAULT_TEMPLATE.namePath), NAME_PLACEHOLDER);
  });

  it("throws UnknownStatusError for a status outside the table", () => {
    assert.throws(
      () => encode(DEFAULT_TEMPLATE, "roadrunner", "hazardLightsOn"),
      UnknownStatusError
    );
  });

  it("never mixes leaves across concurrent callers", async () => {
    const results = await Promise.all(
      Array.from({ length: 200 }, async (_, i) => {
        const name = `car-${i}`;
        const status = LIGHT_STATUSES[i % LIGHT_STATUSES.length];
        await Promise.resolve();
        const bytes = encodeStatus(DEFAULT_TEMPLATE, name, status);
        await new Promise((resolve) => setImmediate(resolve));
        return { name, status, decoded: decode(bytes) };
      })
    );

    for (const { name, status, decoded } of results) {
      assert.deepStrictEqual(decoded, { name, status });
    }
  });
});

describe("decode", () => {
  it("round-trips every light status", () => {
    for (const status of LIGHT_STATUSES) {
      const bytes = encodeStatus(DEFAULT_TEMPLATE, "roadrunner", status);
      assert.deepStrictEqual(decode(bytes), { name: "roadrunner", status });
    }
  });

  it("reads records built from a custom layout", () => {
    const template = compileTemplate({ namePath: [7, 1], codePath: [7, 2] });
    const bytes = encodeStatus(template, "wile", "leftTurnSignalOn");
    assert.deepStrictEqual(decode(bytes, template), { name: "wile", status: "leftTurnSignalOn" });
  });

  it("rejects a payload that is not a map", () => {
    assert.throws(() => decode(encodeCompact("no-op")), DecodeError);
  });

  it("rejects a record without the code leaf", () => {
    const record: CompactRecord = new Map([
      [FETCH_SID, new Map([[4, new Map([[1, new Map([[2, "roadrunner"]])]])]])],
    ]);
    assert.throws(() => decode(encodeCompact(record)), /Missing status code leaf/);
  });

  it("rejects a code outside 0-7", () => {
    const record: CompactRecord = new Map([
      [FETCH_SID, new Map([[4, new Map([[1, new Map<number, string | number>([[1, 9], [2, "roadrunner"]])]])]])],
    ]);
    assert.throws(() => decode(encodeCompact(record)), DecodeError);
  });

  it("rejects a truncated payload", () => {
    const bytes = encodeStatus(DEFAULT_TEMPLATE, "roadrunner", "fogLightOn");
    assert.throws(() => decode(bytes.subarray(0, bytes.length - 4)), DecodeError);
  });
});
