import { test, describe } from "node:test";
import assert from "node:assert";
import { LatencyReservoir } from "./reservoir.ts";

describe("LatencyReservoir", () => {
  test("returns null percentiles when empty", () => {
    const reservoir = new LatencyReservoir();
    assert.deepStrictEqual(reservoir.percentiles([50, 99]), [null, null]);
    assert.strictEqual(reservoir.percentile(50), null);
  });

  test("uses nearest-rank percentiles", () => {
    const reservoir = new LatencyReservoir();
    for (let i = 100; i >= 1; i--) {
      reservoir.add(i);
    }
    assert.deepStrictEqual(reservoir.percentiles([0, 50, 90, 95, 99, 100]), [1, 50, 90, 95, 99, 100]);
  });

  test("picks the middle value of a small sample", () => {
    const reservoir = new LatencyReservoir();
    [3, 1, 2].forEach((value) => reservoir.add(value));
    assert.strictEqual(reservoir.percentile(50), 2);
    assert.strictEqual(reservoir.percentile(90), 3);
  });

  test("keeps every value until full", () => {
    const reservoir = new LatencyReservoir(3);
    reservoir.add(5);
    reservoir.add(6);
    assert.strictEqual(reservoir.size, 2);
    assert.strictEqual(reservoir.seen, 2);
  });

  test("replaces a slot when the draw lands inside the sample", () => {
    const reservoir = new LatencyReservoir(2, () => 0);
    [1, 2, 3].forEach((value) => reservoir.add(value));

    assert.strictEqual(reservoir.size, 2);
    assert.strictEqual(reservoir.seen, 3);
    assert.deepStrictEqual(reservoir.percentiles([0, 100]), [2, 3]);
  });

  test("drops the value when the draw lands outside the sample", () => {
    const reservoir = new LatencyReservoir(2, () => 0.99);
    [1, 2, 3].forEach((value) => reservoir.add(value));

    assert.strictEqual(reservoir.seen, 3);
    assert.deepStrictEqual(reservoir.percentiles([0, 100]), [1, 2]);
  });

  test("stays bounded under a long stream", () => {
    const reservoir = new LatencyReservoir(100);
    for (let i = 0; i < 5000; i++) {
      reservoir.add(i % 50);
    }
    assert.strictEqual(reservoir.size, 100);
    assert.strictEqual(reservoir.seen, 5000);
  });

  test("clear empties the sample", () => {
    const reservoir = new LatencyReservoir();
    reservoir.add(1);
    reservoir.clear();
    assert.strictEqual(reservoir.size, 0);
    assert.strictEqual(reservoir.seen, 0);
  });

  test("rejects invalid capacity and ranks", () => {
    assert.throws(() => new LatencyReservoir(0), RangeError);
    assert.throws(() => new LatencyReservoir(1.5), RangeError);

    const reservoir = new LatencyReservoir();
    reservoir.add(1);
    assert.throws(() => reservoir.percentile(101), RangeError);
  });
});
