/**
 * Subset tests: cached totals under push/pop, empty-subset errors.
 *
 * Run: npx tsx --test tests/subset.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { CoinCollection } from "../src/coins/collection.js";
import { EmptySubsetError } from "../src/errors.js";
import { Subset } from "../src/selection/subset.js";
import { makeCoin, makeRng } from "./helpers.js";

function freshSet() {
  return new CoinCollection([
    makeCoin(100, 1_000, "a"),
    makeCoin(250, 500, "b"),
    makeCoin(40, 0, "c"),
    makeCoin(700, 7_000, "d"),
  ]);
}

function recompute(set: CoinCollection, idxs: readonly number[]): { amount: number; valueAge: bigint } {
  let amount = 0;
  let valueAge = 0n;
  for (const i of idxs) {
    amount += set.coin(i).amount();
    valueAge += set.coin(i).valueAge();
  }
  return { amount, valueAge };
}

describe("Subset", () => {
  it("sums the initial indexes on construction", () => {
    const s = new Subset(freshSet(), [0, 3]);
    assert.equal(s.totalAmount, 800);
    assert.equal(s.totalValueAge, 8_000n);
    assert.deepEqual(s.indexes(), [0, 3]);
    assert.equal(s.len(), 2);
  });

  it("starts empty with zero totals", () => {
    const s = new Subset(freshSet());
    assert.equal(s.len(), 0);
    assert.equal(s.totalAmount, 0);
    assert.equal(s.totalValueAge, 0n);
  });

  it("pushBack adds the coin's contribution", () => {
    const s = new Subset(freshSet(), [0]);
    s.pushBack(1);
    assert.deepEqual(s.indexes(), [0, 1]);
    assert.equal(s.totalAmount, 350);
    assert.equal(s.totalValueAge, 1_500n);
  });

  it("popBack removes and returns the last coin", () => {
    const set = freshSet();
    const s = new Subset(set, [0, 1, 3]);
    const back = s.popBack();
    assert.equal(back, set.coin(3));
    assert.deepEqual(s.indexes(), [0, 1]);
    assert.equal(s.totalAmount, 350);
    assert.equal(s.totalValueAge, 1_500n);
  });

  it("popFront removes and returns the first coin", () => {
    const set = freshSet();
    const s = new Subset(set, [0, 1, 3]);
    const front = s.popFront();
    assert.equal(front, set.coin(0));
    assert.deepEqual(s.indexes(), [1, 3]);
    assert.equal(s.totalAmount, 950);
    assert.equal(s.totalValueAge, 7_500n);
  });

  it("coins() materializes the referenced coins in order", () => {
    const set = freshSet();
    const s = new Subset(set, [3, 0]);
    assert.deepEqual(s.coins(), [set.coin(3), set.coin(0)]);
  });

  it("does not alias the index array it was built from", () => {
    const idxs = [0, 1];
    const s = new Subset(freshSet(), idxs);
    s.pushBack(2);
    assert.deepEqual(idxs, [0, 1]);
  });

  it("popBack on an empty subset throws EmptySubsetError and keeps totals", () => {
    const s = new Subset(freshSet());
    assert.throws(() => s.popBack(), EmptySubsetError);
    assert.equal(s.totalAmount, 0);
    assert.equal(s.totalValueAge, 0n);
    assert.equal(s.len(), 0);
  });

  it("popFront on an empty subset throws EmptySubsetError", () => {
    const s = new Subset(freshSet(), [2]);
    s.popFront();
    assert.throws(
      () => s.popFront(),
      (err: unknown) => err instanceof EmptySubsetError && err.code === "EMPTY_SUBSET",
    );
    assert.equal(s.totalAmount, 0);
  });

  it("popFront keeps order across pushes and repeated front removals", () => {
    const set = freshSet();
    const s = new Subset(set, [0, 1, 2, 3]);
    s.popFront();
    s.popFront();
    s.pushBack(0);
    s.popFront();
    assert.deepEqual(s.indexes(), [3, 0]);
    assert.equal(s.len(), 2);
    assert.equal(s.totalAmount, 800);
    assert.equal(s.totalValueAge, 8_000n);
    assert.equal(s.popFront(), set.coin(3));
    assert.equal(s.popBack(), set.coin(0));
    assert.equal(s.len(), 0);
    assert.throws(() => s.popBack(), EmptySubsetError);
  });

  it("sums value-ages past the safe integer range exactly", () => {
    const set = new CoinCollection([makeCoin(1, 2n ** 60n), makeCoin(1, 2n ** 60n + 1n)]);
    const s = new Subset(set, [0, 1]);
    assert.equal(s.totalValueAge, 2n ** 61n + 1n);
    s.popFront();
    assert.equal(s.totalValueAge, 2n ** 60n + 1n);
  });

  it("totals match a full recomputation after random operation sequences", () => {
    const set = freshSet();
    const rng = makeRng(42);

    for (let round = 0; round < 20; round++) {
      const s = new Subset(set);
      for (let step = 0; step < 50; step++) {
        const op = rng(3);
        if (op === 0 || s.len() === 0) {
          s.pushBack(rng(set.len()));
        } else if (op === 1) {
          s.popBack();
        } else {
          s.popFront();
        }
        const expected = recompute(set, s.indexes());
        assert.equal(s.totalAmount, expected.amount);
        assert.equal(s.totalValueAge, expected.valueAge);
      }
    }
  });
});
