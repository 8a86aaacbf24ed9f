/**
 * Shared test fixtures.
 */

import type { Coin } from "../src/types.js";

export interface TestCoin extends Coin {
  label: string;
}

export function makeCoin(
  amount: number,
  valueAge: number | bigint = 0,
  label = `${amount}/${valueAge}`,
): TestCoin {
  return {
    label,
    amount: () => amount,
    valueAge: () => BigInt(valueAge),
  };
}

/** Deterministic PRNG (LCG) so randomized tests replay identically. */
export function makeRng(seed: number): (maxExclusive: number) => number {
  let state = seed >>> 0;
  return (maxExclusive: number) => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state % maxExclusive;
  };
}

export function labels(coins: readonly TestCoin[]): string[] {
  return coins.map((c) => c.label);
}
