/**
 * Coinset: Ordering
 *
 * Strict weak orderings over coin collections. sortCoins() reorders the
 * collection itself through swap(), so positions from before the sort are
 * lost; callers that need them must sort a copy (see CoinWindow).
 */

import type { AmountCoins, ValueAgeCoins } from "../types.js";

export interface CoinOrder {
  readonly coins: AmountCoins;
  less(i: number, j: number): boolean;
}

export function byAmount(coins: AmountCoins): CoinOrder {
  return {
    coins,
    less: (i, j) => coins.amountCoin(i).amount() < coins.amountCoin(j).amount(),
  };
}

export function byValueAge(coins: ValueAgeCoins): CoinOrder {
  return {
    coins,
    less: (i, j) => coins.valueAgeCoin(i).valueAge() < coins.valueAgeCoin(j).valueAge(),
  };
}

/** Descending version of an order */
export function reverse(order: CoinOrder): CoinOrder {
  return {
    coins: order.coins,
    less: (i, j) => order.less(j, i),
  };
}

/**
 * Stable in-place sort. The target permutation is computed up front against
 * the unsorted collection, then applied with at most len() - 1 swaps.
 */
export function sortCoins(order: CoinOrder): void {
  const n = order.coins.len();
  const perm: number[] = [];
  for (let i = 0; i < n; i++) perm.push(i);
  perm.sort((a, b) => (order.less(a, b) ? -1 : order.less(b, a) ? 1 : 0));

  // at[p]: original index now at position p; pos[o]: current position of original o
  const at = [...Array(n).keys()];
  const pos = [...Array(n).keys()];

  for (let k = 0; k < n; k++) {
    const want = perm[k];
    if (want === undefined) break;
    const from = pos[want];
    const here = at[k];
    if (from === undefined || here === undefined || from === k) continue;
    order.coins.swap(k, from);
    at[k] = want;
    at[from] = here;
    pos[want] = k;
    pos[here] = from;
  }
}
