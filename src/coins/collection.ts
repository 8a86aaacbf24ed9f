/**
 * Coinset: Coin Collections
 *
 * CoinCollection is the array-backed Coins implementation handed to the
 * selection algorithms. CoinWindow is a reorderable view over part of
 * another collection: swapping inside the window permutes the window's own
 * index list and never touches the underlying collection.
 */

import type { Coin, Coins, ValueAgeCoin, ValueAgeCoins } from "../types.js";

export class CoinCollection<C extends Coin = Coin> implements Coins {
  private readonly items: C[];

  /** Copies the given coins; the caller's array is never reordered. */
  constructor(coins: readonly C[]) {
    this.items = [...coins];
  }

  coin(i: number): C {
    return this.at(i);
  }

  amountCoin(i: number): C {
    return this.at(i);
  }

  valueAgeCoin(i: number): C {
    return this.at(i);
  }

  len(): number {
    return this.items.length;
  }

  swap(i: number, j: number): void {
    const a = this.at(i);
    this.items[i] = this.at(j);
    this.items[j] = a;
  }

  /** Current order of the coins */
  toArray(): C[] {
    return [...this.items];
  }

  private at(i: number): C {
    const c = this.items[i];
    if (c === undefined) {
      throw new RangeError(`coin index ${i} out of range (len ${this.items.length})`);
    }
    return c;
  }
}

export class CoinWindow implements ValueAgeCoins {
  private readonly source: ValueAgeCoins;
  private readonly positions: number[];

  constructor(source: ValueAgeCoins, positions: readonly number[]) {
    this.source = source;
    this.positions = [...positions];
  }

  /** View over source positions [start, end) */
  static range(source: ValueAgeCoins, start: number, end: number): CoinWindow {
    const positions: number[] = [];
    for (let i = start; i < end; i++) positions.push(i);
    return new CoinWindow(source, positions);
  }

  /** Position in the source collection of window element i */
  sourceIndex(i: number): number {
    const p = this.positions[i];
    if (p === undefined) {
      throw new RangeError(`window index ${i} out of range (len ${this.positions.length})`);
    }
    return p;
  }

  amountCoin(i: number): ValueAgeCoin {
    return this.source.valueAgeCoin(this.sourceIndex(i));
  }

  valueAgeCoin(i: number): ValueAgeCoin {
    return this.source.valueAgeCoin(this.sourceIndex(i));
  }

  len(): number {
    return this.positions.length;
  }

  swap(i: number, j: number): void {
    const a = this.sourceIndex(i);
    this.positions[i] = this.sourceIndex(j);
    this.positions[j] = a;
  }
}
