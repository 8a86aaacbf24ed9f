/**
 * Coinset: Subset
 *
 * An ordered list of indexes into a coin collection with cached totals.
 * Totals are summed once at construction and then maintained on every
 * push/pop. All coins added or removed must keep a constant valueAge()
 * while the subset is in use, otherwise the cached totals are wrong.
 */

import { EmptySubsetError } from "../errors.js";
import type { ValueAgeCoin, ValueAgeCoins } from "../types.js";

export class Subset {
  private readonly set: ValueAgeCoins;
  private idxs: number[];
  // idxs[0 .. head) have been popped from the front
  private head = 0;

  private _totalAmount = 0;
  private _totalValueAge = 0n;

  constructor(set: ValueAgeCoins, idxs: readonly number[] = []) {
    this.set = set;
    this.idxs = [...idxs];
    for (const i of this.idxs) {
      this.addTotals(set.valueAgeCoin(i));
    }
  }

  get totalAmount(): number {
    return this._totalAmount;
  }

  get totalValueAge(): bigint {
    return this._totalValueAge;
  }

  len(): number {
    return this.idxs.length - this.head;
  }

  /** Appends the coin at index i of the source collection. */
  pushBack(i: number): void {
    const c = this.set.valueAgeCoin(i);
    this.idxs.push(i);
    this.addTotals(c);
  }

  /** Removes and returns the last coin. */
  popBack(): ValueAgeCoin {
    const i = this.idxs[this.idxs.length - 1];
    if (i === undefined || this.len() === 0) throw new EmptySubsetError("popBack");
    const back = this.set.valueAgeCoin(i);
    this.idxs.pop();
    this.subTotals(back);
    return back;
  }

  /** Removes and returns the first coin. Amortized O(1). */
  popFront(): ValueAgeCoin {
    const i = this.idxs[this.head];
    if (i === undefined) throw new EmptySubsetError("popFront");
    const front = this.set.valueAgeCoin(i);
    this.head++;
    if (this.head * 2 >= this.idxs.length) this.compact();
    this.subTotals(front);
    return front;
  }

  indexes(): readonly number[] {
    this.compact();
    return this.idxs;
  }

  /** The referenced coins, in subset order */
  coins(): ValueAgeCoin[] {
    return this.indexes().map((i) => this.set.valueAgeCoin(i));
  }

  private compact(): void {
    if (this.head === 0) return;
    this.idxs = this.idxs.slice(this.head);
    this.head = 0;
  }

  private addTotals(c: ValueAgeCoin): void {
    this._totalAmount += c.amount();
    this._totalValueAge += c.valueAge();
  }

  private subTotals(c: ValueAgeCoin): void {
    this._totalAmount -= c.amount();
    this._totalValueAge -= c.valueAge();
  }
}
