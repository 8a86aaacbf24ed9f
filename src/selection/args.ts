/**
 * Coinset: Selection Algorithms
 *
 * Greedy, sort-then-scan coin selection. Every policy orders the collection
 * (in place) and then runs the same index-order scan; none of them searches
 * for an optimal subset.
 *
 * Returned indexes refer to the collection as it is after the call, i.e.
 * after any reordering the policy performed.
 */

import { CoinWindow } from "../coins/collection.js";
import { InvalidSelectionArgsError, NoSelectionAvailableError } from "../errors.js";
import type { AmountCoins, SelectionArgsConfig, ValueAgeCoins } from "../types.js";
import { byAmount, byValueAge, reverse, sortCoins } from "./ordering.js";
import { Subset } from "./subset.js";

/**
 * Whether the total is exactly the target, or exceeds it by at least
 * minChange (so no dust change output is created).
 */
export function satisfiesTargetAmount(target: number, minChange: number, total: number): boolean {
  return total === target || total >= target + minChange;
}

/** Arguments shared by all selection algorithms */
export class SelectionArgs implements SelectionArgsConfig {
  readonly maxInputs: number;
  readonly minChangeAmount: number;

  constructor(args: SelectionArgsConfig) {
    if (!Number.isInteger(args.maxInputs) || args.maxInputs < 0) {
      throw new InvalidSelectionArgsError(`maxInputs must be a non-negative integer, got ${args.maxInputs}`);
    }
    if (!Number.isInteger(args.minChangeAmount) || args.minChangeAmount < 0) {
      throw new InvalidSelectionArgsError(
        `minChangeAmount must be a non-negative integer, got ${args.minChangeAmount}`,
      );
    }
    this.maxInputs = args.maxInputs;
    this.minChangeAmount = args.minChangeAmount;
    Object.freeze(this);
  }

  /**
   * Select the shortest prefix of the collection (at most maxInputs long)
   * whose total satisfies the target. Prefers lower indexes over higher ones.
   */
  selectMinIndex(target: number, coins: AmountCoins): number[] {
    let total = 0;
    const numCoins = coins.len();
    for (let i = 0; i < numCoins && i < this.maxInputs; i++) {
      total += coins.amountCoin(i).amount();
      if (satisfiesTargetAmount(target, this.minChangeAmount, total)) {
        return [...Array(i + 1).keys()];
      }
    }
    throw new NoSelectionAvailableError(target);
  }

  /** Largest coins first, to use as few inputs as possible. */
  minNumberSelect(target: number, coins: AmountCoins): number[] {
    sortCoins(reverse(byAmount(coins)));
    return this.selectMinIndex(target, coins);
  }

  /**
   * Highest value-age first. Useful where priority is weighted by input
   * age, to improve the odds of the transaction being mined soon.
   */
  maxValueAgeSelect(target: number, coins: ValueAgeCoins): number[] {
    sortCoins(reverse(byValueAge(coins)));
    return this.selectMinIndex(target, coins);
  }

  /**
   * Select coins totalling the target whose average value-age per input is
   * at least minAvgValueAgePerInput.
   *
   * Coins are sorted ascending by value-age. Windows of high-priority coins
   * (value-age >= threshold) are tried in growing order. A window that meets
   * the target on its own is padded with low-priority coins to bring the
   * average down toward the threshold; one that falls short is topped up by
   * a recursive selection over the low-priority coins with a derived
   * threshold. No claim of minimality is made.
   */
  minPrioritySelect(minAvgValueAgePerInput: bigint, target: number, coins: ValueAgeCoins): number[] {
    sortCoins(byValueAge(coins));

    const numCoins = coins.len();
    let cutoff = -1;
    for (let i = 0; i < numCoins; i++) {
      if (coins.valueAgeCoin(i).valueAge() >= minAvgValueAgePerInput) {
        cutoff = i;
        break;
      }
    }
    if (cutoff < 0) {
      throw new NoSelectionAvailableError(target);
    }

    for (let i = cutoff; i < numCoins; i++) {
      const high = CoinWindow.range(coins, cutoff, i + 1);

      let highSelect: number[];
      try {
        highSelect = this.minNumberSelect(target, high);
      } catch (err) {
        if (!(err instanceof NoSelectionAvailableError)) throw err;
        const supplemented = this.supplementWithLow(minAvgValueAgePerInput, target, coins, cutoff, i);
        if (supplemented) return supplemented;
        continue;
      }

      const extended = new Subset(
        coins,
        highSelect.map((k) => high.sourceIndex(k)),
      );
      // lower the average toward the threshold, lowest value-age first
      for (let n = 0; n < cutoff; n++) {
        if (extended.len() >= this.maxInputs) break;
        if (coins.valueAgeCoin(n).valueAge() === 0n) continue;

        extended.pushBack(n);
        if (extended.totalValueAge < minAvgValueAgePerInput * BigInt(extended.len())) {
          extended.popBack();
          break;
        }
        if (!satisfiesTargetAmount(target, this.minChangeAmount, extended.totalAmount)) {
          extended.popBack();
        }
      }
      return [...extended.indexes()];
    }

    throw new NoSelectionAvailableError(target);
  }

  /**
   * Tops up the whole high-priority window [cutoff, end] with numLow
   * low-priority coins, for growing numLow within the input budget.
   * Returns null when no candidate works.
   */
  private supplementWithLow(
    minAvgValueAgePerInput: bigint,
    target: number,
    coins: ValueAgeCoins,
    cutoff: number,
    end: number,
  ): number[] | null {
    const windowIdxs = [...Array(end - cutoff + 1).keys()].map((k) => cutoff + k);
    const allHigh = new Subset(coins, windowIdxs);
    const residual = target - allHigh.totalAmount;

    // best[k]: largest amount any k low-priority coins can reach
    const lowAmounts: number[] = [];
    for (let n = 0; n < cutoff; n++) lowAmounts.push(coins.valueAgeCoin(n).amount());
    lowAmounts.sort((a, b) => b - a);
    const best = [0];
    for (const amount of lowAmounts) best.push((best[best.length - 1] ?? 0) + amount);

    for (let numLow = 1; numLow <= cutoff && allHigh.len() + numLow <= this.maxInputs; numLow++) {
      if ((best[numLow] ?? 0) < residual) continue;

      // bigint division truncates toward zero
      const lowMinAvg =
        (minAvgValueAgePerInput * BigInt(allHigh.len() + numLow) - allHigh.totalValueAge) / BigInt(numLow);
      const low = CoinWindow.range(coins, 0, cutoff);
      const lowArgs = new SelectionArgs({ maxInputs: numLow, minChangeAmount: this.minChangeAmount });

      let lowSelect: number[];
      try {
        lowSelect = lowArgs.minPrioritySelect(lowMinAvg, residual, low);
      } catch (err) {
        if (err instanceof NoSelectionAvailableError) continue;
        throw err;
      }

      const combined = new Subset(coins, allHigh.indexes());
      for (const k of lowSelect) combined.pushBack(low.sourceIndex(k));
      // fewer than numLow low coins may have been chosen, or the derived
      // threshold was truncated
      if (combined.totalValueAge < minAvgValueAgePerInput * BigInt(combined.len())) continue;
      return [...combined.indexes()];
    }
    return null;
  }
}
