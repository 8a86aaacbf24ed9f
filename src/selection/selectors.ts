/**
 * Coinset: Coin Selectors
 *
 * Each selector wraps one selection policy. A selector runs the policy over
 * an index view of the caller's coins, so the caller's array keeps its
 * order and the returned indexes are positions in that array.
 *
 * The coins must have a constant valueAge() while coinSelect() runs.
 */

import { CoinCollection, CoinWindow } from "../coins/collection.js";
import { InvalidSelectionArgsError, NoSelectionAvailableError } from "../errors.js";
import type {
  Coin,
  LogFn,
  SelectionArgsConfig,
  SelectionResult,
  SelectionStrategy,
  ValueAgeCoins,
} from "../types.js";
import { SelectionArgs } from "./args.js";
import { Subset } from "./subset.js";

/**
 * Select a subset of the coins worth at least the target. A selection is
 * not guaranteed even when the coins are worth more than the target in
 * total; the exact choice is policy specific.
 *
 * @throws NoSelectionAvailableError when the policy finds no selection
 */
export interface CoinSelector {
  readonly strategy: SelectionStrategy;
  coinSelect<C extends Coin>(target: number, coins: readonly C[]): SelectionResult<C>;
}

abstract class BaseCoinSelector implements CoinSelector {
  abstract readonly strategy: SelectionStrategy;
  protected readonly args: SelectionArgs;
  protected readonly log: LogFn;

  constructor(args: SelectionArgsConfig, log?: LogFn) {
    this.args = args instanceof SelectionArgs ? args : new SelectionArgs(args);
    this.log = log ?? (() => {});
  }

  protected abstract run(target: number, coins: ValueAgeCoins): number[];

  coinSelect<C extends Coin>(target: number, coins: readonly C[]): SelectionResult<C> {
    if (!Number.isInteger(target) || target < 0) {
      throw new InvalidSelectionArgsError(`target must be a non-negative integer, got ${target}`);
    }

    const set = new CoinCollection(coins);
    const view = CoinWindow.range(set, 0, set.len());
    let idxs: number[];
    try {
      idxs = this.run(target, view).map((k) => view.sourceIndex(k));
    } catch (err) {
      if (err instanceof NoSelectionAvailableError) {
        this.log(
          "warn",
          `coinset: ${this.strategy} found no selection for target ${target} among ${coins.length} coins`,
        );
      }
      throw err;
    }

    const subset = new Subset(set, idxs);
    const result: SelectionResult<C> = {
      coins: idxs.map((i) => set.coin(i)),
      indexes: idxs,
      totalAmount: subset.totalAmount,
      totalValueAge: subset.totalValueAge,
      strategy: this.strategy,
    };
    this.log(
      "info",
      `coinset: ${this.strategy} selected ${idxs.length} of ${coins.length} coins totalling ${result.totalAmount} for target ${target}`,
    );
    return result;
  }
}

/** Prefers the coins earliest in the caller's order. */
export class MinIndexCoinSelector extends BaseCoinSelector {
  readonly strategy = "min-index";

  protected run(target: number, coins: ValueAgeCoins): number[] {
    return this.args.selectMinIndex(target, coins);
  }
}

/** Uses as few inputs as possible (largest coins first). */
export class MinNumberCoinSelector extends BaseCoinSelector {
  readonly strategy = "min-number";

  protected run(target: number, coins: ValueAgeCoins): number[] {
    return this.args.minNumberSelect(target, coins);
  }
}

/** Maximizes input value-age (highest value-age first). */
export class MaxValueAgeCoinSelector extends BaseCoinSelector {
  readonly strategy = "max-value-age";

  protected run(target: number, coins: ValueAgeCoins): number[] {
    return this.args.maxValueAgeSelect(target, coins);
  }
}

/** Keeps the average value-age per input at or above a threshold. */
export class MinPriorityCoinSelector extends BaseCoinSelector {
  readonly strategy = "min-priority";
  readonly minAvgValueAgePerInput: bigint;

  constructor(args: SelectionArgsConfig, minAvgValueAgePerInput: bigint, log?: LogFn) {
    super(args, log);
    if (minAvgValueAgePerInput < 0n) {
      throw new InvalidSelectionArgsError(
        `minAvgValueAgePerInput must be non-negative, got ${minAvgValueAgePerInput}`,
      );
    }
    this.minAvgValueAgePerInput = minAvgValueAgePerInput;
  }

  protected run(target: number, coins: ValueAgeCoins): number[] {
    return this.args.minPrioritySelect(this.minAvgValueAgePerInput, target, coins);
  }
}
