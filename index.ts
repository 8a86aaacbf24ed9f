/**
 * Coinset: Entry Point
 *
 * Greedy coin selection over collections of spendable outputs: index order,
 * fewest inputs, maximum value-age and minimum average priority.
 */

export type {
  AmountCoin,
  AmountCoins,
  Coin,
  Coins,
  CoinsetConfig,
  LogFn,
  MinPriorityConfig,
  SelectionArgsConfig,
  SelectionResult,
  SelectionStrategy,
  TxLike,
  ValueAgeCoin,
  ValueAgeCoins,
} from "./src/types.js";
export {
  CoinsetError,
  EmptySubsetError,
  InvalidSelectionArgsError,
  NoSelectionAvailableError,
} from "./src/errors.js";
export { parseCoinsetConfig, createSelector } from "./src/config.js";
export { CoinCollection, CoinWindow } from "./src/coins/collection.js";
export { SimpleCoin } from "./src/coins/simple-coin.js";
export { byAmount, byValueAge, reverse, sortCoins, type CoinOrder } from "./src/selection/ordering.js";
export { Subset } from "./src/selection/subset.js";
export { SelectionArgs, satisfiesTargetAmount } from "./src/selection/args.js";
export {
  MaxValueAgeCoinSelector,
  MinIndexCoinSelector,
  MinNumberCoinSelector,
  MinPriorityCoinSelector,
  type CoinSelector,
} from "./src/selection/selectors.js";
