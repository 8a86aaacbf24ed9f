/**
 * Coinset: Type Definitions
 *
 * Capability interfaces for coins and coin collections, plus the shapes
 * shared by the selection algorithms and selectors.
 */

// ============================================================================
// Coin Capabilities
// ============================================================================

/** A transaction output with a known amount. */
export interface AmountCoin {
  /** Amount in the smallest currency unit (always >= 0) */
  amount(): number;
}

/**
 * A transaction output with a known amount and value-age
 * (amount × confirmations, a priority proxy). Value-age is a bigint since
 * large, old outputs pass Number.MAX_SAFE_INTEGER.
 *
 * valueAge() must stay constant for the duration of a selection call,
 * otherwise the cached totals of a Subset are wrong.
 */
export interface ValueAgeCoin extends AmountCoin {
  valueAge(): bigint;
}

/** A spendable transaction output. */
export type Coin = ValueAgeCoin;

// ============================================================================
// Collection Capabilities
// ============================================================================

/** An ordered, indexed and reorderable set of outputs with known amounts. */
export interface AmountCoins {
  amountCoin(i: number): AmountCoin;
  len(): number;
  swap(i: number, j: number): void;
}

export interface ValueAgeCoins extends AmountCoins {
  valueAgeCoin(i: number): ValueAgeCoin;
}

/** A full coin collection exposing every narrowed view. */
export interface Coins extends ValueAgeCoins {
  coin(i: number): Coin;
}

// ============================================================================
// Selection
// ============================================================================

export type SelectionStrategy =
  | "min-index"
  | "min-number"
  | "max-value-age"
  | "min-priority";

/** Materialized outcome of a selector run */
export interface SelectionResult<C extends Coin = Coin> {
  /** Selected coins, in selection order */
  coins: C[];
  /** Positions of the selected coins in the caller's array */
  indexes: number[];
  /** Sum of amount() over the selected coins */
  totalAmount: number;
  /** Sum of valueAge() over the selected coins */
  totalValueAge: bigint;
  /** Policy that produced the selection */
  strategy: SelectionStrategy;
}

// ============================================================================
// Transaction Outputs (adapter input)
// ============================================================================

/** The slice of a transaction the coin adapter reads */
export interface TxLike {
  txid: string;
  outputs: ReadonlyArray<{
    /** Amount in the smallest currency unit */
    amount: number;
  }>;
}

// ============================================================================
// Config Types
// ============================================================================

export interface SelectionArgsConfig {
  /** Upper bound on the number of inputs in a selection */
  maxInputs: number;
  /** Minimum acceptable leftover above the target (0 allows any change) */
  minChangeAmount: number;
}

export interface MinPriorityConfig {
  /** Minimum average value-age per selected input (converted to bigint by createSelector) */
  minAvgValueAgePerInput: number;
}

export interface CoinsetConfig {
  strategy: SelectionStrategy;
  args: SelectionArgsConfig;
  minPriority: MinPriorityConfig;
}

export type LogFn = (level: "info" | "warn" | "error", msg: string) => void;
