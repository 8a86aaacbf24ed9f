/**
 * Coinset: Custom Error Types
 */

/** Base coinset error; all coinset errors extend this */
export class CoinsetError extends Error {
  public readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "CoinsetError";
    this.code = code;
  }
}

/**
 * No combination of coins meets the target under the given constraints.
 * An expected outcome (e.g. insufficient funds), not a defect.
 */
export class NoSelectionAvailableError extends CoinsetError {
  public readonly target?: number;

  constructor(target?: number) {
    super(
      "NO_SELECTION_AVAILABLE",
      target === undefined
        ? "no coin selection possible"
        : `no coin selection possible for target ${target}`,
    );
    this.name = "NoSelectionAvailableError";
    this.target = target;
  }
}

/** Attempt to remove a coin from an empty subset */
export class EmptySubsetError extends CoinsetError {
  constructor(operation: "popBack" | "popFront") {
    super("EMPTY_SUBSET", `cannot ${operation}() from an empty subset`);
    this.name = "EmptySubsetError";
  }
}

/** Invalid configuration or arguments */
export class InvalidSelectionArgsError extends CoinsetError {
  constructor(message: string) {
    super("INVALID_SELECTION_ARGS", message);
    this.name = "InvalidSelectionArgsError";
  }
}
