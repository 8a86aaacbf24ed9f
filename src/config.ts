/**
 * Coinset: Config Loading + Validation
 *
 * Applies defaults to caller-supplied config, validates it against a TypeBox
 * schema and builds the configured selector.
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { InvalidSelectionArgsError } from "./errors.js";
import {
  MaxValueAgeCoinSelector,
  MinIndexCoinSelector,
  MinNumberCoinSelector,
  MinPriorityCoinSelector,
  type CoinSelector,
} from "./selection/selectors.js";
import type { CoinsetConfig, LogFn } from "./types.js";

const CoinsetConfigSchema = Type.Object({
  strategy: Type.Union([
    Type.Literal("min-index"),
    Type.Literal("min-number"),
    Type.Literal("max-value-age"),
    Type.Literal("min-priority"),
  ]),
  args: Type.Object({
    maxInputs: Type.Integer({ minimum: 0 }),
    minChangeAmount: Type.Integer({ minimum: 0 }),
  }),
  minPriority: Type.Object({
    minAvgValueAgePerInput: Type.Integer({ minimum: 0 }),
  }),
});

/** Default configuration */
const DEFAULTS = {
  strategy: "min-number",
  args: {
    maxInputs: 20,
    minChangeAmount: 0,
  },
  minPriority: {
    minAvgValueAgePerInput: 0,
  },
} satisfies CoinsetConfig;

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

/**
 * Deep merge helper: merges source into target, preferring source values.
 * Only merges plain objects; arrays and primitives are replaced.
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    const tgtVal = result[key];
    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else if (srcVal !== undefined) {
      result[key] = srcVal;
    }
  }
  return result;
}

/**
 * Parse and validate coinset config.
 * Returns a fully-populated CoinsetConfig with defaults applied.
 */
export function parseCoinsetConfig(raw: unknown): CoinsetConfig {
  const cfg = deepMerge(Value.Clone(DEFAULTS), isPlainObject(raw) ? raw : {});

  if (!Value.Check(CoinsetConfigSchema, cfg)) {
    const first = [...Value.Errors(CoinsetConfigSchema, cfg)][0];
    const where = first?.path ? first.path : "/";
    throw new InvalidSelectionArgsError(
      `coinset: invalid config at ${where}: ${first?.message ?? "unknown error"}`,
    );
  }
  return cfg;
}

/** Build the selector named by config.strategy. */
export function createSelector(config: CoinsetConfig, log?: LogFn): CoinSelector {
  switch (config.strategy) {
    case "min-index":
      return new MinIndexCoinSelector(config.args, log);
    case "min-number":
      return new MinNumberCoinSelector(config.args, log);
    case "max-value-age":
      return new MaxValueAgeCoinSelector(config.args, log);
    case "min-priority":
      return new MinPriorityCoinSelector(
        config.args,
        BigInt(config.minPriority.minAvgValueAgePerInput),
        log,
      );
  }
}
