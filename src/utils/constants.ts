/**
 * Shared constants for allocation, crash detection and rebalancing.
 */

/** Smallest tradable increment (¥). Every derived amount is a multiple of this. */
export const ROUNDING_UNIT = 1000;

/** Market-level drift (¥) below this, for both markets, is classified as balanced. */
export const BALANCE_TOLERANCE = 10000;

/** Funds short by at least this much (¥) appear in the one-shot purchase suggestions. */
export const MIN_SUGGESTED_PURCHASE = 1000;

/** Volatility index level strictly above this is "high". */
export const VOLATILITY_HIGH_THRESHOLD = 30;

/** Valuation ratio (%) strictly below this is "low". */
export const VALUATION_LOW_THRESHOLD_PCT = 80;

/** Index change (%) at or below this over the lookback window is a severe drawdown. */
export const DRAWDOWN_SEVERE_THRESHOLD_PCT = -20;

/** Number of daily closes in the drawdown window (roughly three months of trading days). */
export const DRAWDOWN_LOOKBACK_PERIODS = 60;

/** Index keys used by the market data provider. */
export const INDEX_KEYS = {
  volatility: "^VIX",
  HOME: "^N225",
  FOREIGN: "^GSPC",
} as const;

/** Monthly budget bounds accepted by the request schemas (¥). */
export const BUDGET_MIN = 10000;
export const BUDGET_MAX = 10000000;
export const BUDGET_STEP = 10000;

/** Upper bound on a single fund's holding accepted by the request schemas (¥). */
export const HOLDING_MAX = 100000000;
