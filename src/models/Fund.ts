/**
 * Fund and market group identifiers
 */

export const FUND_IDS = [
  "jp_stock",
  "jp_reit",
  "jp_bond",
  "global_stock",
  "us_stock",
  "os_reit",
  "os_bond",
] as const;

export type FundId = (typeof FUND_IDS)[number];

export const MARKET_GROUPS = ["HOME", "FOREIGN"] as const;

export type MarketGroup = (typeof MARKET_GROUPS)[number];

/**
 * An amount for every fund. Allocation operations never produce a partial map.
 */
export type FundAmounts = Record<FundId, number>;

export type MarketAmounts = Record<MarketGroup, number>;

/**
 * Build a FundAmounts map by evaluating `fn` once per fund, in enumeration order.
 */
export function mapFunds(fn: (fundId: FundId) => number): FundAmounts {
  return {
    jp_stock: fn("jp_stock"),
    jp_reit: fn("jp_reit"),
    jp_bond: fn("jp_bond"),
    global_stock: fn("global_stock"),
    us_stock: fn("us_stock"),
    os_reit: fn("os_reit"),
    os_bond: fn("os_bond"),
  };
}

export function mapMarkets(fn: (market: MarketGroup) => number): MarketAmounts {
  return {
    HOME: fn("HOME"),
    FOREIGN: fn("FOREIGN"),
  };
}

export function zeroFundAmounts(): FundAmounts {
  return mapFunds(() => 0);
}

/**
 * Sum amounts over the given funds (all funds by default)
 */
export function sumFundAmounts(
  amounts: FundAmounts,
  fundIds: readonly FundId[] = FUND_IDS
): number {
  return fundIds.reduce((sum, fundId) => sum + amounts[fundId], 0);
}
