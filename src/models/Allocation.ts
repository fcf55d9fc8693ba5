import { FundAmounts, MarketAmounts } from "./Fund";
import { CrashPattern, CrashVerdict } from "./Signal";

/**
 * Allocation data structures
 */

/**
 * Split of the tax-advantaged fund's contribution between the capped
 * bucket and the uncapped standard bucket.
 */
export interface TaxBucketSplit {
  taxAdvantaged: number;
  standard: number;
}

export interface RegularAllocation {
  baseBudget: number;
  perFund: FundAmounts;
  taxSplit: TaxBucketSplit;
  marketTotals: MarketAmounts;
  total: number; // sum of rounded per-fund amounts
}

export interface CrashAllocation {
  verdict: CrashVerdict;
  pattern: CrashPattern;
  crashFunds: MarketAmounts; // reserved lump sum per market, reported even when not deployed
  additional: FundAmounts; // 0 for funds outside crashed markets
  additionalByMarket: MarketAmounts;
  additionalTaxSplit: TaxBucketSplit;
  combined: FundAmounts; // regular + additional
  combinedTaxSplit: TaxBucketSplit;
  totalInvestment: number;
}
