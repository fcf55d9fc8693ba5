import { AllocationTable, getLeadFund, getMarketFunds } from "../config/allocationTable";
import { CrashAllocation, RegularAllocation, TaxBucketSplit } from "../models/Allocation";
import {
  FUND_IDS,
  FundAmounts,
  MarketAmounts,
  MarketGroup,
  mapFunds,
  mapMarkets,
  sumFundAmounts,
} from "../models/Fund";
import { CrashVerdict } from "../models/Signal";
import { InvalidInputError } from "../utils/errors";
import { roundToNearest1000 } from "../utils/math";
import { totalsByMarket } from "./allocator";
import { toCrashPattern } from "./crashEvaluator";

/**
 * Splits an additional contribution to the tax-advantaged fund.
 *
 * - If the regular contribution already overflowed into the standard bucket,
 *   the additional amount keeps the regular tax-advantaged ratio.
 * - Otherwise the remaining headroom under the cap is filled first and any
 *   excess goes to standard.
 *
 * @example
 * ```ts
 * // regular 120000 already split 100000 / 20000
 * splitAdditionalTaxBucket({ taxAdvantaged: 100000, standard: 20000 }, 120000, 100000)
 * // => { taxAdvantaged: 100000, standard: 20000 }
 * ```
 */
export function splitAdditionalTaxBucket(
  regularSplit: TaxBucketSplit,
  additionalAmount: number,
  cap: number
): TaxBucketSplit {
  if (additionalAmount <= 0) {
    return { taxAdvantaged: 0, standard: 0 };
  }

  const regularTotal = regularSplit.taxAdvantaged + regularSplit.standard;

  if (regularSplit.standard > 0) {
    const taxAdvantaged = roundToNearest1000(
      (additionalAmount * regularSplit.taxAdvantaged) / regularTotal
    );
    return { taxAdvantaged, standard: additionalAmount - taxAdvantaged };
  }

  if (regularTotal + additionalAmount <= cap) {
    return { taxAdvantaged: additionalAmount, standard: 0 };
  }

  const headroom = Math.max(cap - regularSplit.taxAdvantaged, 0);
  const taxAdvantaged = Math.min(additionalAmount, headroom);
  return { taxAdvantaged, standard: additionalAmount - taxAdvantaged };
}

/**
 * Computes the additional lump-sum allocation for markets in crash.
 *
 * Each market reserves a crash fund equal to its ratio share of one base
 * budget. A crashed market's fund is spread over that market's funds with
 * the same relative weights as the regular allocation.
 */
export class CrashAllocator {
  private table: AllocationTable;

  constructor(table: AllocationTable) {
    this.table = table;
  }

  /**
   * Crash fund reserved for each market: round(baseBudget × market ratio).
   */
  getCrashFunds(baseBudget: number): MarketAmounts {
    return mapMarkets((market) => roundToNearest1000(baseBudget * this.table.marketRatios[market]));
  }

  /**
   * @throws InvalidInputError when the regular allocation carries a non-positive
   * budget or negative amounts
   */
  allocate(verdict: CrashVerdict, regular: RegularAllocation): CrashAllocation {
    this.validateRegular(regular);

    const pattern = toCrashPattern(verdict);
    const crashedMarkets: readonly MarketGroup[] = pattern.crashedMarkets;
    const crashFunds = this.getCrashFunds(regular.baseBudget);

    const additional = mapFunds(() => 0);
    for (const market of crashedMarkets) {
      const marketAdditional = this.distributeCrashFund(market, crashFunds[market]);
      for (const fundId of getMarketFunds(this.table, market)) {
        additional[fundId] = marketAdditional[fundId];
      }
    }

    const { taxSplitFund, taxAdvantagedCap } = this.table;
    const additionalTaxSplit = splitAdditionalTaxBucket(
      regular.taxSplit,
      additional[taxSplitFund],
      taxAdvantagedCap
    );

    // Both markets in crash: the whole budget is invested twice over
    const totalInvestment =
      pattern.kind === "Both"
        ? 2 * regular.baseBudget
        : crashedMarkets.reduce((total, market) => total + crashFunds[market], regular.baseBudget);

    return {
      verdict,
      pattern,
      crashFunds,
      additional,
      additionalByMarket: totalsByMarket(this.table, additional),
      additionalTaxSplit,
      combined: mapFunds((fundId) => regular.perFund[fundId] + additional[fundId]),
      combinedTaxSplit: {
        taxAdvantaged: regular.taxSplit.taxAdvantaged + additionalTaxSplit.taxAdvantaged,
        standard: regular.taxSplit.standard + additionalTaxSplit.standard,
      },
      totalInvestment,
    };
  }

  /**
   * Spreads one market's crash fund over its funds. The rounded amounts are
   * reconciled to the crash fund through the market's largest-fraction fund.
   */
  private distributeCrashFund(market: MarketGroup, crashFund: number): FundAmounts {
    const { funds, marketRatios } = this.table;
    const ratio = marketRatios[market];
    const marketFunds = getMarketFunds(this.table, market);

    const amounts = mapFunds((fundId) =>
      funds[fundId].market === market
        ? roundToNearest1000((crashFund * funds[fundId].fraction) / ratio)
        : 0
    );

    const remainder = crashFund - sumFundAmounts(amounts, marketFunds);
    if (remainder !== 0) {
      amounts[getLeadFund(this.table, market)] += remainder;
    }
    return amounts;
  }

  private validateRegular(regular: RegularAllocation): void {
    const issues: string[] = [];
    if (!Number.isFinite(regular.baseBudget) || regular.baseBudget <= 0) {
      issues.push(`baseBudget must be positive (got ${regular.baseBudget})`);
    }
    for (const fundId of FUND_IDS) {
      if (!(regular.perFund[fundId] >= 0)) {
        issues.push(`${fundId}: regular amount must be non-negative (got ${regular.perFund[fundId]})`);
      }
    }
    if (regular.taxSplit.taxAdvantaged < 0 || regular.taxSplit.standard < 0) {
      issues.push("taxSplit amounts must be non-negative");
    }
    if (issues.length > 0) {
      throw new InvalidInputError("Invalid regular allocation", issues);
    }
  }
}
