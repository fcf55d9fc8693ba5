import { AllocationTable, getMarketFunds } from "../config/allocationTable";
import { RegularAllocation, TaxBucketSplit } from "../models/Allocation";
import { FundAmounts, MarketAmounts, mapFunds, mapMarkets, sumFundAmounts } from "../models/Fund";
import { InvalidInputError } from "../utils/errors";
import { roundToNearest1000 } from "../utils/math";

/**
 * Splits an amount between the capped tax-advantaged bucket and the
 * standard bucket. Anything above the cap goes to standard.
 *
 * @example
 * ```ts
 * splitTaxBucket(120000, 100000) // { taxAdvantaged: 100000, standard: 20000 }
 * splitTaxBucket(80000, 100000)  // { taxAdvantaged: 80000, standard: 0 }
 * ```
 */
export function splitTaxBucket(amount: number, cap: number): TaxBucketSplit {
  if (amount <= cap) {
    return { taxAdvantaged: amount, standard: 0 };
  }
  return { taxAdvantaged: cap, standard: amount - cap };
}

/**
 * Totals of a per-fund map by market group.
 */
export function totalsByMarket(table: AllocationTable, amounts: FundAmounts): MarketAmounts {
  return mapMarkets((market) => sumFundAmounts(amounts, getMarketFunds(table, market)));
}

/**
 * Produces the regular monthly allocation from a base budget.
 */
export class BaseAllocator {
  private table: AllocationTable;

  constructor(table: AllocationTable) {
    this.table = table;
  }

  /**
   * Allocates the base budget across every fund by its fraction, rounding each
   * amount to ¥1000, and splits the tax-advantaged fund's amount at the cap.
   *
   * @throws InvalidInputError for a non-positive or non-finite budget
   */
  allocate(baseBudget: number): RegularAllocation {
    if (!Number.isFinite(baseBudget) || baseBudget <= 0) {
      throw new InvalidInputError(`Base budget must be a positive amount (got ${baseBudget})`);
    }

    const { funds, taxAdvantagedCap, taxSplitFund } = this.table;
    const perFund = mapFunds((fundId) => roundToNearest1000(baseBudget * funds[fundId].fraction));

    return {
      baseBudget,
      perFund,
      taxSplit: splitTaxBucket(perFund[taxSplitFund], taxAdvantagedCap),
      marketTotals: totalsByMarket(this.table, perFund),
      total: sumFundAmounts(perFund),
    };
  }
}
