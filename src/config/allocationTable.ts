import { z } from "zod";
import { FUND_IDS, FundId, MarketAmounts, MarketGroup } from "../models/Fund";
import { InvalidInputError } from "../utils/errors";
import { AllocationTableSchema, FundSpecSchema, formatIssues } from "../utils/validation";

export type FundSpec = z.infer<typeof FundSpecSchema>;

/**
 * Fixed allocation configuration: per-fund fractions of the base budget,
 * the home/foreign ratio and the tax-advantaged cap.
 * Instances are frozen; engines receive one through their constructor.
 */
export interface AllocationTable {
  readonly funds: Readonly<Record<FundId, Readonly<FundSpec>>>;
  readonly marketRatios: Readonly<MarketAmounts>;
  readonly taxAdvantagedCap: number;
  readonly taxSplitFund: FundId;
}

export type AllocationTableInput = z.input<typeof AllocationTableSchema>;

export const DEFAULT_ALLOCATION_TABLE_INPUT: AllocationTableInput = {
  funds: {
    jp_stock: { market: "HOME", fraction: 0.15, label: "Japan equity (TOPIX)" },
    jp_reit: { market: "HOME", fraction: 0.1, label: "Japan REIT" },
    jp_bond: { market: "HOME", fraction: 0.05, label: "Japan bond" },
    global_stock: { market: "FOREIGN", fraction: 0.4, label: "Global equity ex-Japan" },
    us_stock: { market: "FOREIGN", fraction: 0.15, label: "US equity (S&P 500)" },
    os_reit: { market: "FOREIGN", fraction: 0.1, label: "Developed-market REIT" },
    os_bond: { market: "FOREIGN", fraction: 0.05, label: "Developed-market bond" },
  },
  marketRatios: { HOME: 0.3, FOREIGN: 0.7 },
  taxAdvantagedCap: 100000,
  taxSplitFund: "global_stock",
};

/**
 * Validates and freezes an allocation table.
 * 
 * @throws InvalidInputError when the fractions do not add up
 */
export function createAllocationTable(
  input: AllocationTableInput = DEFAULT_ALLOCATION_TABLE_INPUT
): AllocationTable {
  const parsed = AllocationTableSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidInputError("Invalid allocation table", formatIssues(parsed.error));
  }
  const { funds, marketRatios, taxAdvantagedCap, taxSplitFund } = parsed.data;

  for (const fundId of FUND_IDS) {
    Object.freeze(funds[fundId]);
  }

  return Object.freeze({
    funds: Object.freeze(funds),
    marketRatios: Object.freeze(marketRatios),
    taxAdvantagedCap,
    taxSplitFund,
  });
}

export const DEFAULT_ALLOCATION_TABLE: AllocationTable = createAllocationTable();

/**
 * Funds belonging to a market, in enumeration order.
 */
export function getMarketFunds(table: AllocationTable, market: MarketGroup): FundId[] {
  return FUND_IDS.filter((fundId) => table.funds[fundId].market === market);
}

/**
 * Fund of the market with the largest fraction (first in enumeration order on ties).
 */
export function getLeadFund(table: AllocationTable, market: MarketGroup): FundId {
  const [first, ...rest] = getMarketFunds(table, market);
  if (first === undefined) {
    throw new InvalidInputError(`No funds configured for market ${market}`);
  }
  return rest.reduce(
    (lead, fundId) => (table.funds[fundId].fraction > table.funds[lead].fraction ? fundId : lead),
    first
  );
}
