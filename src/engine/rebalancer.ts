import { AllocationTable, getMarketFunds } from "../config/allocationTable";
import { RegularAllocation } from "../models/Allocation";
import {
  FUND_IDS,
  FundAmounts,
  FundId,
  MarketGroup,
  mapFunds,
  sumFundAmounts,
} from "../models/Fund";
import {
  BalanceClassification,
  FundShortfall,
  MarketDrift,
  MarketRebalanceSummary,
  NextPeriodPlan,
  PeriodEstimate,
  RebalanceOutcome,
  RebalanceRequest,
  RebalanceRow,
  RebalanceStrategy,
} from "../models/Rebalance";
import { BALANCE_TOLERANCE, MIN_SUGGESTED_PURCHASE } from "../utils/constants";
import { InvalidInputError } from "../utils/errors";
import { ceilDiv, floorToNearest1000, roundToNearest1000, sharePct } from "../utils/math";
import { totalsByMarket } from "./allocator";

export const NO_HOLDINGS_MESSAGE = "No holdings to rebalance";

/**
 * Fund with the largest shortfall; the first in enumeration order wins a tie.
 * Expects a non-empty list.
 */
export function largestShortfall(shortfalls: FundShortfall[]): FundId {
  return shortfalls.reduce((lead, entry) => (entry.shortfall > lead.shortfall ? entry : lead))
    .fundId;
}

/**
 * Adds `pool` to the shortfall funds in proportion to each fund's share of the
 * total shortfall. Shares are rounded down to ¥1000, so the leftover is never
 * negative; it goes to the largest-shortfall fund so the plan adds up to
 * `intendedTotal` exactly. No fund ends below its `base` amount.
 */
export function distributeByShortfall(
  base: FundAmounts,
  pool: number,
  shortfalls: FundShortfall[],
  intendedTotal: number
): { perFund: FundAmounts; remainderFund: FundId } {
  const totalShortfall = shortfalls.reduce((sum, entry) => sum + entry.shortfall, 0);
  const perFund = { ...base };

  for (const { fundId, shortfall } of shortfalls) {
    perFund[fundId] += floorToNearest1000((pool * shortfall) / totalShortfall);
  }

  const remainderFund = largestShortfall(shortfalls);
  const difference = intendedTotal - sumFundAmounts(perFund);
  if (difference !== 0) {
    perFund[remainderFund] += difference;
  }

  return { perFund, remainderFund };
}

/**
 * Computes corrective purchases that move arbitrary holdings back toward the
 * target fund fractions. Overweight funds are corrected only by not buying
 * more; nothing is ever sold.
 */
export class RebalanceEngine {
  private table: AllocationTable;

  constructor(table: AllocationTable) {
    this.table = table;
  }

  /**
   * @param request - Current holdings and the chosen strategy
   * @param regular - Regular allocation for the same base budget
   * @throws InvalidInputError for negative holdings or amounts, and for a
   * BUDGET_BOUNDED floor that leaves nothing to distribute
   */
  plan(request: RebalanceRequest, regular: RegularAllocation): RebalanceOutcome {
    const { holdings, strategy } = request;
    this.validate(request, regular.baseBudget);

    const totalCurrent = sumFundAmounts(holdings);
    if (totalCurrent === 0) {
      return { status: "no_holdings", message: NO_HOLDINGS_MESSAGE };
    }

    const { funds, marketRatios } = this.table;
    const target = mapFunds((fundId) => roundToNearest1000(totalCurrent * funds[fundId].fraction));

    const rows: RebalanceRow[] = FUND_IDS.map((fundId) => ({
      fundId,
      market: funds[fundId].market,
      current: holdings[fundId],
      target: target[fundId],
      delta: target[fundId] - holdings[fundId],
      currentSharePct: sharePct(holdings[fundId], totalCurrent),
      targetSharePct: sharePct(funds[fundId].fraction, 1),
    }));

    const summarize = (market: MarketGroup): MarketRebalanceSummary => {
      const marketFunds = getMarketFunds(this.table, market);
      const current = sumFundAmounts(holdings, marketFunds);
      const marketTarget = sumFundAmounts(target, marketFunds);
      return {
        current,
        target: marketTarget,
        delta: marketTarget - current,
        currentSharePct: sharePct(current, totalCurrent),
        targetSharePct: sharePct(marketRatios[market], 1),
      };
    };
    const markets = { HOME: summarize("HOME"), FOREIGN: summarize("FOREIGN") };

    const purchaseSuggestions = rows
      .filter((row) => row.delta >= MIN_SUGGESTED_PURCHASE)
      .map((row) => ({ fundId: row.fundId, amount: row.delta }));

    const shortfallList: FundShortfall[] = rows
      .filter((row) => row.delta > 0)
      .map((row) => ({ fundId: row.fundId, shortfall: row.delta }));

    const nextPeriodPlan =
      shortfallList.length > 0 ? this.buildNextPeriodPlan(strategy, shortfallList, regular) : null;

    const periodEstimates: PeriodEstimate[] = nextPeriodPlan
      ? shortfallList.map(({ fundId, shortfall }) => {
          const additionalPerPeriod = nextPeriodPlan.perFund[fundId] - regular.perFund[fundId];
          return {
            fundId,
            shortfall,
            additionalPerPeriod,
            periodsNeeded: additionalPerPeriod > 0 ? ceilDiv(shortfall, additionalPerPeriod) : null,
          };
        })
      : [];

    const reachable = periodEstimates.flatMap((estimate) =>
      estimate.periodsNeeded === null ? [] : [estimate.periodsNeeded]
    );

    return {
      status: "planned",
      plan: {
        totalCurrent,
        rows,
        markets,
        classification: this.classify(markets),
        purchaseSuggestions,
        purchaseSuggestionTotal: purchaseSuggestions.reduce((sum, s) => sum + s.amount, 0),
        shortfallList,
        nextPeriodPlan,
        periodEstimates,
        unreachableFunds: periodEstimates
          .filter((estimate) => estimate.periodsNeeded === null)
          .map((estimate) => estimate.fundId),
        recommendedDurationPeriods: reachable.length > 0 ? Math.max(...reachable) : 0,
      },
    };
  }

  /**
   * Balanced when both markets are within tolerance of their target totals.
   */
  private classify(markets: Record<MarketGroup, MarketRebalanceSummary>): BalanceClassification {
    if (
      Math.abs(markets.HOME.delta) < BALANCE_TOLERANCE &&
      Math.abs(markets.FOREIGN.delta) < BALANCE_TOLERANCE
    ) {
      return { kind: "balanced" };
    }

    const drift = (delta: number): MarketDrift => ({
      status: delta > 0 ? "short" : delta < 0 ? "excess" : "even",
      amount: Math.abs(delta),
    });

    return {
      kind: "imbalanced",
      markets: {
        HOME: drift(markets.HOME.delta),
        FOREIGN: drift(markets.FOREIGN.delta),
      },
    };
  }

  private buildNextPeriodPlan(
    strategy: RebalanceStrategy,
    shortfalls: FundShortfall[],
    regular: RegularAllocation
  ): NextPeriodPlan {
    const { baseBudget } = regular;

    let distribution: { perFund: FundAmounts; remainderFund: FundId };
    if (strategy.kind === "BUDGET_BOUNDED") {
      const floor = strategy.minPurchaseFloor;
      distribution = distributeByShortfall(
        mapFunds(() => floor),
        baseBudget - FUND_IDS.length * floor,
        shortfalls,
        baseBudget
      );
    } else {
      distribution = distributeByShortfall(
        regular.perFund,
        strategy.extraCapital,
        shortfalls,
        regular.total + strategy.extraCapital
      );
    }
    const { perFund, remainderFund } = distribution;

    return {
      strategy,
      perFund,
      differenceFromRegular: mapFunds((fundId) => perFund[fundId] - regular.perFund[fundId]),
      marketTotals: totalsByMarket(this.table, perFund),
      total: sumFundAmounts(perFund),
      remainderFund,
    };
  }

  private validate(request: RebalanceRequest, baseBudget: number): void {
    const { holdings, strategy } = request;
    const issues: string[] = [];

    if (!Number.isFinite(baseBudget) || baseBudget <= 0) {
      issues.push(`baseBudget must be positive (got ${baseBudget})`);
    }

    for (const fundId of FUND_IDS) {
      const amount = holdings[fundId];
      if (!Number.isFinite(amount) || amount < 0) {
        issues.push(`holdings.${fundId} must be a non-negative amount (got ${amount})`);
      }
    }

    if (strategy.kind === "BUDGET_BOUNDED") {
      const floor = strategy.minPurchaseFloor;
      if (!Number.isFinite(floor) || floor < 0) {
        issues.push(`minPurchaseFloor must be non-negative (got ${floor})`);
      } else if (floor * FUND_IDS.length >= baseBudget) {
        issues.push(
          `minPurchaseFloor × ${FUND_IDS.length} (${floor * FUND_IDS.length}) must be below the base budget (${baseBudget})`
        );
      }
    } else if (!Number.isFinite(strategy.extraCapital) || strategy.extraCapital < 0) {
      issues.push(`extraCapital must be non-negative (got ${strategy.extraCapital})`);
    }

    if (issues.length > 0) {
      throw new InvalidInputError("Invalid rebalance input", issues);
    }
  }
}
