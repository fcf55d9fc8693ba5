import { FundAmounts, FundId, MarketAmounts, MarketGroup } from "./Fund";

/**
 * Rebalancing data structures
 */

export type Holdings = FundAmounts;

export type RebalanceStrategy =
  | { kind: "BUDGET_BOUNDED"; minPurchaseFloor: number }
  | { kind: "EXTRA_CAPITAL"; extraCapital: number };

export type RebalanceStrategyKind = RebalanceStrategy["kind"];

export interface RebalanceRequest {
  holdings: Holdings;
  strategy: RebalanceStrategy;
}

export interface RebalanceRow {
  fundId: FundId;
  market: MarketGroup;
  current: number;
  target: number;
  delta: number; // target - current; negative means overweight
  currentSharePct: number;
  targetSharePct: number;
}

export interface MarketRebalanceSummary {
  current: number;
  target: number;
  delta: number;
  currentSharePct: number;
  targetSharePct: number;
}

export interface MarketDrift {
  status: "short" | "excess" | "even";
  amount: number; // absolute size of the drift
}

export type BalanceClassification =
  | { kind: "balanced" }
  | { kind: "imbalanced"; markets: Record<MarketGroup, MarketDrift> };

export interface FundShortfall {
  fundId: FundId;
  shortfall: number;
}

export interface PurchaseSuggestion {
  fundId: FundId;
  amount: number;
}

export interface NextPeriodPlan {
  strategy: RebalanceStrategy;
  perFund: FundAmounts;
  differenceFromRegular: FundAmounts;
  marketTotals: MarketAmounts;
  total: number;
  remainderFund: FundId; // fund that absorbed the rounding remainder
}

export interface PeriodEstimate {
  fundId: FundId;
  shortfall: number;
  additionalPerPeriod: number;
  periodsNeeded: number | null; // null when the plan never closes this shortfall
}

export interface RebalancePlan {
  totalCurrent: number;
  rows: RebalanceRow[];
  markets: Record<MarketGroup, MarketRebalanceSummary>;
  classification: BalanceClassification;
  purchaseSuggestions: PurchaseSuggestion[];
  purchaseSuggestionTotal: number;
  shortfallList: FundShortfall[];
  nextPeriodPlan: NextPeriodPlan | null;
  periodEstimates: PeriodEstimate[];
  unreachableFunds: FundId[];
  recommendedDurationPeriods: number;
}

export type RebalanceOutcome =
  | { status: "no_holdings"; message: string }
  | { status: "planned"; plan: RebalancePlan };
