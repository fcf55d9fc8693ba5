import { CrashAllocation, RegularAllocation } from "./Allocation";
import { RebalanceOutcome, RebalanceRequest } from "./Rebalance";
import {
  CrashPattern,
  CrashVerdict,
  DegradedSignal,
  MarketReadings,
  SignalAssessment,
} from "./Signal";

/**
 * Evaluation run data structures
 */

export interface EvaluationInput {
  baseBudget: number;
  readings: MarketReadings;
  rebalance?: RebalanceRequest;
}

export interface EvaluationResult {
  baseBudget: number;
  readings: MarketReadings;
  signals: SignalAssessment["signals"];
  degraded: DegradedSignal[];
  verdict: CrashVerdict;
  pattern: CrashPattern;
  regularAllocation: RegularAllocation;
  crashAllocation: CrashAllocation;
  totalInvestment: number;
  rebalance?: RebalanceOutcome;
}
