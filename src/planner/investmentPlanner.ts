import { AllocationTable, DEFAULT_ALLOCATION_TABLE } from "../config/allocationTable";
import { BaseAllocator } from "../engine/allocator";
import { CrashAllocator } from "../engine/crashAllocator";
import { evaluateCrash } from "../engine/crashEvaluator";
import { RebalanceEngine } from "../engine/rebalancer";
import {
  DEFAULT_SIGNAL_THRESHOLDS,
  SignalThresholds,
  deriveMarketSignals,
} from "../engine/signals";
import { CrashAllocation, RegularAllocation } from "../models/Allocation";
import { MarketAmounts } from "../models/Fund";
import { EvaluationInput, EvaluationResult } from "../models/EvaluationResult";
import { RebalanceOutcome, RebalanceRequest } from "../models/Rebalance";
import { CrashVerdict } from "../models/Signal";

/**
 * Planner configuration. Both values are immutable and shared by every run.
 */
export interface PlannerContext {
  table: AllocationTable;
  thresholds: SignalThresholds;
}

/**
 * Runs one evaluation: readings → signals → crash verdict → regular and
 * crash allocations → optional rebalance plan.
 *
 * Every method is a pure function of its arguments and the context, so one
 * planner can serve any number of independent evaluations.
 */
export class InvestmentPlanner {
  private context: PlannerContext;
  private baseAllocator: BaseAllocator;
  private crashAllocator: CrashAllocator;
  private rebalanceEngine: RebalanceEngine;

  constructor(context: Partial<PlannerContext> = {}) {
    this.context = {
      table: context.table ?? DEFAULT_ALLOCATION_TABLE,
      thresholds: context.thresholds ?? DEFAULT_SIGNAL_THRESHOLDS,
    };
    this.baseAllocator = new BaseAllocator(this.context.table);
    this.crashAllocator = new CrashAllocator(this.context.table);
    this.rebalanceEngine = new RebalanceEngine(this.context.table);
  }

  get table(): AllocationTable {
    return this.context.table;
  }

  planRegular(baseBudget: number): RegularAllocation {
    return this.baseAllocator.allocate(baseBudget);
  }

  getCrashFunds(baseBudget: number): MarketAmounts {
    return this.crashAllocator.getCrashFunds(baseBudget);
  }

  planCrash(verdict: CrashVerdict, regular: RegularAllocation): CrashAllocation {
    return this.crashAllocator.allocate(verdict, regular);
  }

  planRebalance(request: RebalanceRequest, regular: RegularAllocation): RebalanceOutcome {
    return this.rebalanceEngine.plan(request, regular);
  }

  /**
   * @throws InvalidInputError before anything is computed when the budget or
   * rebalance input is invalid
   */
  evaluate(input: EvaluationInput): EvaluationResult {
    const { baseBudget, readings, rebalance } = input;

    const regularAllocation = this.planRegular(baseBudget);
    // Rebalance input is checked before any crash computation
    const rebalanceOutcome = rebalance ? this.planRebalance(rebalance, regularAllocation) : undefined;

    const { signals, degraded } = deriveMarketSignals(readings, this.context.thresholds);
    const verdict = evaluateCrash(signals);
    const crashAllocation = this.planCrash(verdict, regularAllocation);

    const result: EvaluationResult = {
      baseBudget,
      readings,
      signals,
      degraded,
      verdict,
      pattern: crashAllocation.pattern,
      regularAllocation,
      crashAllocation,
      totalInvestment: crashAllocation.totalInvestment,
    };
    if (rebalanceOutcome) {
      result.rebalance = rebalanceOutcome;
    }
    return result;
  }
}
