import { InvestmentPlanner } from '../../planner/investmentPlanner';
import { createAllocationTable, DEFAULT_ALLOCATION_TABLE_INPUT } from '../../config/allocationTable';
import { InvalidInputError } from '../../utils/errors';
import { homeShortHoldings } from '../fixtures/holdings';
import {
  bothCrashReadings,
  calmReadings,
  foreignCrashReadings,
  homeCrashReadings,
  missingVolatilityReadings,
} from '../fixtures/readings';

describe('InvestmentPlanner', () => {
  const planner = new InvestmentPlanner();

  describe('evaluate', () => {
    it('should invest only the base budget in calm markets', () => {
      const result = planner.evaluate({ baseBudget: 300000, readings: calmReadings });

      expect(result.verdict).toEqual({ HOME: false, FOREIGN: false });
      expect(result.pattern.kind).toBe('NoCrash');
      expect(result.totalInvestment).toBe(300000);
      expect(result.regularAllocation.total).toBe(300000);
      expect(result.rebalance).toBeUndefined();
    });

    it('should add the home crash fund for a home crash', () => {
      const result = planner.evaluate({ baseBudget: 300000, readings: homeCrashReadings });

      expect(result.pattern.kind).toBe('HomeOnly');
      expect(result.crashAllocation.additionalByMarket).toEqual({ HOME: 90000, FOREIGN: 0 });
      expect(result.totalInvestment).toBe(390000);
    });

    it('should add the foreign crash fund for a foreign crash', () => {
      const result = planner.evaluate({ baseBudget: 300000, readings: foreignCrashReadings });

      expect(result.pattern.kind).toBe('ForeignOnly');
      expect(result.totalInvestment).toBe(510000);
    });

    it('should double the budget when both markets crash', () => {
      const result = planner.evaluate({ baseBudget: 300000, readings: bothCrashReadings });

      expect(result.pattern.kind).toBe('Both');
      expect(result.totalInvestment).toBe(600000);
    });

    it('should not invest extra when a reading is unavailable', () => {
      const result = planner.evaluate({ baseBudget: 300000, readings: missingVolatilityReadings });

      expect(result.pattern.kind).toBe('NoCrash');
      expect(result.degraded).toHaveLength(2);
      expect(result.totalInvestment).toBe(300000);
    });

    it('should attach a rebalance plan when holdings are given', () => {
      const result = planner.evaluate({
        baseBudget: 300000,
        readings: calmReadings,
        rebalance: {
          holdings: homeShortHoldings,
          strategy: { kind: 'EXTRA_CAPITAL', extraCapital: 10000 },
        },
      });

      expect(result.rebalance?.status).toBe('planned');
      if (result.rebalance?.status === 'planned') {
        expect(result.rebalance.plan.recommendedDurationPeriods).toBe(4);
      }
    });

    it('should reject invalid rebalance input', () => {
      expect(() =>
        planner.evaluate({
          baseBudget: 300000,
          readings: homeCrashReadings,
          rebalance: {
            holdings: homeShortHoldings,
            strategy: { kind: 'BUDGET_BOUNDED', minPurchaseFloor: 50000 },
          },
        })
      ).toThrow(InvalidInputError);
    });

    it('should reject a non-positive budget', () => {
      expect(() => planner.evaluate({ baseBudget: 0, readings: calmReadings })).toThrow(InvalidInputError);
    });

    it('should return identical results for identical inputs', () => {
      expect(planner.evaluate({ baseBudget: 300000, readings: bothCrashReadings })).toEqual(
        planner.evaluate({ baseBudget: 300000, readings: bothCrashReadings })
      );
    });
  });

  describe('context', () => {
    it('should use the thresholds it was built with', () => {
      const cautious = new InvestmentPlanner({
        thresholds: { volatilityHigh: 15, valuationLowPct: 130, drawdownSeverePct: 5 },
      });

      expect(cautious.evaluate({ baseBudget: 300000, readings: calmReadings }).pattern.kind).toBe('HomeOnly');
    });

    it('should use the allocation table it was built with', () => {
      const table = createAllocationTable({ ...DEFAULT_ALLOCATION_TABLE_INPUT, taxAdvantagedCap: 200000 });
      const custom = new InvestmentPlanner({ table });

      expect(custom.table.taxAdvantagedCap).toBe(200000);
      expect(custom.planRegular(300000).taxSplit).toEqual({ taxAdvantaged: 120000, standard: 0 });
    });

    it('should expose the crash funds per market', () => {
      expect(planner.getCrashFunds(300000)).toEqual({ HOME: 90000, FOREIGN: 210000 });
    });
  });
});
