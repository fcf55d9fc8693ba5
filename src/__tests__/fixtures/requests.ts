import { homeShortHoldings } from './holdings';
import { homeCrashReadings } from './readings';

export const allocationRequest = {
  baseBudget: 300000,
};

export const evaluateRequest = {
  baseBudget: 300000,
  readings: homeCrashReadings,
};

export const evaluateWithRebalanceRequest = {
  ...evaluateRequest,
  rebalance: {
    holdings: homeShortHoldings,
    strategy: { kind: 'EXTRA_CAPITAL', extraCapital: 10000 },
  },
};

export const liveEvaluateRequest = {
  baseBudget: 300000,
  valuation: { HOME: 75, FOREIGN: 110 },
};

export const rebalanceRequest = {
  baseBudget: 300000,
  holdings: homeShortHoldings,
  strategy: { kind: 'BUDGET_BOUNDED', minPurchaseFloor: 3000 },
};
