import { MarketReadings } from '../../models/Signal';

export const calmReadings: MarketReadings = {
  volatilityIndex: 18.4,
  HOME: { valuationPct: 120, changePct: 3.2 },
  FOREIGN: { valuationPct: 150, changePct: 5.1 },
};

export const homeCrashReadings: MarketReadings = {
  volatilityIndex: 35.2,
  HOME: { valuationPct: 75, changePct: -24.5 },
  FOREIGN: { valuationPct: 110, changePct: -12 },
};

export const foreignCrashReadings: MarketReadings = {
  volatilityIndex: 41,
  HOME: { valuationPct: 95, changePct: -21 },
  FOREIGN: { valuationPct: 70, changePct: -26.3 },
};

export const bothCrashReadings: MarketReadings = {
  volatilityIndex: 52.7,
  HOME: { valuationPct: 68, changePct: -30 },
  FOREIGN: { valuationPct: 72, changePct: -28 },
};

/**
 * Home readings would signal a crash but the shared volatility reading is missing.
 */
export const missingVolatilityReadings: MarketReadings = {
  volatilityIndex: null,
  HOME: { valuationPct: 75, changePct: -24.5 },
  FOREIGN: { valuationPct: null, changePct: -26.3 },
};
