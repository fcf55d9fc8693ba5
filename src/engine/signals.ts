import { MarketGroup } from "../models/Fund";
import {
  DegradedSignal,
  MarketReadings,
  MarketSignal,
  SignalAssessment,
} from "../models/Signal";
import {
  DRAWDOWN_SEVERE_THRESHOLD_PCT,
  VALUATION_LOW_THRESHOLD_PCT,
  VOLATILITY_HIGH_THRESHOLD,
} from "../utils/constants";

export interface SignalThresholds {
  volatilityHigh: number; // level strictly above is high
  valuationLowPct: number; // ratio strictly below is low
  drawdownSeverePct: number; // change at or below is severe
}

export const DEFAULT_SIGNAL_THRESHOLDS: SignalThresholds = {
  volatilityHigh: VOLATILITY_HIGH_THRESHOLD,
  valuationLowPct: VALUATION_LOW_THRESHOLD_PCT,
  drawdownSeverePct: DRAWDOWN_SEVERE_THRESHOLD_PCT,
};

/**
 * Turns raw readings into boolean signals per market.
 *
 * An unavailable (null) reading never triggers a signal: it yields `false`
 * and is listed in `degraded`, so a failed fetch can only suppress an
 * additional investment, never cause one.
 */
export function deriveMarketSignals(
  readings: MarketReadings,
  thresholds: SignalThresholds = DEFAULT_SIGNAL_THRESHOLDS
): SignalAssessment {
  const degraded: DegradedSignal[] = [];

  const sharedVolatilityHigh =
    readings.volatilityIndex !== null && readings.volatilityIndex > thresholds.volatilityHigh;
  if (readings.volatilityIndex === null) {
    degraded.push({ signal: "sharedVolatilityHigh", market: null });
  }

  const forMarket = (market: MarketGroup): MarketSignal => {
    const { valuationPct, changePct } = readings[market];
    if (valuationPct === null) {
      degraded.push({ signal: "valuationLow", market });
    }
    if (changePct === null) {
      degraded.push({ signal: "priceDrawdownSevere", market });
    }
    return {
      sharedVolatilityHigh,
      valuationLow: valuationPct !== null && valuationPct < thresholds.valuationLowPct,
      priceDrawdownSevere: changePct !== null && changePct <= thresholds.drawdownSeverePct,
    };
  };

  const signals = {
    HOME: forMarket("HOME"),
    FOREIGN: forMarket("FOREIGN"),
  };

  return { signals, degraded };
}
