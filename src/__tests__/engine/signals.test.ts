import { DEFAULT_SIGNAL_THRESHOLDS, deriveMarketSignals } from '../../engine/signals';
import { MarketReadings } from '../../models/Signal';
import { calmReadings, homeCrashReadings, missingVolatilityReadings } from '../fixtures/readings';

describe('deriveMarketSignals', () => {
  it('should raise no signals in calm markets', () => {
    const { signals, degraded } = deriveMarketSignals(calmReadings);

    expect(signals.HOME).toEqual({ sharedVolatilityHigh: false, valuationLow: false, priceDrawdownSevere: false });
    expect(signals.FOREIGN).toEqual({ sharedVolatilityHigh: false, valuationLow: false, priceDrawdownSevere: false });
    expect(degraded).toEqual([]);
  });

  it('should share the volatility signal between markets', () => {
    const { signals } = deriveMarketSignals(homeCrashReadings);

    expect(signals.HOME).toEqual({ sharedVolatilityHigh: true, valuationLow: true, priceDrawdownSevere: true });
    expect(signals.FOREIGN).toEqual({ sharedVolatilityHigh: true, valuationLow: false, priceDrawdownSevere: false });
  });

  it('should apply the thresholds at their boundaries', () => {
    const atBoundary: MarketReadings = {
      volatilityIndex: 30,
      HOME: { valuationPct: 80, changePct: -20 },
      FOREIGN: { valuationPct: 79.9, changePct: -19.9 },
    };

    const { signals } = deriveMarketSignals(atBoundary);

    expect(signals.HOME).toEqual({ sharedVolatilityHigh: false, valuationLow: false, priceDrawdownSevere: true });
    expect(signals.FOREIGN).toEqual({ sharedVolatilityHigh: false, valuationLow: true, priceDrawdownSevere: false });
  });

  it('should treat unavailable readings as false and report them', () => {
    const { signals, degraded } = deriveMarketSignals(missingVolatilityReadings);

    expect(signals.HOME.sharedVolatilityHigh).toBe(false);
    expect(signals.HOME.valuationLow).toBe(true);
    expect(signals.FOREIGN.valuationLow).toBe(false);
    expect(degraded).toEqual([
      { signal: 'sharedVolatilityHigh', market: null },
      { signal: 'valuationLow', market: 'FOREIGN' },
    ]);
  });

  it('should accept custom thresholds', () => {
    const { signals } = deriveMarketSignals(calmReadings, {
      ...DEFAULT_SIGNAL_THRESHOLDS,
      volatilityHigh: 15,
    });
    expect(signals.HOME.sharedVolatilityHigh).toBe(true);
  });
});
