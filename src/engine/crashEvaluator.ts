import { MarketGroup } from "../models/Fund";
import { CrashPattern, CrashVerdict, MarketSignalInput } from "../models/Signal";

/**
 * A market is in crash only when all three signals are strictly `true`.
 * Missing, null or undefined signals count as `false`.
 */
export function isMarketCrashed(signal: MarketSignalInput): boolean {
  return (
    signal.sharedVolatilityHigh === true &&
    signal.valuationLow === true &&
    signal.priceDrawdownSevere === true
  );
}

/**
 * Evaluates the crash verdict independently for each market.
 */
export function evaluateCrash(signals: Record<MarketGroup, MarketSignalInput>): CrashVerdict {
  return {
    HOME: isMarketCrashed(signals.HOME),
    FOREIGN: isMarketCrashed(signals.FOREIGN),
  };
}

/**
 * Maps a verdict pair onto one of the four crash patterns.
 */
export function toCrashPattern(verdict: CrashVerdict): CrashPattern {
  if (verdict.HOME && verdict.FOREIGN) {
    return { kind: "Both", crashedMarkets: ["HOME", "FOREIGN"] };
  }
  if (verdict.HOME) {
    return { kind: "HomeOnly", crashedMarkets: ["HOME"] };
  }
  if (verdict.FOREIGN) {
    return { kind: "ForeignOnly", crashedMarkets: ["FOREIGN"] };
  }
  return { kind: "NoCrash", crashedMarkets: [] };
}
