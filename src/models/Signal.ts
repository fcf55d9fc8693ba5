import { MarketGroup } from "./Fund";

/**
 * Crash signal data structures
 */

export interface MarketSignal {
  sharedVolatilityHigh: boolean;
  valuationLow: boolean;
  priceDrawdownSevere: boolean;
}

/**
 * A signal whose upstream reading may be missing. Anything other than
 * `true` counts as `false` when the verdict is evaluated.
 */
export type MarketSignalInput = {
  [K in keyof MarketSignal]?: boolean | null;
};

export type CrashVerdict = Record<MarketGroup, boolean>;

export type CrashPattern =
  | { kind: "NoCrash"; crashedMarkets: [] }
  | { kind: "HomeOnly"; crashedMarkets: ["HOME"] }
  | { kind: "ForeignOnly"; crashedMarkets: ["FOREIGN"] }
  | { kind: "Both"; crashedMarkets: ["HOME", "FOREIGN"] };

export type CrashPatternKind = CrashPattern["kind"];

/**
 * Raw readings for one market. `null` means the reading is unavailable.
 */
export interface MarketReading {
  valuationPct: number | null; // market-cap-to-GDP style valuation ratio, in percent
  changePct: number | null; // index change over the lookback window, in percent
}

export interface MarketReadings {
  volatilityIndex: number | null;
  HOME: MarketReading;
  FOREIGN: MarketReading;
}

export type SignalName = keyof MarketSignal;

export interface DegradedSignal {
  signal: SignalName;
  market: MarketGroup | null; // null for the shared volatility signal
}

export interface SignalAssessment {
  signals: Record<MarketGroup, MarketSignal>;
  degraded: DegradedSignal[];
}
