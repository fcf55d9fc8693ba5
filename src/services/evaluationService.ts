import { MarketGroup } from "../models/Fund";
import { EvaluationResult } from "../models/EvaluationResult";
import { RebalanceRequest } from "../models/Rebalance";
import { MarketReadings } from "../models/Signal";
import { InvestmentPlanner } from "../planner/investmentPlanner";
import { DRAWDOWN_LOOKBACK_PERIODS, INDEX_KEYS } from "../utils/constants";
import { errorMessage } from "../utils/errors";
import logger from "../utils/logger";
import { MarketDataProvider } from "./marketData";
import { NotificationOutcome, NotificationSink, formatSummaryMessage } from "./notification";

/**
 * Valuation ratios (%) entered by the user; null when not supplied.
 */
export type ManualValuation = Record<MarketGroup, number | null>;

export interface LiveEvaluationRequest {
  baseBudget: number;
  valuation: ManualValuation;
  rebalance?: RebalanceRequest;
  notify?: boolean;
}

export interface LiveEvaluationDependencies {
  planner: InvestmentPlanner;
  provider: MarketDataProvider;
  notifier?: NotificationSink;
  now?: () => Date;
}

export interface LiveEvaluationResult {
  evaluatedAt: string;
  result: EvaluationResult;
  notification?: NotificationOutcome;
}

/**
 * A rejected provider call yields null (unavailable reading).
 */
async function readingOrNull(label: string, fetch: () => Promise<number | null>): Promise<number | null> {
  try {
    return await fetch();
  } catch (error) {
    logger.warn(`[Evaluation] ${label} unavailable: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Collects the raw readings for one run. Provider calls run in parallel.
 */
export async function collectMarketReadings(
  provider: MarketDataProvider,
  valuation: ManualValuation,
  lookbackPeriods: number = DRAWDOWN_LOOKBACK_PERIODS
): Promise<MarketReadings> {
  const [volatilityIndex, homeChange, foreignChange] = await Promise.all([
    readingOrNull(INDEX_KEYS.volatility, () => provider.getLastClose(INDEX_KEYS.volatility)),
    readingOrNull(INDEX_KEYS.HOME, () =>
      provider.getHistoricalChange(INDEX_KEYS.HOME, lookbackPeriods)
    ),
    readingOrNull(INDEX_KEYS.FOREIGN, () =>
      provider.getHistoricalChange(INDEX_KEYS.FOREIGN, lookbackPeriods)
    ),
  ]);

  return {
    volatilityIndex,
    HOME: { valuationPct: valuation.HOME, changePct: homeChange },
    FOREIGN: { valuationPct: valuation.FOREIGN, changePct: foreignChange },
  };
}

/**
 * Fetches readings, evaluates, and optionally pushes the summary.
 * A notification problem is returned as an outcome and never fails the run.
 *
 * @throws InvalidInputError for an invalid budget or rebalance input
 */
export async function runLiveEvaluation(
  deps: LiveEvaluationDependencies,
  request: LiveEvaluationRequest
): Promise<LiveEvaluationResult> {
  const now = deps.now ? deps.now() : new Date();
  const readings = await collectMarketReadings(deps.provider, request.valuation);

  const result = deps.planner.evaluate({
    baseBudget: request.baseBudget,
    readings,
    rebalance: request.rebalance,
  });

  for (const notice of result.degraded) {
    logger.warn(
      `[Evaluation] Degraded signal ${notice.signal}${notice.market ? ` (${notice.market})` : ""}: treated as false`
    );
  }
  logger.info(
    `[Evaluation] pattern=${result.pattern.kind} total=${result.totalInvestment}`
  );

  const live: LiveEvaluationResult = { evaluatedAt: now.toISOString(), result };

  if (request.notify) {
    live.notification = deps.notifier
      ? await deps.notifier.send(formatSummaryMessage(result, now))
      : { status: "not_configured" };
    logger.info(`[Evaluation] notification=${live.notification.status}`);
  }

  return live;
}
