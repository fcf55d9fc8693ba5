import { NextFunction, Request, Response, Router } from "express";
import { InvestmentPlanner } from "../planner/investmentPlanner";
import { runLiveEvaluation } from "../services/evaluationService";
import { MarketDataProvider } from "../services/marketData";
import { NotificationSink } from "../services/notification";
import {
  AllocationRequestSchema,
  EvaluateRequestSchema,
  LiveEvaluateRequestSchema,
  RebalanceHttpRequestSchema,
  formatIssues,
} from "../utils/validation";

/**
 * Collaborators the routes need. Tests pass in-process stand-ins.
 */
export interface ApiDependencies {
  planner: InvestmentPlanner;
  provider: MarketDataProvider;
  notifier: NotificationSink;
  now?: () => Date;
}

const API_INFO = {
  message: "Crash-aware monthly allocation API",
  version: "1.0.0",
  endpoints: {
    allocation: "POST /api/allocation - Regular allocation and reserved crash funds",
    evaluate: "POST /api/evaluate - Evaluate with supplied readings",
    evaluateLive: "POST /api/evaluate/live - Evaluate with live market data",
    rebalance: "POST /api/rebalance - Rebalancing plan from current holdings",
    health: "GET /api/health - Health check",
  },
};

export function createRouter(deps: ApiDependencies): Router {
  const router = Router();
  const { planner } = deps;

  /**
   * GET /api
   * API information endpoint
   */
  router.get("/", (req: Request, res: Response) => {
    res.json(API_INFO);
  });

  /**
   * GET /api/health
   * Health check endpoint
   */
  router.get("/health", (req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  /**
   * POST /api/allocation
   * Regular per-fund allocation for a budget, plus the crash fund reserved per market
   */
  router.post("/allocation", (req: Request, res: Response, next: NextFunction) => {
    const parsed = AllocationRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid request", issues: formatIssues(parsed.error) });
    }

    try {
      const { baseBudget } = parsed.data;
      res.json({
        regularAllocation: planner.planRegular(baseBudget),
        crashFunds: planner.getCrashFunds(baseBudget),
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/evaluate
   * Evaluation from readings supplied in the body (null readings are unavailable)
   */
  router.post("/evaluate", (req: Request, res: Response, next: NextFunction) => {
    const parsed = EvaluateRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid request", issues: formatIssues(parsed.error) });
    }

    try {
      res.json(planner.evaluate(parsed.data));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/evaluate/live
   * Evaluation from the market data provider and the manual valuation input
   */
  router.post("/evaluate/live", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = LiveEvaluateRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid request", issues: formatIssues(parsed.error) });
    }

    try {
      const live = await runLiveEvaluation(
        { planner, provider: deps.provider, notifier: deps.notifier, now: deps.now },
        parsed.data
      );
      res.json(live);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/rebalance
   * Rebalancing plan for current holdings under the chosen strategy
   */
  router.post("/rebalance", (req: Request, res: Response, next: NextFunction) => {
    const parsed = RebalanceHttpRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid request", issues: formatIssues(parsed.error) });
    }

    try {
      const { baseBudget, holdings, strategy } = parsed.data;
      const regularAllocation = planner.planRegular(baseBudget);
      res.json({
        regularAllocation,
        rebalance: planner.planRebalance({ holdings, strategy }, regularAllocation),
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
