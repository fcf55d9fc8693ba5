import express, { NextFunction, Request, Response } from "express";
import { AppConfig, loadAppConfig } from "../config/env";
import { InvestmentPlanner } from "../planner/investmentPlanner";
import { ChartApiMarketDataProvider } from "../services/marketData";
import { WebhookNotificationSink } from "../services/notification";
import { errorMessage, isInvalidInputError } from "../utils/errors";
import logger from "../utils/logger";
import { ApiDependencies, createRouter } from "./routes";

/**
 * Production collaborators built from configuration.
 */
export function createDefaultDependencies(config: AppConfig): ApiDependencies {
  return {
    planner: new InvestmentPlanner(),
    provider: new ChartApiMarketDataProvider(config.marketData),
    notifier: new WebhookNotificationSink({
      ...config.notification,
      timeoutMs: config.marketData.timeoutMs,
    }),
  };
}

export function createApp(deps: ApiDependencies): express.Express {
  const app = express();

  // Middleware
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // CORS headers for development
  app.use((req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.header("Access-Control-Allow-Headers", "Origin, X-Requested-With, Content-Type, Accept");
    if (req.method === "OPTIONS") {
      res.sendStatus(200);
    } else {
      next();
    }
  });

  // Routes
  app.use("/api", createRouter(deps));

  // Root endpoint
  app.get("/", (req, res) => {
    res.json({
      message: "Crash-aware monthly allocation API",
      version: "1.0.0",
      api: "/api",
    });
  });

  // Error handling middleware
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (isInvalidInputError(err)) {
      res.status(400).json({ error: err.message, issues: err.issues });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body" });
      return;
    }
    logger.error(`Unhandled error: ${errorMessage(err)}`);
    res.status(500).json({
      error: "Internal server error",
      message: errorMessage(err),
    });
  });

  return app;
}

const config = loadAppConfig();
const app = createApp(createDefaultDependencies(config));

// Start server
if (require.main === module) {
  logger.level = config.logLevel;
  app.listen(config.port, () => {
    logger.info(`Server running on port ${config.port}`);
    logger.info(`API available at http://localhost:${config.port}/api`);
  });
}

export default app;
