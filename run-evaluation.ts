import * as fs from "fs";
import * as path from "path";
import { loadAppConfig } from "./src/config/env";
import { InvestmentPlanner } from "./src/planner/investmentPlanner";
import { runLiveEvaluation } from "./src/services/evaluationService";
import { ChartApiMarketDataProvider } from "./src/services/marketData";
import { WebhookNotificationSink } from "./src/services/notification";
import { errorMessage } from "./src/utils/errors";
import { formatYen } from "./src/utils/formatters";
import logger from "./src/utils/logger";
import {
  EvaluateRequestSchema,
  LiveEvaluateRequestSchema,
  formatIssues,
} from "./src/utils/validation";

/**
 * Run one evaluation and write the result to evaluation-output.json
 * (generated in project root).
 * Usage: npm run evaluate -- [input-file]
 * Default input: example-request.json
 *
 * When the input carries `readings` they are used as-is; otherwise the index
 * data is fetched live and `valuation` supplies the valuation ratios.
 */
const OUTPUT_FILE = "evaluation-output.json";

async function main(): Promise<void> {
  const inputPath = process.argv[2] ?? "example-request.json";

  let inputData: unknown;
  try {
    const raw = fs.readFileSync(path.resolve(inputPath), "utf-8");
    inputData = JSON.parse(raw);
  } catch (err) {
    logger.error(`Failed to read or parse input file "${inputPath}": ${errorMessage(err)}`);
    process.exitCode = 1;
    return;
  }

  const config = loadAppConfig();
  logger.level = config.logLevel;
  const planner = new InvestmentPlanner();

  const hasReadings =
    typeof inputData === "object" && inputData !== null && "readings" in inputData;

  let output: unknown;
  let total: number;
  if (hasReadings) {
    const parsed = EvaluateRequestSchema.safeParse(inputData);
    if (!parsed.success) {
      logger.error(`Invalid input: ${formatIssues(parsed.error).join("; ")}`);
      process.exitCode = 1;
      return;
    }
    logger.info("Evaluating supplied readings...");
    const result = planner.evaluate(parsed.data);
    output = result;
    total = result.totalInvestment;
  } else {
    const parsed = LiveEvaluateRequestSchema.safeParse(inputData);
    if (!parsed.success) {
      logger.error(`Invalid input: ${formatIssues(parsed.error).join("; ")}`);
      process.exitCode = 1;
      return;
    }
    logger.info("Fetching market data and evaluating...");
    const live = await runLiveEvaluation(
      {
        planner,
        provider: new ChartApiMarketDataProvider(config.marketData),
        notifier: new WebhookNotificationSink({
          ...config.notification,
          timeoutMs: config.marketData.timeoutMs,
        }),
      },
      parsed.data
    );
    output = live;
    total = live.result.totalInvestment;
  }

  fs.writeFileSync(OUTPUT_FILE, JSON.stringify(output, null, 2));
  logger.info(`Total investment this period: ${formatYen(total)}`);
  logger.info(`Evaluation output saved to ${OUTPUT_FILE}`);
}

main().catch((err: unknown) => {
  logger.error(`Evaluation failed: ${errorMessage(err)}`);
  process.exitCode = 1;
});
