import { z } from "zod";
import { FUND_IDS, MARKET_GROUPS } from "../models/Fund";
import {
  BUDGET_MAX,
  BUDGET_MIN,
  BUDGET_STEP,
  HOLDING_MAX,
} from "./constants";
import { fractionsEqual } from "./math";

/**
 * Zod validation schemas for configuration and request bodies.
 * Amounts are in yen; percentages are in percent (e.g., 80 means 80%).
 */

/**
 * Builds an object schema with one entry per fund, so the inferred type
 * always covers every fund.
 */
function fundAmountsSchema<T extends z.ZodTypeAny>(amount: T) {
  return z.object({
    jp_stock: amount,
    jp_reit: amount,
    jp_bond: amount,
    global_stock: amount,
    us_stock: amount,
    os_reit: amount,
    os_bond: amount,
  });
}

/**
 * Schema for a single fund entry of the allocation table.
 */
export const FundSpecSchema = z.object({
  market: z.enum(MARKET_GROUPS),
  fraction: z.number().min(0).max(1),
  label: z.string().min(1),
});

/**
 * Schema for the allocation table. Fractions must sum to 1 and each market's
 * fractions must sum to that market's ratio.
 */
export const AllocationTableSchema = z
  .object({
    funds: fundAmountsSchema(FundSpecSchema),
    marketRatios: z.object({
      HOME: z.number().gt(0).lt(1),
      FOREIGN: z.number().gt(0).lt(1),
    }),
    taxAdvantagedCap: z.number().int().min(0),
    taxSplitFund: z.enum(FUND_IDS),
  })
  .superRefine((table, ctx) => {
    const total = FUND_IDS.reduce((sum, fundId) => sum + table.funds[fundId].fraction, 0);
    if (!fractionsEqual(total, 1)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["funds"],
        message: `Fund fractions must sum to 1 (got ${total})`,
      });
    }

    for (const market of MARKET_GROUPS) {
      const marketTotal = FUND_IDS.filter((fundId) => table.funds[fundId].market === market).reduce(
        (sum, fundId) => sum + table.funds[fundId].fraction,
        0
      );
      if (!fractionsEqual(marketTotal, table.marketRatios[market])) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["marketRatios", market],
          message: `${market} fund fractions sum to ${marketTotal}, expected ${table.marketRatios[market]}`,
        });
      }
    }
  });

/**
 * Schema for the monthly base budget accepted over HTTP.
 */
export const BudgetSchema = z
  .number()
  .int()
  .min(BUDGET_MIN)
  .max(BUDGET_MAX)
  .multipleOf(BUDGET_STEP);

/**
 * Schema for current holdings by fund (must be non-negative).
 */
export const HoldingsSchema = fundAmountsSchema(z.number().int().min(0).max(HOLDING_MAX));

/**
 * Schema for the rebalancing strategy.
 */
export const RebalanceStrategySchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("BUDGET_BOUNDED"),
    minPurchaseFloor: z.number().int().min(0),
  }),
  z.object({
    kind: z.literal("EXTRA_CAPITAL"),
    extraCapital: z.number().int().min(0).max(BUDGET_MAX),
  }),
]);

export const RebalanceRequestSchema = z.object({
  holdings: HoldingsSchema,
  strategy: RebalanceStrategySchema,
});

/**
 * Schema for one market's raw readings. Missing or null readings are unavailable.
 */
export const MarketReadingSchema = z.object({
  valuationPct: z.number().min(0).nullable().default(null),
  changePct: z.number().nullable().default(null),
});

export const MarketReadingsSchema = z.object({
  volatilityIndex: z.number().min(0).nullable().default(null),
  HOME: MarketReadingSchema,
  FOREIGN: MarketReadingSchema,
});

/**
 * Schema for the manually entered valuation ratios (%).
 */
export const ManualValuationSchema = z.object({
  HOME: z.number().min(0).max(300).nullable().default(null),
  FOREIGN: z.number().min(0).max(300).nullable().default(null),
});

export const AllocationRequestSchema = z.object({
  baseBudget: BudgetSchema,
});

export const EvaluateRequestSchema = z.object({
  baseBudget: BudgetSchema,
  readings: MarketReadingsSchema,
  rebalance: RebalanceRequestSchema.optional(),
});

export const LiveEvaluateRequestSchema = z.object({
  baseBudget: BudgetSchema,
  valuation: ManualValuationSchema,
  rebalance: RebalanceRequestSchema.optional(),
  notify: z.boolean().default(false),
});

export const RebalanceHttpRequestSchema = RebalanceRequestSchema.extend({
  baseBudget: BudgetSchema,
});

const emptyAsUndefined = (value: unknown): unknown => (value === "" ? undefined : value);

/**
 * Schema for environment configuration.
 */
export const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z
    .enum(["error", "warn", "info", "http", "verbose", "debug", "silly"])
    .default("info"),
  MARKET_DATA_BASE_URL: z.string().url().default("https://query1.finance.yahoo.com"),
  MARKET_DATA_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  NOTIFY_WEBHOOK_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
  NOTIFY_TOKEN: z.preprocess(emptyAsUndefined, z.string().min(1).optional()),
});

/**
 * Flattens zod issues into "path: message" strings for error responses.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}
