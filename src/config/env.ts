import dotenv from "dotenv";
import { InvalidInputError } from "../utils/errors";
import { EnvSchema, formatIssues } from "../utils/validation";

dotenv.config();

export interface AppConfig {
  port: number;
  logLevel: string;
  marketData: {
    baseUrl: string;
    timeoutMs: number;
  };
  notification: {
    webhookUrl?: string;
    token?: string;
  };
}

/**
 * Reads configuration from environment variables (.env is loaded on import).
 * 
 * @throws InvalidInputError when a variable is malformed
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidInputError("Invalid environment configuration", formatIssues(parsed.error));
  }
  const vars = parsed.data;

  return {
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,
    marketData: {
      baseUrl: vars.MARKET_DATA_BASE_URL,
      timeoutMs: vars.MARKET_DATA_TIMEOUT_MS,
    },
    notification: {
      webhookUrl: vars.NOTIFY_WEBHOOK_URL,
      token: vars.NOTIFY_TOKEN,
    },
  };
}
