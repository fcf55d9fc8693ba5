/**
 * NOTIFICATION SINK
 * =================
 *
 * Pushes the evaluation summary to a webhook. A missing credential is
 * reported as not_configured, distinct from a failed send.
 */

import axios, { AxiosAdapter, AxiosInstance } from "axios";
import { EvaluationResult } from "../models/EvaluationResult";
import { errorMessage } from "../utils/errors";
import { formatDate, formatReading, formatSignedYen, formatYen } from "../utils/formatters";
import logger from "../utils/logger";

export type NotificationOutcome =
  | { status: "sent" }
  | { status: "not_configured" }
  | { status: "failed"; error: string };

export interface NotificationSink {
  send(text: string): Promise<NotificationOutcome>;
}

export interface WebhookOptions {
  webhookUrl?: string;
  token?: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
}

export class WebhookNotificationSink implements NotificationSink {
  private http: AxiosInstance;
  private webhookUrl?: string;
  private token?: string;

  constructor(options: WebhookOptions) {
    this.webhookUrl = options.webhookUrl;
    this.token = options.token;
    this.http = axios.create({
      timeout: options.timeoutMs ?? 10000,
      adapter: options.adapter,
    });
  }

  async send(text: string): Promise<NotificationOutcome> {
    if (!this.webhookUrl || !this.token) {
      return { status: "not_configured" };
    }

    try {
      await this.http.post(
        this.webhookUrl,
        { message: text },
        { headers: { Authorization: `Bearer ${this.token}` } }
      );
      return { status: "sent" };
    } catch (error) {
      const message = errorMessage(error);
      logger.warn(`[Notify] Send failed: ${message}`);
      return { status: "failed", error: message };
    }
  }
}

/**
 * Builds the plain-text summary pushed after an evaluation.
 */
export function formatSummaryMessage(result: EvaluationResult, asOf: Date): string {
  const { verdict, crashAllocation, baseBudget, totalInvestment } = result;
  const status = (crashed: boolean): string => (crashed ? "CRASH" : "normal");

  const lines = [
    "Crash check result",
    `Date: ${formatDate(asOf)}`,
    "",
    "[Markets]",
    `Volatility index: ${formatReading(result.readings.volatilityIndex)}`,
    `Home market: ${status(verdict.HOME)}`,
    `Foreign market: ${status(verdict.FOREIGN)}`,
    "",
    "[Decision]",
  ];

  const { crashFunds } = crashAllocation;
  switch (result.pattern.kind) {
    case "NoCrash":
      lines.push(
        "Both markets normal",
        "Additional investment: none",
        `Scheduled purchase: ${formatYen(baseBudget)}`
      );
      break;
    case "HomeOnly":
      lines.push(
        "Home market crash only",
        `Additional investment: ${formatSignedYen(crashFunds.HOME)} to home funds`,
        `Total: ${formatYen(totalInvestment)}`
      );
      break;
    case "ForeignOnly":
      lines.push(
        "Foreign market crash only",
        `Additional investment: ${formatSignedYen(crashFunds.FOREIGN)} to foreign funds`,
        `Total: ${formatYen(totalInvestment)}`
      );
      break;
    case "Both":
      lines.push(
        "Both markets in crash",
        `Additional investment: ${formatSignedYen(crashFunds.HOME + crashFunds.FOREIGN)} to all funds`,
        `Total: ${formatYen(totalInvestment)}`
      );
      break;
  }

  if (result.degraded.length > 0) {
    lines.push("", `Note: ${result.degraded.length} signal(s) unavailable, treated as not triggered`);
  }

  return lines.join("\n");
}
