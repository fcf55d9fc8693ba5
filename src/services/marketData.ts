/**
 * MARKET DATA PROVIDER
 * ====================
 *
 * Daily index closes from a chart API. Every failure (network, bad payload,
 * short history) is reported as null, which the signal layer treats as an
 * unavailable reading.
 */

import axios, { AxiosAdapter, AxiosInstance } from "axios";
import { z } from "zod";
import { errorMessage } from "../utils/errors";
import logger from "../utils/logger";

export interface MarketDataProvider {
  /**
   * Latest close of an index, or null when unavailable
   */
  getLastClose(indexKey: string): Promise<number | null>;

  /**
   * Percent change between the latest close and the close `lookbackPeriods`
   * observations back, or null when unavailable
   */
  getHistoricalChange(indexKey: string, lookbackPeriods: number): Promise<number | null>;
}

const ChartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          indicators: z.object({
            quote: z.array(
              z.object({
                close: z.array(z.number().nullable()),
              })
            ),
          }),
        })
      )
      .nullable(),
  }),
});

export interface ChartApiOptions {
  baseUrl: string;
  timeoutMs: number;
  adapter?: AxiosAdapter;
}

export class ChartApiMarketDataProvider implements MarketDataProvider {
  private http: AxiosInstance;

  constructor(options: ChartApiOptions) {
    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      adapter: options.adapter,
    });
  }

  async getLastClose(indexKey: string): Promise<number | null> {
    const closes = await this.fetchCloses(indexKey, "5d");
    return closes?.at(-1) ?? null;
  }

  async getHistoricalChange(indexKey: string, lookbackPeriods: number): Promise<number | null> {
    const closes = await this.fetchCloses(indexKey, "6mo");
    if (!closes) {
      return null;
    }
    if (closes.length < lookbackPeriods) {
      logger.warn(
        `[MarketData] ${indexKey}: ${closes.length} closes, need ${lookbackPeriods}`
      );
      return null;
    }

    const current = closes[closes.length - 1];
    const past = closes[closes.length - lookbackPeriods];
    if (past === 0) {
      return null;
    }
    return ((current - past) / past) * 100;
  }

  /**
   * Daily closes in chronological order, with missing sessions dropped
   */
  private async fetchCloses(indexKey: string, range: string): Promise<number[] | null> {
    try {
      const response = await this.http.get(`/v8/finance/chart/${encodeURIComponent(indexKey)}`, {
        params: { range, interval: "1d" },
      });

      const parsed = ChartResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        logger.warn(`[MarketData] ${indexKey}: unexpected payload`);
        return null;
      }

      const closes = parsed.data.chart.result?.[0]?.indicators.quote[0]?.close ?? [];
      return closes.filter((close): close is number => close !== null);
    } catch (error) {
      logger.warn(`[MarketData] ${indexKey}: fetch failed: ${errorMessage(error)}`);
      return null;
    }
  }
}
