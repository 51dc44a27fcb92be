import { toMarketDate } from "../markets/market_time";
import type { MarketDataProvider, ScoreRecord } from "../types";

export interface ThresholdConfig {
  min_underpricing: number;
  min_prob: number;
}

export interface FilterResult {
  pass: boolean;
  reasons: string[];
}

/**
 * True only when the provider's next listed earnings date falls on `today` (YYYY-MM-DD)
 * in `timeZone`. A missing or failed calendar counts as "not reporting".
 */
export async function reportsToday(
  provider: MarketDataProvider,
  ticker: string,
  today: string,
  timeZone: string
): Promise<boolean> {
  const result = await provider.fetchEarningsDates(ticker);
  if (!result.ok) return false;
  const next = result.data[0];
  if (!next || Number.isNaN(next.getTime())) return false;
  return toMarketDate(next, timeZone) === today;
}

/**
 * Qualify a scored ticker: underpricing at or above the floor, and either directional
 * probability at or above min_prob. NaN scores never pass.
 */
export function evaluateScore(score: ScoreRecord, config: ThresholdConfig): FilterResult {
  const reasons: string[] = [];
  if (!(score.underpricing >= config.min_underpricing)) {
    reasons.push(`underpricing ${score.underpricing.toFixed(2)} < min_underpricing ${config.min_underpricing}`);
  }
  if (!(score.squeeze >= config.min_prob || score.cascade >= config.min_prob)) {
    reasons.push(
      `squeeze ${score.squeeze.toFixed(2)} and cascade ${score.cascade.toFixed(2)} < min_prob ${config.min_prob}`
    );
  }
  return { pass: reasons.length === 0, reasons };
}
