/**
 * Shared types for the earnings volatility scanner (read-only, no persistence).
 */

/** Best-effort provider call outcome. Failures carry a short reason for skip accounting. */
export type FetchResult<T> = { ok: true; data: T } | { ok: false; reason: string };

export interface OptionContract {
  strike: number;
  lastPrice: number;
  /** NaN when the provider did not quote an IV. */
  impliedVolatility: number;
  openInterest: number;
}

export interface OptionsSnapshot {
  spot: number;
  /** Nearest listed expiration, YYYY-MM-DD. */
  expiry: string;
  calls: OptionContract[];
  puts: OptionContract[];
}

export interface MetricBundle {
  impliedMove: number;
  histMove: number;
  skew: number;
  oiImbalance: number;
}

export interface ScoreRecord {
  underpricing: number;
  squeeze: number;
  cascade: number;
}

export interface ScanCandidate {
  ticker: string;
  spot: number;
  expiry: string;
  metrics: MetricBundle;
  score: ScoreRecord;
}

export interface MarketDataProvider {
  /** Listed earnings dates (first entry is the next expected report). */
  fetchEarningsDates(ticker: string): Promise<FetchResult<Date[]>>;
  fetchOptionsSnapshot(ticker: string): Promise<FetchResult<OptionsSnapshot>>;
  /** Daily closes since `since`, oldest first. */
  fetchDailyCloses(ticker: string, since: Date): Promise<FetchResult<number[]>>;
}

export type SkipReason =
  | "not_reporting"
  | "no_options"
  | "empty_chain"
  | "no_history"
  | "no_iv"
  | "below_threshold";
