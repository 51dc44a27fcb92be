import { historyStart } from "../markets/market_time";
import {
  impliedMove,
  historicalMove,
  skewProxy,
  oiImbalance,
  scoreModel,
  reportsToday,
  evaluateScore,
  type ThresholdConfig,
} from "../opportunity_detector";
import { rankCandidates } from "../report/scan_report";
import { noThrottle, type Throttle } from "./throttle";
import type { MarketDataProvider, ScanCandidate, SkipReason } from "../types";

export type ScanState = "SCANNING" | "DONE";

export interface ScanParams extends ThresholdConfig {
  /** Market-local calendar date, YYYY-MM-DD. */
  today: string;
  max_symbols: number;
  market_timezone: string;
  history_years: number;
  /** Reference instant for the history window; defaults to now. */
  now?: Date;
}

export interface ScanProgress {
  state: ScanState;
  index: number;
  total: number;
  ticker: string;
  outcome: "accepted" | SkipReason;
}

export interface ScanDeps {
  provider: MarketDataProvider;
  throttle?: Throttle;
  onProgress?: (event: ScanProgress) => void;
}

export interface ScanStats {
  universeSize: number;
  scanned: number;
  accepted: number;
  skipReasons: Record<SkipReason, number>;
}

export interface ScanOutcome {
  state: "DONE";
  candidates: ScanCandidate[];
  stats: ScanStats;
}

type TickerResult = { accepted: true; candidate: ScanCandidate } | { accepted: false; reason: SkipReason };

function emptySkipCounts(): Record<SkipReason, number> {
  return {
    not_reporting: 0,
    no_options: 0,
    empty_chain: 0,
    no_history: 0,
    no_iv: 0,
    below_threshold: 0,
  };
}

async function evaluateTicker(
  ticker: string,
  params: ScanParams,
  provider: MarketDataProvider,
  historySince: Date
): Promise<TickerResult> {
  if (!(await reportsToday(provider, ticker, params.today, params.market_timezone))) {
    return { accepted: false, reason: "not_reporting" };
  }

  const snapshot = await provider.fetchOptionsSnapshot(ticker);
  if (!snapshot.ok) return { accepted: false, reason: "no_options" };
  const { spot, expiry, calls, puts } = snapshot.data;

  const im = impliedMove(spot, calls, puts);
  if (im === null) return { accepted: false, reason: "empty_chain" };

  const closes = await provider.fetchDailyCloses(ticker, historySince);
  if (!closes.ok) return { accepted: false, reason: "no_history" };
  const hm = historicalMove(closes.data);
  if (Number.isNaN(hm)) return { accepted: false, reason: "no_history" };

  const skew = skewProxy(calls, puts);
  if (skew === null) return { accepted: false, reason: "no_iv" };

  const metrics = { impliedMove: im, histMove: hm, skew, oiImbalance: oiImbalance(calls, puts) };
  const score = scoreModel(metrics);
  const filter = evaluateScore(score, params);
  if (!filter.pass) {
    console.log(`[scan] ${ticker} rejected: ${filter.reasons.join("; ")}`);
    return { accepted: false, reason: "below_threshold" };
  }
  return { accepted: true, candidate: { ticker, spot, expiry, metrics, score } };
}

/**
 * One sequential pass over the universe (first `max_symbols` tickers, in order).
 * Tickers that cannot be scored are skipped and counted, never fatal; the worst case
 * is an empty candidate list. Candidates come back ranked by underpricing.
 */
export async function runEarningsScan(
  universe: readonly string[],
  params: ScanParams,
  deps: ScanDeps
): Promise<ScanOutcome> {
  const throttle = deps.throttle ?? noThrottle;
  const tickers = universe.slice(0, Math.max(0, params.max_symbols));
  const historySince = historyStart(params.now ?? new Date(), params.history_years);
  const skipReasons = emptySkipCounts();
  const accepted: ScanCandidate[] = [];

  console.log(`[scan] Scanning ${tickers.length} symbols for earnings on ${params.today}`);
  for (let i = 0; i < tickers.length; i++) {
    const ticker = tickers[i];
    await throttle.wait();
    const result = await evaluateTicker(ticker, params, deps.provider, historySince);
    if (result.accepted) {
      accepted.push(result.candidate);
    } else {
      skipReasons[result.reason]++;
    }
    deps.onProgress?.({
      state: "SCANNING",
      index: i,
      total: tickers.length,
      ticker,
      outcome: result.accepted ? "accepted" : result.reason,
    });
  }

  const candidates = rankCandidates(accepted);
  console.log(`[scan] Done: ${candidates.length} qualifying of ${tickers.length} scanned`);
  return {
    state: "DONE",
    candidates,
    stats: {
      universeSize: universe.length,
      scanned: tickers.length,
      accepted: candidates.length,
      skipReasons,
    },
  };
}
