import type { OptionContract } from "../types";

function nearestToSpot(contracts: OptionContract[], spot: number): OptionContract | null {
  let best: OptionContract | null = null;
  let bestDist = Infinity;
  for (const c of contracts) {
    const dist = Math.abs(c.strike - spot);
    // strict < keeps the first row on ties
    if (dist < bestDist) {
      best = c;
      bestDist = dist;
    }
  }
  return best;
}

function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((s, v) => s + v, 0) / values.length;
}

/**
 * Straddle-implied fractional move to expiry: (ATM call + ATM put) / spot.
 * Call and put strikes are picked independently. Null when either side is empty.
 */
export function impliedMove(spot: number, calls: OptionContract[], puts: OptionContract[]): number | null {
  if (!(spot > 0)) return null;
  const atmCall = nearestToSpot(calls, spot);
  const atmPut = nearestToSpot(puts, spot);
  if (!atmCall || !atmPut) return null;
  return (atmCall.lastPrice + atmPut.lastPrice) / spot;
}

/** Mean absolute day-over-day return. NaN when there is not a single usable return. */
export function historicalMove(closes: number[]): number {
  const absReturns: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    const r = closes[i] / closes[i - 1] - 1;
    if (Number.isFinite(r)) absReturns.push(Math.abs(r));
  }
  return mean(absReturns) ?? Number.NaN;
}

/** Mean put IV minus mean call IV. Positive = put premium. */
export function skewProxy(calls: OptionContract[], puts: OptionContract[]): number | null {
  const ivs = (side: OptionContract[]) =>
    side.map((c) => c.impliedVolatility).filter((iv) => Number.isFinite(iv));
  const putIv = mean(ivs(puts));
  const callIv = mean(ivs(calls));
  if (putIv === null || callIv === null) return null;
  return putIv - callIv;
}

/** (callOI - putOI) / (callOI + putOI + 1); the +1 keeps empty books finite. */
export function oiImbalance(calls: OptionContract[], puts: OptionContract[]): number {
  const sum = (side: OptionContract[]) =>
    side.reduce((s, c) => s + (Number.isFinite(c.openInterest) ? c.openInterest : 0), 0);
  const callOi = sum(calls);
  const putOi = sum(puts);
  return (callOi - putOi) / (callOi + putOi + 1);
}
