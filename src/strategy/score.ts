import type { MetricBundle, ScoreRecord } from "../types";

export const IMPLIED_MOVE_EPSILON = 1e-6;
export const SKEW_WEIGHT = 0.3;
export const IMBALANCE_WEIGHT = 0.2;

/**
 * Heuristic mispricing score.
 * - underpricing: realized / implied move (epsilon keeps a zero implied move finite).
 * - tilt: tanh-squashed skew and OI imbalance, weighted; |tilt| < 0.5.
 * - squeeze = 0.5 + tilt, cascade = 0.5 - tilt. Labels, not calibrated probabilities.
 */
export function scoreModel(metrics: MetricBundle): ScoreRecord {
  const underpricing = metrics.histMove / (metrics.impliedMove + IMPLIED_MOVE_EPSILON);
  const tilt = SKEW_WEIGHT * Math.tanh(metrics.skew) + IMBALANCE_WEIGHT * Math.tanh(metrics.oiImbalance);
  return {
    underpricing,
    squeeze: 0.5 + tilt,
    cascade: 0.5 - tilt,
  };
}
