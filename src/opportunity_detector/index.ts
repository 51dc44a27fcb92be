/**
 * Opportunity detector module — thin facade over strategy metrics, score and filters.
 */
export { impliedMove, historicalMove, skewProxy, oiImbalance } from "../strategy/metrics";
export { scoreModel } from "../strategy/score";
export { reportsToday, evaluateScore, type ThresholdConfig, type FilterResult } from "../strategy/filters";
