import type { LotStatus } from "../shared/types.js";

export const RISKY_THRESHOLD = 60;
export const WATCH_THRESHOLD = 30;

/** Display order, highest risk first */
export const STATUS_ORDER: LotStatus[] = ["RISKY", "WATCH", "SAFE"];

export const RECOMMENDATIONS = {
  singleMeasurement: "single measurement: recommend re-measurement + process control.",
  downwardTrend:
    "downward trend: recommend checking process/heat-treatment parameters and re-measuring.",
  remeasure: "recommend re-measurement + process control.",
  followUp: "recommend follow-up (plan additional measurement; act if deviation grows).",
  continueProduction: "continue normal production.",
} as const;

/** Trends steeper than this (units/day, negative) get the process-parameter advice */
const STEEP_DECLINE = -2;

export function classify(score: number): LotStatus {
  if (score >= RISKY_THRESHOLD) return "RISKY";
  if (score >= WATCH_THRESHOLD) return "WATCH";
  return "SAFE";
}

/**
 * Advice text for a lot. Within the risky band a single measurement takes
 * precedence over a steep downward trend.
 */
export function recommend(n: number, score: number, trend: number | null): string {
  if (score >= RISKY_THRESHOLD) {
    if (n === 1) return RECOMMENDATIONS.singleMeasurement;
    if (trend !== null && trend < STEEP_DECLINE) return RECOMMENDATIONS.downwardTrend;
    return RECOMMENDATIONS.remeasure;
  }
  if (score >= WATCH_THRESHOLD) return RECOMMENDATIONS.followUp;
  return RECOMMENDATIONS.continueProduction;
}
