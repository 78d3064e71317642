/**
 * Pilot risk score (0–100) for a lot.
 *
 * Four independently capped components:
 * - Level:       how far the lot mean sits below the target, in reference σ → up to 50
 * - Variability: lot σ relative to reference σ → up to 25
 * - Trend:       downward strength trend only → up to 15
 * - Sample size: 10 for a single measurement, 5 for two
 *
 * The constants are pilot calibration values, not derived from a standard.
 */

import type { LotAggregate, ReferenceStats, RiskBreakdown } from "../shared/types.js";
import { roundHalfEven } from "../analytics/stats.js";

export const SCORING_CONSTANTS = {
  levelSensitivity: 15,
  levelCap: 50,
  levelStdFloor: 1.0,
  variabilitySensitivity: 10,
  variabilityCap: 25,
  variabilityStdFloor: 1e-6,
  trendSensitivity: 2,
  trendCap: 15,
  singleSamplePenalty: 10,
  pairSamplePenalty: 5,
  maxScore: 100,
} as const;

export const DEFAULT_TARGET_LOW = 900;

const C = SCORING_CONSTANTS;

export function levelPenalty(lotMean: number, referenceStd: number, targetLow: number): number {
  const gap = Math.max(0, targetLow - lotMean);
  return Math.min(C.levelCap, (gap / Math.max(C.levelStdFloor, referenceStd)) * C.levelSensitivity);
}

export function variabilityPenalty(lotStd: number, referenceStd: number): number {
  return Math.min(
    C.variabilityCap,
    (lotStd / Math.max(C.variabilityStdFloor, referenceStd)) * C.variabilitySensitivity
  );
}

/** Only downward trends are penalized; an undefined trend contributes nothing. */
export function trendPenalty(trend: number | null): number {
  if (trend === null) return 0;
  return Math.min(C.trendCap, Math.max(0, -trend) * C.trendSensitivity);
}

export function sampleSizePenalty(n: number): number {
  if (n === 1) return C.singleSamplePenalty;
  if (n === 2) return C.pairSamplePenalty;
  return 0;
}

/**
 * Compute every component and the final integer score.
 * The sum is clamped to [0, 100] and rounded once, ties to even.
 * A sum that is not a number (overflowed inputs) scores the maximum.
 */
export function scoreBreakdown(
  lot: LotAggregate,
  reference: ReferenceStats,
  targetLow: number
): RiskBreakdown {
  const level = levelPenalty(lot.mean, reference.referenceStd, targetLow);
  const variability = variabilityPenalty(lot.std, reference.referenceStd);
  const trend = trendPenalty(lot.trend);
  const sampleSize = sampleSizePenalty(lot.n);

  const raw = level + variability + trend + sampleSize;
  const bounded = Number.isNaN(raw) ? C.maxScore : Math.max(0, Math.min(C.maxScore, raw));
  const score = roundHalfEven(bounded);

  return { level, variability, trend, sampleSize, raw, score };
}

export function scoreLot(lot: LotAggregate, reference: ReferenceStats, targetLow: number): number {
  return scoreBreakdown(lot, reference, targetLow).score;
}
