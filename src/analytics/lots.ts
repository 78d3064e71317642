import type { CleanRow, LotAggregate, ReferenceStats } from "../shared/types.js";
import { linearSlope, maxOf, mean, minOf, sampleStdDev } from "./stats.js";

const MS_PER_DAY = 86_400_000;

/** Elapsed-day spreads below this are treated as "all measurements at once". */
const ZERO_SPAN_DAYS = 1e-8;

/** Fallback reference spread when fewer than two rows exist */
export const DEFAULT_REFERENCE_STD = 1.0;

/**
 * Group rows by lot, keeping lots in order of first appearance and rows in
 * their input order within each lot.
 */
export function groupByLot(rows: CleanRow[]): Map<string, CleanRow[]> {
  const groups = new Map<string, CleanRow[]>();
  for (const row of rows) {
    const group = groups.get(row.lotId);
    if (group) {
      group.push(row);
    } else {
      groups.set(row.lotId, [row]);
    }
  }
  return groups;
}

/**
 * Strength trend of a lot in units per day: least-squares slope against
 * fractional days elapsed since the lot's first measurement.
 * Null for a single measurement or when every measurement shares one instant.
 */
export function lotTrend(rows: CleanRow[]): number | null {
  if (rows.length < 2) return null;
  const first = minOf(rows.map((r) => r.timestamp.getTime()));
  const days = rows.map((r) => (r.timestamp.getTime() - first) / MS_PER_DAY);
  if (days.every((d) => Math.abs(d) <= ZERO_SPAN_DAYS)) return null;
  return linearSlope(
    days,
    rows.map((r) => r.strength)
  );
}

/**
 * Fold one lot's rows into its aggregate.
 */
export function aggregateLot(lotId: string, rows: CleanRow[]): LotAggregate {
  if (rows.length === 0) {
    throw new Error(`aggregateLot: lot ${lotId} has no rows`);
  }
  const strengths = rows.map((r) => r.strength);
  const times = rows.map((r) => r.timestamp.getTime());

  return {
    lotId,
    n: rows.length,
    mean: mean(strengths),
    std: sampleStdDev(strengths),
    min: minOf(strengths),
    max: maxOf(strengths),
    periodStart: new Date(minOf(times)),
    periodEnd: new Date(maxOf(times)),
    trend: lotTrend(rows),
  };
}

/**
 * Aggregate the clean table into one record per lot, in first-appearance order.
 */
export function aggregateLots(rows: CleanRow[]): LotAggregate[] {
  return [...groupByLot(rows)].map(([lotId, lotRows]) => aggregateLot(lotId, lotRows));
}

/**
 * Global baseline over every clean row. The spread falls back to 1.0 when
 * fewer than two rows exist.
 */
export function computeReferenceStats(rows: CleanRow[]): ReferenceStats {
  const strengths = rows.map((r) => r.strength);
  return {
    referenceMean: mean(strengths),
    referenceStd: strengths.length > 1 ? sampleStdDev(strengths) : DEFAULT_REFERENCE_STD,
    rowCount: strengths.length,
  };
}
