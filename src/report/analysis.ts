/**
 * Lot risk analysis: raw records → clean table → lot aggregates →
 * scored, classified lots.
 *
 * Every stage is a pure function of its inputs; the reference statistics
 * and the target are computed/supplied once per run and shared read-only by
 * all lots. The run id is the only non-deterministic field.
 */

import { v4 as uuidv4 } from "uuid";
import type {
  AnalysisReport,
  AnalysisSummary,
  CleanRow,
  IngestSummary,
  LotAggregate,
  LotStatus,
  RawRecord,
  ReferenceStats,
  ScoredLot,
} from "../shared/types.js";
import { normalizeRows } from "../ingest/normalizer.js";
import type { SynonymExtension } from "../ingest/synonyms.js";
import { aggregateLots, computeReferenceStats } from "../analytics/lots.js";
import { DEFAULT_TARGET_LOW, scoreBreakdown } from "../scoring/risk_score.js";
import { STATUS_ORDER, classify, recommend } from "../scoring/classify.js";

export interface AnalysisOptions {
  targetLow?: number;
  headers?: string[];
  synonyms?: SynonymExtension;
}

/**
 * Score, classify and advise each lot against shared reference statistics.
 */
export function scoreLots(
  aggregates: LotAggregate[],
  reference: ReferenceStats,
  targetLow: number
): ScoredLot[] {
  return aggregates.map((lot) => {
    const breakdown = scoreBreakdown(lot, reference, targetLow);
    return {
      ...lot,
      riskScore: breakdown.score,
      status: classify(breakdown.score),
      recommendation: recommend(lot.n, breakdown.score, lot.trend),
      breakdown,
    };
  });
}

export function countByStatus(lots: ScoredLot[]): Record<LotStatus, number> {
  const counts: Record<LotStatus, number> = { RISKY: 0, WATCH: 0, SAFE: 0 };
  for (const lot of lots) counts[lot.status]++;
  return counts;
}

/**
 * Run the full analysis over raw records.
 * Throws MissingColumnsError when a required column is absent.
 */
export function analyzeRecords(
  records: RawRecord[],
  options: AnalysisOptions = {}
): AnalysisReport {
  const targetLow = options.targetLow ?? DEFAULT_TARGET_LOW;
  if (!Number.isFinite(targetLow)) {
    throw new Error(`targetLow must be a finite number, got ${targetLow}`);
  }

  const { rows, summary } = normalizeRows(records, {
    headers: options.headers,
    synonyms: options.synonyms,
  });
  const reference = computeReferenceStats(rows);
  const lots = scoreLots(aggregateLots(rows), reference, targetLow);

  return {
    runId: uuidv4(),
    targetLow,
    reference,
    rows,
    lots,
    summary: { ...summary, statusCounts: countByStatus(lots) },
  };
}

// ── Views ────────────────────────────────────────────────────────────

/**
 * Highest risk first; equal scores list the weaker lot (lower mean) first.
 */
export function sortByRisk(lots: ScoredLot[]): ScoredLot[] {
  return [...lots].sort((a, b) => b.riskScore - a.riskScore || a.mean - b.mean);
}

export function filterByStatus(lots: ScoredLot[], status: LotStatus): ScoredLot[] {
  return lots.filter((l) => l.status === status);
}

export interface LotDetail {
  lot: ScoredLot;
  rows: CleanRow[];
}

/**
 * One lot with its measurements in timestamp order, or null if unknown.
 */
export function lotDetail(report: AnalysisReport, lotId: string): LotDetail | null {
  const lot = report.lots.find((l) => l.lotId === lotId);
  if (!lot) return null;
  const rows = report.rows
    .filter((r) => r.lotId === lotId)
    .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  return { lot, rows };
}

export function describeSummary(summary: IngestSummary): string {
  const rowWord = summary.acceptedRows === 1 ? "row" : "rows";
  const lotWord = summary.lotCount === 1 ? "lot" : "lots";
  let line = `Accepted ${summary.acceptedRows} ${rowWord} across ${summary.lotCount} ${lotWord}`;
  if (summary.droppedRows > 0) {
    line += ` (${summary.droppedRows} dropped)`;
  }
  return line;
}

export function describeStatusCounts(summary: AnalysisSummary): string {
  return STATUS_ORDER.map((s) => `${s}: ${summary.statusCounts[s]}`).join("  ");
}
