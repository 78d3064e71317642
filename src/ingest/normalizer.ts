/**
 * Measurement Normalizer — turns raw records with arbitrary headers into the
 * clean, sorted measurement table.
 *
 * Handles: header resolution through the synonym table, per-row coercion,
 * dropping incomplete rows, and ordering by (lot, timestamp).
 */

import { z } from "zod";
import { MissingColumnsError } from "../shared/errors.js";
import type { CanonicalColumn, CleanRow, IngestSummary, RawRecord } from "../shared/types.js";
import { parseLotId, parseMeasurementDate, parseStrength } from "./coerce.js";
import {
  REQUIRED_COLUMNS,
  buildReverseSynonymMap,
  normalizeColumnName,
  type SynonymExtension,
} from "./synonyms.js";

// ── Canonical Row Schema ─────────────────────────────────────────────

export const CleanRowSchema = z.object({
  lotId: z.preprocess(parseLotId, z.string().min(1)),
  timestamp: z.preprocess(parseMeasurementDate, z.date()),
  strength: z.preprocess(parseStrength, z.number().finite()),
});

export type ColumnResolution = Record<CanonicalColumn, string>;

export interface NormalizeOptions {
  /** Header row in file order; defaults to the union of record keys */
  headers?: string[];
  synonyms?: SynonymExtension;
}

export interface NormalizeResult {
  rows: CleanRow[];
  columns: ColumnResolution;
  summary: IngestSummary;
}

// ── Column Resolution ────────────────────────────────────────────────

/**
 * Collect header names across all records, in order of first appearance.
 */
export function collectHeaders(records: RawRecord[]): string[] {
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) seen.add(key);
  }
  return [...seen];
}

/**
 * Map each canonical column to the source header that carries it.
 * When several headers resolve to the same column, the first one wins.
 */
export function resolveColumns(
  headers: string[],
  synonyms?: SynonymExtension
): ColumnResolution {
  const reverseMap = buildReverseSynonymMap(synonyms);
  const found = new Map<CanonicalColumn, string>();

  for (const header of headers) {
    const canonical = reverseMap.get(normalizeColumnName(header));
    if (canonical && !found.has(canonical)) {
      found.set(canonical, header);
    }
  }

  const missing = REQUIRED_COLUMNS.filter((c) => !found.has(c));
  if (missing.length > 0) {
    throw new MissingColumnsError(missing, [...REQUIRED_COLUMNS]);
  }

  return {
    LOT: found.get("LOT") ?? "",
    DATE: found.get("DATE") ?? "",
    STRENGTH: found.get("STRENGTH") ?? "",
  };
}

// ── Ordering ─────────────────────────────────────────────────────────

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** (lot, timestamp) ascending; Array.prototype.sort keeps ties in input order */
export function compareRows(a: CleanRow, b: CleanRow): number {
  return compareText(a.lotId, b.lotId) || a.timestamp.getTime() - b.timestamp.getTime();
}

// ── Main Normalization ───────────────────────────────────────────────

/**
 * Normalize raw records into the clean measurement table.
 * Throws MissingColumnsError when a required column cannot be resolved;
 * rows with an unreadable lot, date or strength are dropped.
 */
export function normalizeRows(
  records: RawRecord[],
  options: NormalizeOptions = {}
): NormalizeResult {
  const headers = options.headers ?? collectHeaders(records);
  const columns = resolveColumns(headers, options.synonyms);

  const rows: CleanRow[] = [];
  for (const record of records) {
    const parsed = CleanRowSchema.safeParse({
      lotId: record[columns.LOT],
      timestamp: record[columns.DATE],
      strength: record[columns.STRENGTH],
    });
    if (parsed.success) rows.push(parsed.data);
  }

  rows.sort(compareRows);

  return {
    rows,
    columns,
    summary: {
      inputRows: records.length,
      acceptedRows: rows.length,
      droppedRows: records.length - rows.length,
      lotCount: new Set(rows.map((r) => r.lotId)).size,
    },
  };
}
