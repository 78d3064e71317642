/**
 * Column Name Synonym Dictionary
 *
 * Maps alternative spellings of measurement-table headers onto the three
 * canonical columns. Keys are compared after trim + uppercase, so entries
 * are written in upper case. `toUpperCase` maps a typed `i` to `I`, never
 * `İ`, so Turkish headers need the dotless spelling as well. New locales are added here (or through an
 * extension file), never in the resolver.
 */

import { z } from "zod";
import type { CanonicalColumn } from "../shared/types.js";

export const REQUIRED_COLUMNS: CanonicalColumn[] = ["LOT", "DATE", "STRENGTH"];

/** Synonyms grouped by canonical column name. */
export const COLUMN_SYNONYMS: Record<CanonicalColumn, string[]> = {
  // ── Lot / batch identifier ─────────────────────────────────────────
  LOT: [
    "LOT NO",
    "LOT_NO",
    "LOT_ID",
    "LOT NUMBER",
    "BATCH",
    "BATCH NO",
    "BATCH_NO",
    "BATCH NUMBER",
    "PARTI",
    "PARTİ",
    "PARTI NO",
  ],

  // ── Measurement date ───────────────────────────────────────────────
  DATE: [
    "TARIH",
    "TARİH",
    "OLCUM TARIHI",
    "ÖLÇÜM TARİHİ",
    "ÖLÇÜM TARIHI",
    "TIMESTAMP",
    "MEASUREMENT_DATE",
    "MEASUREMENT DATE",
    "TEST_DATE",
  ],

  // ── Tensile strength ───────────────────────────────────────────────
  STRENGTH: [
    "CEKME_DAYANIMI",
    "ÇEKME_DAYANIMI",
    "CEKME DAYANIMI",
    "ÇEKME DAYANIMI",
    "TENSILE_STRENGTH",
    "TENSILE STRENGTH",
    "UTS",
    "RM",
  ],
};

/** Caller-supplied spellings, merged on top of the built-in table. */
export const SynonymExtensionSchema = z
  .object({
    LOT: z.array(z.string().min(1)).optional(),
    DATE: z.array(z.string().min(1)).optional(),
    STRENGTH: z.array(z.string().min(1)).optional(),
  })
  .strict();

export type SynonymExtension = z.infer<typeof SynonymExtensionSchema>;

/**
 * Normalize a header for lookup: trim surrounding whitespace, upper-case.
 */
export function normalizeColumnName(name: string): string {
  return name.trim().toUpperCase();
}

/**
 * Build a reverse lookup: normalized spelling → canonical column.
 * Each canonical name maps to itself.
 */
export function buildReverseSynonymMap(
  extra: SynonymExtension = {}
): Map<string, CanonicalColumn> {
  const reverseMap = new Map<string, CanonicalColumn>();
  for (const canonical of REQUIRED_COLUMNS) {
    reverseMap.set(canonical, canonical);
    const spellings = [...COLUMN_SYNONYMS[canonical], ...(extra[canonical] ?? [])];
    for (const synonym of spellings) {
      reverseMap.set(normalizeColumnName(synonym), canonical);
    }
  }
  return reverseMap;
}

/**
 * Validate a parsed synonym extension (e.g. the contents of a JSON file).
 */
export function loadSynonymExtension(raw: unknown): SynonymExtension {
  const parsed = SynonymExtensionSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new Error(`Invalid synonym extension: ${issues.join("; ")}`);
  }
  return parsed.data;
}
