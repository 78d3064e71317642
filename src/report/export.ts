/**
 * Lot report export — delimited text with a stable column set.
 */

import type { ScoredLot } from "../shared/types.js";
import { contentHash } from "../shared/hash.js";

export const LOT_REPORT_COLUMNS = [
  "LOT",
  "N",
  "ORT",
  "STD",
  "MIN",
  "MAX",
  "PERIOD_START",
  "PERIOD_END",
  "TREND_PER_DAY",
  "RISK_SCORE",
  "STATUS",
  "RECOMMENDATION",
] as const;

export type LotReportColumn = (typeof LOT_REPORT_COLUMNS)[number];

/** UTF-8 with signature */
const UTF8_BOM = "\uFEFF";

/**
 * `YYYY-MM-DD` at midnight UTC, `YYYY-MM-DD HH:MM:SS` otherwise.
 */
export function formatTimestamp(date: Date): string {
  const iso = date.toISOString();
  const day = iso.slice(0, 10);
  const time = iso.slice(11, 19);
  return time === "00:00:00" ? day : `${day} ${time}`;
}

function quoteCsv(val: string): string {
  if (val.includes(",") || val.includes('"') || val.includes("\n") || val.includes("\r")) {
    return `"${val.replace(/"/g, '""')}"`;
  }
  return val;
}

export function lotReportRow(lot: ScoredLot): Record<LotReportColumn, string> {
  return {
    LOT: lot.lotId,
    N: String(lot.n),
    ORT: String(lot.mean),
    STD: String(lot.std),
    MIN: String(lot.min),
    MAX: String(lot.max),
    PERIOD_START: formatTimestamp(lot.periodStart),
    PERIOD_END: formatTimestamp(lot.periodEnd),
    TREND_PER_DAY: lot.trend === null ? "" : String(lot.trend),
    RISK_SCORE: String(lot.riskScore),
    STATUS: lot.status,
    RECOMMENDATION: lot.recommendation,
  };
}

/**
 * Render scored lots as CSV (BOM, header line, one line per lot).
 */
export function toLotReportCsv(lots: ScoredLot[]): string {
  const lines = [
    LOT_REPORT_COLUMNS.join(","),
    ...lots.map((lot) => {
      const row = lotReportRow(lot);
      return LOT_REPORT_COLUMNS.map((c) => quoteCsv(row[c])).join(",");
    }),
  ];
  return UTF8_BOM + lines.join("\n") + "\n";
}

/** SHA-256 over the canonical JSON of the scored lots */
export function reportFingerprint(lots: ScoredLot[]): string {
  return contentHash(lots);
}
