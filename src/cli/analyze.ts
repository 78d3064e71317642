#!/usr/bin/env tsx
/**
 * CLI: analyze
 *
 * Usage: npm run analyze -- --file <measurements.csv|.xlsx> [--target-low 900]
 *          [--out lot_report.csv] [--risky-only] [--synonyms extra.json]
 *
 * Reads a measurement table, scores every lot and prints the risk-sorted
 * lot list. With --out, writes the full lot report as CSV.
 */

import { readFileSync, writeFileSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { readTable } from "../ingest/table_reader.js";
import { loadSynonymExtension, type SynonymExtension } from "../ingest/synonyms.js";
import {
  analyzeRecords,
  describeStatusCounts,
  describeSummary,
  filterByStatus,
  sortByRisk,
} from "../report/analysis.js";
import { toLotReportCsv } from "../report/export.js";
import { sha256Bytes } from "../shared/hash.js";
import { parseTargetLow } from "../shared/run_config.js";
import type { ScoredLot } from "../shared/types.js";

export interface AnalyzeArgs {
  file: string;
  targetLow?: string;
  out?: string;
  riskyOnly: boolean;
  synonyms?: string;
}

const USAGE =
  "Usage: npm run analyze -- --file <measurements.csv|.xlsx> [--target-low 900] [--out lot_report.csv] [--risky-only] [--synonyms extra.json]";

export function parseArgs(args: string[]): AnalyzeArgs {
  const parsed: AnalyzeArgs = { file: "", riskyOnly: false };
  for (let i = 0; i < args.length; i++) {
    const next = args[i + 1];
    switch (args[i]) {
      case "--file":
        if (next !== undefined) parsed.file = next;
        i++;
        break;
      case "--target-low":
        parsed.targetLow = next;
        i++;
        break;
      case "--out":
        parsed.out = next;
        i++;
        break;
      case "--synonyms":
        parsed.synonyms = next;
        i++;
        break;
      case "--risky-only":
        parsed.riskyOnly = true;
        break;
    }
  }
  return parsed;
}

function fmt(value: number, decimals: number): string {
  return value.toFixed(decimals);
}

/** Fixed-width lot table, one line per lot */
export function formatLotTable(lots: ScoredLot[]): string[] {
  const header = ["LOT", "N", "ORT", "STD", "MIN", "MAX", "TREND/DAY", "RISK", "STATUS"];
  const rows = lots.map((l) => [
    l.lotId,
    String(l.n),
    fmt(l.mean, 1),
    fmt(l.std, 2),
    fmt(l.min, 1),
    fmt(l.max, 1),
    l.trend === null ? "-" : fmt(l.trend, 3),
    String(l.riskScore),
    l.status,
  ]);
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((r) => r[i].length)));
  return [header, ...rows].map((cells) => cells.map((c, i) => c.padEnd(widths[i])).join("  ").trimEnd());
}

function main() {
  const args = parseArgs(process.argv.slice(2));

  if (!args.file) {
    console.error(USAGE);
    process.exit(1);
  }

  try {
    const targetLow = parseTargetLow(args.targetLow, process.env.TARGET_LOW);
    let synonyms: SynonymExtension | undefined;
    if (args.synonyms) {
      synonyms = loadSynonymExtension(JSON.parse(readFileSync(args.synonyms, "utf-8")));
    }

    const buffer = readFileSync(args.file);
    const table = readTable(buffer, path.basename(args.file));
    const report = analyzeRecords(table.records, { targetLow, headers: table.headers, synonyms });

    console.log();
    console.log(`  File:        ${args.file}`);
    console.log(`  SHA-256:     ${sha256Bytes(buffer).slice(0, 16)}...`);
    console.log(`  Target low:  ${targetLow}`);
    console.log(`  Reference:   mean ${fmt(report.reference.referenceMean, 2)}, std ${fmt(report.reference.referenceStd, 2)}`);
    console.log(`  ${describeSummary(report.summary)}`);
    console.log(`  ${describeStatusCounts(report.summary)}`);
    console.log();

    let view = sortByRisk(report.lots);
    if (args.riskyOnly) view = filterByStatus(view, "RISKY");

    if (view.length === 0) {
      console.log(args.riskyOnly ? "  No RISKY lots." : "  No lots.");
    } else {
      for (const line of formatLotTable(view)) console.log(`  ${line}`);
      console.log();
      for (const lot of view) {
        if (lot.status !== "SAFE") console.log(`  ${lot.lotId}: ${lot.recommendation}`);
      }
    }

    if (args.out) {
      writeFileSync(args.out, toLotReportCsv(report.lots));
      console.log();
      console.log(`  Lot report written: ${args.out}`);
    }

    console.log();
    console.log("  ✓ Analysis complete.");
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\n  ✗ Analysis failed: ${message}`);
    process.exit(1);
  }
}

// ── CLI entry point ──────────────────────────────────────────────────
if (
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))
) {
  main();
}
