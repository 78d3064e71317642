/**
 * Analysis upload handling, independent of express so it can be
 * exercised without a socket.
 */

import { readTable } from "../ingest/table_reader.js";
import { analyzeRecords } from "../report/analysis.js";
import { toLotReportCsv } from "../report/export.js";
import { InputError, MissingColumnsError } from "../shared/errors.js";
import { sha256Bytes } from "../shared/hash.js";
import { parseTargetLow } from "../shared/run_config.js";
import type { AnalysisReport, CanonicalColumn, ScoredLot } from "../shared/types.js";

export interface UploadedFile {
  buffer: Buffer;
  originalname: string;
}

export interface AnalyzeRequest {
  file?: UploadedFile;
  targetLow?: string;
  format?: string;
}

export interface ErrorBody {
  error: string;
  missing?: CanonicalColumn[];
  required?: CanonicalColumn[];
}

export type AnalyzeResponse =
  | { status: number; kind: "json"; body: AnalyzeResponseBody | ErrorBody }
  | { status: number; kind: "csv"; fileName: string; body: string };

export interface AnalyzeResponseBody {
  runId: string;
  fileName: string;
  sha256: string;
  targetLow: number;
  reference: AnalysisReport["reference"];
  summary: AnalysisReport["summary"];
  lots: ScoredLot[];
}

/**
 * Handle one analysis upload: missing file, bad target and unsupported
 * file type are 400s, as is a table without the required columns.
 */
export function handleAnalyzeUpload(req: AnalyzeRequest, defaultTargetLow: number): AnalyzeResponse {
  const { file } = req;
  if (!file) {
    return { status: 400, kind: "json", body: { error: "No file uploaded" } };
  }

  try {
    const targetLow = parseTargetLow(req.targetLow, String(defaultTargetLow));
    const table = readTable(file.buffer, file.originalname);
    const report = analyzeRecords(table.records, { targetLow, headers: table.headers });

    if (req.format === "csv") {
      return { status: 200, kind: "csv", fileName: "lot_report.csv", body: toLotReportCsv(report.lots) };
    }

    const body: AnalyzeResponseBody = {
      runId: report.runId,
      fileName: file.originalname,
      sha256: sha256Bytes(file.buffer),
      targetLow: report.targetLow,
      reference: report.reference,
      summary: report.summary,
      lots: report.lots,
    };
    return { status: 200, kind: "json", body };
  } catch (err: unknown) {
    if (err instanceof MissingColumnsError) {
      return {
        status: 400,
        kind: "json",
        body: { error: err.message, missing: err.missing, required: err.required },
      };
    }
    if (err instanceof InputError) {
      return { status: 400, kind: "json", body: { error: err.message } };
    }
    const message = err instanceof Error ? err.message : String(err);
    return { status: 500, kind: "json", body: { error: message } };
  }
}
