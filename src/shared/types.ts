/** Canonical measurement columns every input table must resolve to */
export type CanonicalColumn = "LOT" | "DATE" | "STRENGTH";

/** Qualitative lot status, lowest to highest risk */
export type LotStatus = "SAFE" | "WATCH" | "RISKY";

/** One input record as handed over by the file reader: arbitrary headers, untyped values */
export type RawRecord = Record<string, unknown>;

/** A fully-typed measurement row that survived coercion */
export interface CleanRow {
  lotId: string;
  timestamp: Date;
  strength: number;
}

/** Descriptive statistics for one lot */
export interface LotAggregate {
  lotId: string;
  n: number;
  mean: number;
  /** Sample standard deviation (n−1); 0 for a single measurement */
  std: number;
  min: number;
  max: number;
  periodStart: Date;
  periodEnd: Date;
  /** Strength units per day; null when no trend can be fitted */
  trend: number | null;
}

/** Global baseline computed once per analysis run */
export interface ReferenceStats {
  referenceMean: number;
  referenceStd: number;
  rowCount: number;
}

/** Individual risk components before clamping and rounding */
export interface RiskBreakdown {
  level: number;
  variability: number;
  trend: number;
  sampleSize: number;
  /** Sum of the four components, unclamped */
  raw: number;
  /** Clamped to [0, 100] and rounded to an integer */
  score: number;
}

/** Lot aggregate with its risk score, status and recommendation */
export interface ScoredLot extends LotAggregate {
  riskScore: number;
  status: LotStatus;
  recommendation: string;
  breakdown: RiskBreakdown;
}

/** Row/lot counts reported after ingestion */
export interface IngestSummary {
  inputRows: number;
  acceptedRows: number;
  droppedRows: number;
  lotCount: number;
}

export interface AnalysisSummary extends IngestSummary {
  statusCounts: Record<LotStatus, number>;
}

/** Result of one full analysis run */
export interface AnalysisReport {
  runId: string;
  targetLow: number;
  reference: ReferenceStats;
  rows: CleanRow[];
  lots: ScoredLot[];
  summary: AnalysisSummary;
}
