import { describe, it, expect } from "vitest";
import {
  LOT_REPORT_COLUMNS,
  formatTimestamp,
  lotReportRow,
  reportFingerprint,
  toLotReportCsv,
} from "../src/report/export.js";
import type { ScoredLot } from "../src/shared/types.js";

function scored(overrides: Partial<ScoredLot> = {}): ScoredLot {
  return {
    lotId: "A1",
    n: 2,
    mean: 940,
    std: 14.5,
    min: 930,
    max: 950,
    periodStart: new Date("2024-01-01T00:00:00Z"),
    periodEnd: new Date("2024-01-11T06:30:00Z"),
    trend: -2,
    riskScore: 16,
    status: "SAFE",
    recommendation: "continue normal production.",
    breakdown: { level: 0, variability: 7.25, trend: 4, sampleSize: 5, raw: 16.25, score: 16 },
    ...overrides,
  };
}

describe("formatTimestamp", () => {
  it("omits midnight times", () => {
    expect(formatTimestamp(new Date("2024-03-05T00:00:00Z"))).toBe("2024-03-05");
  });

  it("keeps other times to the second", () => {
    expect(formatTimestamp(new Date("2024-03-05T14:30:15.250Z"))).toBe("2024-03-05 14:30:15");
  });
});

describe("Lot report CSV", () => {
  it("has a stable column set", () => {
    expect(LOT_REPORT_COLUMNS).toEqual([
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
    ]);
  });

  it("writes a BOM, a header line and one line per lot", () => {
    const csv = toLotReportCsv([scored()]);
    expect(csv.startsWith("\uFEFF")).toBe(true);
    const lines = csv.slice(1).split("\n");
    expect(lines).toEqual([
      "LOT,N,ORT,STD,MIN,MAX,PERIOD_START,PERIOD_END,TREND_PER_DAY,RISK_SCORE,STATUS,RECOMMENDATION",
      "A1,2,940,14.5,930,950,2024-01-01,2024-01-11 06:30:00,-2,16,SAFE,continue normal production.",
      "",
    ]);
  });

  it("leaves the trend cell empty when no trend exists", () => {
    expect(lotReportRow(scored({ trend: null })).TREND_PER_DAY).toBe("");
  });

  it("quotes values containing delimiters or quotes", () => {
    const row = toLotReportCsv([scored({ lotId: 'A,"1"' })]).split("\n")[1];
    expect(row.startsWith('"A,""1""",2,')).toBe(true);
  });

  it("writes only the header for an empty report", () => {
    expect(toLotReportCsv([])).toBe(
      "\uFEFFLOT,N,ORT,STD,MIN,MAX,PERIOD_START,PERIOD_END,TREND_PER_DAY,RISK_SCORE,STATUS,RECOMMENDATION\n"
    );
  });
});

describe("reportFingerprint", () => {
  it("is stable for equal tables and changes with content", () => {
    expect(reportFingerprint([scored()])).toBe(reportFingerprint([scored()]));
    expect(reportFingerprint([scored()])).not.toBe(reportFingerprint([scored({ riskScore: 17 })]));
    expect(reportFingerprint([scored()])).toMatch(/^[a-f0-9]{64}$/);
  });
});
