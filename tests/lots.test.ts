import { describe, it, expect } from "vitest";
import {
  linearSlope,
  maxOf,
  mean,
  minOf,
  roundHalfEven,
  sampleStdDev,
} from "../src/analytics/stats.js";
import {
  aggregateLot,
  aggregateLots,
  computeReferenceStats,
  groupByLot,
  lotTrend,
} from "../src/analytics/lots.js";
import type { CleanRow } from "../src/shared/types.js";

const DAY = 86_400_000;
const T0 = Date.UTC(2024, 0, 1);

function row(lotId: string, dayOffset: number, strength: number): CleanRow {
  return { lotId, timestamp: new Date(T0 + dayOffset * DAY), strength };
}

describe("Statistics", () => {
  it("mean of empty array is 0", () => {
    expect(mean([])).toBe(0);
  });

  it("mean calculates correctly", () => {
    expect(mean([950, 930])).toBe(940);
    expect(mean([10, 20, 30])).toBe(20);
  });

  it("sampleStdDev uses the n − 1 divisor", () => {
    expect(sampleStdDev([950, 930])).toBeCloseTo(Math.sqrt(200), 10);
    expect(sampleStdDev([950, 930, 910])).toBe(20);
  });

  it("sampleStdDev of a single value is 0", () => {
    expect(sampleStdDev([5])).toBe(0);
    expect(sampleStdDev([])).toBe(0);
  });

  it("minOf / maxOf", () => {
    expect(minOf([3, 1, 2])).toBe(1);
    expect(maxOf([3, 1, 2])).toBe(3);
  });

  it("linearSlope fits a first-degree least-squares line", () => {
    expect(linearSlope([0, 10], [950, 930])).toBe(-2);
    expect(linearSlope([0, 1, 2], [960, 955, 965])).toBe(2.5);
  });

  it("linearSlope is null without spread in x or with fewer than 2 points", () => {
    expect(linearSlope([3, 3], [1, 2])).toBeNull();
    expect(linearSlope([1], [1])).toBeNull();
  });

  it("linearSlope rejects mismatched inputs", () => {
    expect(() => linearSlope([1, 2], [1])).toThrow(/length mismatch/);
  });

  it("roundHalfEven rounds ties to the even neighbour", () => {
    expect(roundHalfEven(47.5)).toBe(48);
    expect(roundHalfEven(46.5)).toBe(46);
    expect(roundHalfEven(0.5)).toBe(0);
    expect(roundHalfEven(1.5)).toBe(2);
    expect(roundHalfEven(16.07)).toBe(16);
    expect(roundHalfEven(99.6)).toBe(100);
  });

  it("mean and sampleStdDev stay finite for values near the float limit", () => {
    const huge = [1e308, 1e308, 1e308];
    expect(mean(huge)).toBeCloseTo(1e308, -300);
    expect(Number.isFinite(sampleStdDev(huge))).toBe(true);
    expect(mean([1.5e308, 1.5e308])).toBe(1.5e308);
    expect(sampleStdDev([1.5e308, -1.5e308])).toBe(Infinity);
  });
});

describe("Lot aggregation", () => {
  it("aggregates a two-point lot with a downward trend", () => {
    const agg = aggregateLot("A1", [row("A1", 0, 950), row("A1", 10, 930)]);
    expect(agg.lotId).toBe("A1");
    expect(agg.n).toBe(2);
    expect(agg.mean).toBe(940);
    expect(agg.std).toBeCloseTo(14.1421356, 6);
    expect(agg.min).toBe(930);
    expect(agg.max).toBe(950);
    expect(agg.periodStart.toISOString()).toBe("2024-01-01T00:00:00.000Z");
    expect(agg.periodEnd.toISOString()).toBe("2024-01-11T00:00:00.000Z");
    expect(agg.trend).toBeCloseTo(-2, 10);
  });

  it("a single measurement has zero spread and no trend", () => {
    const agg = aggregateLot("B2", [row("B2", 0, 850)]);
    expect(agg.std).toBe(0);
    expect(agg.trend).toBeNull();
    expect(agg.periodStart.getTime()).toBe(agg.periodEnd.getTime());
  });

  it("measurements sharing one instant have no trend", () => {
    expect(lotTrend([row("X", 3, 900), row("X", 3, 920)])).toBeNull();
  });

  it("measures elapsed time in fractional days", () => {
    expect(lotTrend([row("X", 0, 900), row("X", 0.5, 901)])).toBeCloseTo(2, 10);
  });

  it("measures elapsed time from the lot's earliest timestamp", () => {
    expect(lotTrend([row("X", 10, 930), row("X", 0, 950)])).toBeCloseTo(-2, 10);
  });

  it("rejects an empty lot", () => {
    expect(() => aggregateLot("E", [])).toThrow(/has no rows/);
  });

  it("groups lots in order of first appearance", () => {
    const rows = [row("B", 0, 900), row("A", 0, 910), row("B", 1, 905)];
    expect([...groupByLot(rows).keys()]).toEqual(["B", "A"]);
    const aggs = aggregateLots(rows);
    expect(aggs.map((a) => [a.lotId, a.n])).toEqual([
      ["B", 2],
      ["A", 1],
    ]);
  });

  it("n and extremes match the lot's rows exactly", () => {
    const rows = [row("C3", 0, 960), row("C3", 1, 955), row("C3", 2, 965)];
    const [agg] = aggregateLots(rows);
    expect(agg.n).toBe(3);
    expect(agg.mean).toBe(960);
    expect(agg.std).toBe(5);
    expect(agg.min).toBe(955);
    expect(agg.max).toBe(965);
    expect(agg.trend).toBeCloseTo(2.5, 10);
  });
});

describe("Reference statistics", () => {
  it("uses every row of the table", () => {
    const ref = computeReferenceStats([row("A", 0, 950), row("B", 0, 930), row("C", 0, 910)]);
    expect(ref).toEqual({ referenceMean: 930, referenceStd: 20, rowCount: 3 });
  });

  it("falls back to a spread of 1.0 with fewer than two rows", () => {
    expect(computeReferenceStats([row("A", 0, 850)])).toEqual({
      referenceMean: 850,
      referenceStd: 1,
      rowCount: 1,
    });
    expect(computeReferenceStats([])).toEqual({ referenceMean: 0, referenceStd: 1, rowCount: 0 });
  });

  it("keeps a zero spread for identical values", () => {
    const ref = computeReferenceStats([row("A", 0, 900), row("A", 1, 900)]);
    expect(ref.referenceStd).toBe(0);
  });
});
