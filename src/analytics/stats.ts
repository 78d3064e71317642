/**
 * Calculate arithmetic mean of an array of numbers.
 */
export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  const sum = values.reduce((a, b) => a + b, 0);
  if (Number.isFinite(sum)) return sum / values.length;
  // Sum overflowed: average the scaled values instead.
  const n = values.length;
  return values.reduce((a, b) => a + b / n, 0);
}

/**
 * Calculate sample standard deviation (n − 1 divisor).
 * Fewer than two values have no spread: returns 0.
 */
export function sampleStdDev(values: number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const diffs = values.map((v) => v - avg);
  const sumSq = diffs.reduce((a, d) => a + d * d, 0);
  if (Number.isFinite(sumSq)) return Math.sqrt(sumSq / (values.length - 1));
  // Squares overflowed: rescale by the largest deviation.
  const scale = diffs.reduce((a, d) => Math.max(a, Math.abs(d)), 0);
  if (!Number.isFinite(scale)) return Infinity;
  const scaledSq = diffs.reduce((a, d) => a + (d / scale) ** 2, 0);
  return scale * Math.sqrt(scaledSq / (values.length - 1));
}

/** Smallest value; Infinity for an empty array */
export function minOf(values: number[]): number {
  return values.reduce((a, b) => (b < a ? b : a), Infinity);
}

export function maxOf(values: number[]): number {
  return values.reduce((a, b) => (b > a ? b : a), -Infinity);
}

/**
 * Ordinary least-squares slope of y against x (first-degree fit).
 * Returns null for fewer than two points or when x has no spread.
 */
export function linearSlope(xs: number[], ys: number[]): number | null {
  if (xs.length !== ys.length) {
    throw new Error(`linearSlope: length mismatch (${xs.length} x, ${ys.length} y)`);
  }
  if (xs.length < 2) return null;

  const xBar = mean(xs);
  const yBar = mean(ys);
  let sxy = 0;
  let sxx = 0;
  for (let i = 0; i < xs.length; i++) {
    const dx = xs[i] - xBar;
    sxy += dx * (ys[i] - yBar);
    sxx += dx * dx;
  }
  if (sxx === 0) return null;
  return sxy / sxx;
}

/**
 * Round to the nearest integer, ties to even (47.5 → 48, 46.5 → 46).
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff < 0.5) return floor;
  if (diff > 0.5) return floor + 1;
  return floor % 2 === 0 ? floor : floor + 1;
}
