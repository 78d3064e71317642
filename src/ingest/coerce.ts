/**
 * Cell coercion for measurement tables.
 *
 * Every parser returns null for a value it cannot read; rows holding a null
 * in a required field are dropped by the normalizer.
 */

// ── Date Parsing ─────────────────────────────────────────────────────

const ISO_RE =
  /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;
const YMD_RE = /^(\d{4})[/.](\d{1,2})[/.](\d{1,2})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;
const DMY_RE = /^(\d{1,2})[./-](\d{1,2})[./-](\d{4}|\d{2})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

interface DateParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

function toUtcMillis(p: DateParts): number | null {
  if (p.month < 1 || p.month > 12) return null;
  if (p.day < 1 || p.day > daysInMonth(p.year, p.month)) return null;
  if (p.hour > 23 || p.minute > 59 || p.second > 59) return null;
  const d = new Date(0);
  d.setUTCFullYear(p.year, p.month - 1, p.day);
  d.setUTCHours(p.hour, p.minute, p.second, p.millisecond);
  return d.getTime();
}

function num(s: string | undefined): number {
  return s === undefined ? 0 : Number(s);
}

/** "+03:00" / "-0530" / "Z" → offset in minutes east of UTC */
function offsetMinutes(zone: string | undefined): number {
  if (!zone || zone.toUpperCase() === "Z") return 0;
  const sign = zone.startsWith("-") ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2)));
}

function parseIso(m: RegExpExecArray): number | null {
  const fraction = m[7] ?? "";
  const millis = toUtcMillis({
    year: num(m[1]),
    month: num(m[2]),
    day: num(m[3]),
    hour: num(m[4]),
    minute: num(m[5]),
    second: num(m[6]),
    millisecond: fraction ? Number(fraction.slice(0, 3).padEnd(3, "0")) : 0,
  });
  if (millis === null) return null;
  return millis - offsetMinutes(m[8]) * 60_000;
}

/**
 * Parse a measurement date, reading ambiguous numeric dates day-first.
 *
 * Accepts `DD.MM.YYYY`, `DD/MM/YYYY`, `DD-MM-YYYY` (two-digit years are
 * read as 20YY), ISO `YYYY-MM-DD` with optional time and zone, and
 * `YYYY/MM/DD`. A day-first reading that is not a calendar date falls back
 * to month-first (`03/25/2024` → 25 March). Wall-clock values without a
 * zone are taken as UTC.
 */
export function parseMeasurementDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : new Date(value.getTime());
  }
  if (typeof value !== "string") return null;
  const v = value.trim();
  if (v === "") return null;

  const iso = ISO_RE.exec(v);
  if (iso) {
    const millis = parseIso(iso);
    return millis === null ? null : new Date(millis);
  }

  const ymd = YMD_RE.exec(v);
  if (ymd) {
    const millis = toUtcMillis({
      year: num(ymd[1]),
      month: num(ymd[2]),
      day: num(ymd[3]),
      hour: num(ymd[4]),
      minute: num(ymd[5]),
      second: num(ymd[6]),
      millisecond: 0,
    });
    return millis === null ? null : new Date(millis);
  }

  const dmy = DMY_RE.exec(v);
  if (dmy) {
    const rawYear = dmy[3];
    const year = rawYear.length === 2 ? 2000 + Number(rawYear) : Number(rawYear);
    const time = { hour: num(dmy[4]), minute: num(dmy[5]), second: num(dmy[6]), millisecond: 0 };
    const dayFirst = toUtcMillis({ year, month: num(dmy[2]), day: num(dmy[1]), ...time });
    if (dayFirst !== null) return new Date(dayFirst);
    const monthFirst = toUtcMillis({ year, month: num(dmy[1]), day: num(dmy[2]), ...time });
    return monthFirst === null ? null : new Date(monthFirst);
  }

  return null;
}

// ── Numeric Parsing ──────────────────────────────────────────────────

const NUMBER_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

/**
 * Parse a strength value as a finite float. Strings must be a complete
 * decimal or scientific literal (surrounding whitespace allowed).
 */
export function parseStrength(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== "string") return null;
  const v = value.trim();
  if (!NUMBER_RE.test(v)) return null;
  const parsed = Number(v);
  return Number.isFinite(parsed) ? parsed : null;
}

// ── Identifier Coercion ──────────────────────────────────────────────

/**
 * Coerce a lot identifier to trimmed text; empty identifiers are null.
 */
export function parseLotId(value: unknown): string | null {
  let text: string;
  if (typeof value === "string") {
    text = value;
  } else if (typeof value === "number" && Number.isFinite(value)) {
    text = String(value);
  } else if (typeof value === "bigint") {
    text = value.toString();
  } else {
    return null;
  }
  const trimmed = text.trim();
  return trimmed === "" ? null : trimmed;
}
