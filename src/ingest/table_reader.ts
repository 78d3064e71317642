import path from "path";
import { parse } from "csv-parse/sync";
import * as XLSX from "xlsx";
import { InputError } from "../shared/errors.js";
import type { RawRecord } from "../shared/types.js";

export interface RawTable {
  headers: string[];
  records: RawRecord[];
}

const WORKBOOK_EXTENSIONS = new Set([".xlsx", ".xls"]);

/**
 * Read an uploaded measurement file into raw records.
 * CSV files and Excel workbooks (first sheet) are supported.
 */
export function readTable(fileBuffer: Buffer, fileName: string): RawTable {
  const ext = path.extname(fileName).toLowerCase();
  if (ext === ".csv") return readCsv(fileBuffer);
  if (WORKBOOK_EXTENSIONS.has(ext)) return readWorkbook(fileBuffer);
  const kind = ext === "" ? "(no extension)" : ext;
  throw new InputError(`Unsupported file type ${kind}: upload a .csv, .xlsx or .xls file`);
}

function readCsv(fileBuffer: Buffer): RawTable {
  let headers: string[] = [];
  const records: RawRecord[] = parse(fileBuffer.toString("utf-8"), {
    bom: true,
    columns: (header: string[]) => {
      headers = header;
      return header;
    },
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  });

  return { headers, records };
}

// ── Workbooks ────────────────────────────────────────────────────────

function readWorkbook(fileBuffer: Buffer): RawTable {
  const workbook = XLSX.read(fileBuffer, { type: "buffer", cellDates: true });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw new InputError("Workbook contains no sheets");
  }

  // Header text as sheet_to_json writes it into the record keys
  const [headerRow = []] = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: false,
    blankrows: false,
  });
  const headers = Array.from(headerRow, (cell) => (cell == null ? "" : String(cell)));

  const records = XLSX.utils
    .sheet_to_json<RawRecord>(sheet, { defval: null, blankrows: false })
    .map(wallClockDates);

  return { headers, records };
}

/**
 * SheetJS builds date cells as local-time instants. Re-read their wall
 * clock as UTC, the convention for zone-less text dates.
 */
function wallClockDates(record: RawRecord): RawRecord {
  const out: RawRecord = {};
  for (const [key, value] of Object.entries(record)) {
    out[key] =
      value instanceof Date
        ? new Date(
            Date.UTC(
              value.getFullYear(),
              value.getMonth(),
              value.getDate(),
              value.getHours(),
              value.getMinutes(),
              value.getSeconds(),
              value.getMilliseconds()
            )
          )
        : value;
  }
  return out;
}
