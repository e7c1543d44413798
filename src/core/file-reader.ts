import * as fs from "fs";
import * as path from "path";
import * as XLSX from "xlsx";
import { InputRecord, TrafficValue } from "../types";
import {
  InputNotFoundError,
  MissingColumnError,
  UnsupportedFileTypeError,
} from "../errors";

export const URL_COLUMN = "URL";
export const TRAFFIC_COLUMN = "Traffic with commercial intents in top 20";

const REQUIRED_COLUMNS = [URL_COLUMN, TRAFFIC_COLUMN];
const SUPPORTED_EXTENSIONS = [".csv", ".xlsx", ".xls"];

/**
 * Read URL/traffic rows from a CSV or XLSX export.
 * Throws a SetupError subclass when the file is missing, of an unknown
 * type, or lacks one of the required columns.
 * @param filePath  Absolute or relative path to the file.
 */
export function readInputRecords(filePath: string): InputRecord[] {
  if (!fs.existsSync(filePath)) {
    throw new InputNotFoundError(filePath);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (!SUPPORTED_EXTENSIONS.includes(ext)) {
    throw new UnsupportedFileTypeError(ext);
  }

  const rows = readSheetRows(filePath, ext);
  const headers = (rows[0] ?? []).map((h) => String(h ?? ""));

  const missing = REQUIRED_COLUMNS.filter((col) => !headers.includes(col));
  if (missing.length > 0) {
    throw new MissingColumnError(missing);
  }

  const urlIdx = headers.indexOf(URL_COLUMN);
  const trafficIdx = headers.indexOf(TRAFFIC_COLUMN);

  const records: InputRecord[] = [];
  for (let i = 1; i < rows.length; i++) {
    const row = rows[i];
    records.push({
      url: String(row[urlIdx] ?? ""),
      traffic: toTrafficValue(row[trafficIdx], ext === ".csv"),
    });
  }
  return records;
}

// ── Internals ────────────────────────────────────────────────────────────────

/**
 * First sheet as an array of rows; the first row holds the headers.
 * CSV is decoded as UTF-8 and parsed without value guessing, so cells keep
 * the exact text of the file.
 */
function readSheetRows(filePath: string, ext: string): unknown[][] {
  let wb: XLSX.WorkBook;
  if (ext === ".csv") {
    const raw = fs.readFileSync(filePath, "utf-8");
    // Strip BOM if present
    const text = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;
    wb = XLSX.read(text, { type: "string", raw: true });
  } else {
    wb = XLSX.readFile(filePath);
  }

  const sheetName = wb.SheetNames[0];
  if (sheetName === undefined) return [];

  return XLSX.utils.sheet_to_json<unknown[]>(wb.Sheets[sheetName], {
    header: 1,
    blankrows: false,
  });
}

/** CSV carries no cell types: only a plain decimal number is read as one. */
const CSV_NUMBER = /^-?\d+(\.\d+)?$/;

/** Traffic cell as read; only an empty cell becomes null. */
function toTrafficValue(cell: unknown, fromCsv: boolean): TrafficValue {
  if (cell === undefined || cell === null || cell === "") return null;
  if (typeof cell === "number" || typeof cell === "boolean") return cell;
  const text = String(cell);
  if (fromCsv && CSV_NUMBER.test(text)) return Number(text);
  return text;
}
