import * as fs from "fs";
import * as path from "path";
import * as XLSX from "xlsx";
import { OutputRecord } from "./types";
import { resolveUniquePath } from "./core/utils";

/** Column order of the output sheet */
export const OUTPUT_COLUMNS: (keyof OutputRecord & string)[] = [
  "url",
  "traffic",
  "comment_count",
];

const SHEET_NAME = "Sheet1";

/**
 * Write enriched rows to a new spreadsheet without overwriting an existing
 * one: "output.xlsx" becomes "output_1.xlsx", "output_2.xlsx", ... when taken.
 * Write errors are not caught.
 * @param records - Rows in input order
 * @param desiredPath - Preferred output path
 * @param exists - Tells whether a path is taken (defaults to the filesystem)
 * @returns Path of the written file
 */
export function exportResults(
  records: OutputRecord[],
  desiredPath: string,
  exists: (candidate: string) => boolean = fs.existsSync
): string {
  const filePath = resolveUniquePath(desiredPath, exists);
  fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });

  const ws = XLSX.utils.json_to_sheet(records, { header: OUTPUT_COLUMNS });
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, ws, SHEET_NAME);
  XLSX.writeFile(wb, filePath);

  return filePath;
}
