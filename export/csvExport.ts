// ─────────────────────────────────────────────────────────────
// CSV Export — Result rows & failed-file lists
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import Papa from "papaparse";
import { Logger } from "../logging/logger";
import { AssayCategory, FailedFile, RESULT_COLUMNS, ResultRowMap, ResultSet } from "../schema/resultSchema";

export const FAILED_FILENAME = "failed_filenames.csv";

/**
 * Serialize rows with a fixed column order. The header is always
 * written, even with no rows. Lists are space-separated, null is "".
 */
export function toCsv<T>(
  columns: readonly (keyof T & string)[],
  rows: readonly T[]
): string {
  const data = rows.map((row) => columns.map((col) => formatCell(row[col])));
  return Papa.unparse({ fields: [...columns], data }, { newline: "\n" });
}

export function resultsToCsv<C extends AssayCategory>(result: ResultSet<C>): string {
  return toCsv<ResultRowMap[C]>(RESULT_COLUMNS[result.category], result.rows);
}

export function failedToCsv(failed: readonly FailedFile[]): string {
  return toCsv(
    ["failed_filenames", "reason"],
    failed.map((f) => ({ failed_filenames: f.filename, reason: f.reason }))
  );
}

/**
 * Write the results CSV and, beside it, the failed-files CSV.
 * Returns both paths.
 */
export function exportResultSet(
  result: ResultSet,
  outputFile: string,
  logger: Logger
): { resultsPath: string; failedPath: string } {
  const dir = path.dirname(outputFile);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  fs.writeFileSync(outputFile, resultsToCsv(result) + "\n", "utf-8");
  logger.info(`Results CSV → ${outputFile}`);
  if (result.rows.length === 0) {
    logger.error("No parsed results");
  }

  const failedPath = path.join(dir, FAILED_FILENAME);
  fs.writeFileSync(failedPath, failedToCsv(result.failed) + "\n", "utf-8");
  if (result.failed.length === 0) {
    logger.info("No files failed to parse");
  } else {
    logger.info(`Failed files CSV → ${failedPath}`);
  }

  return { resultsPath: outputFile, failedPath };
}

// ── Helpers ──────────────────────────────────────────────────

function formatCell(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (Array.isArray(value)) return value.map(String).join(" ");
  return String(value);
}
