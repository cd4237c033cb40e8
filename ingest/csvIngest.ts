// ─────────────────────────────────────────────────────────────
// CSV Ingest — Registry, pKa and filter tables
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import Papa from "papaparse";
import { InputNotFoundError, ValidationError } from "../schema/errors";
import { CsvTable } from "../schema/tableSchema";

/**
 * Parse CSV text with a header row. Every cell stays a string;
 * missing trailing cells become "".
 */
export function parseCsvText(text: string, source: string): CsvTable {
  const res = Papa.parse<Record<string, string>>(text.replace(/^\uFEFF/, ""), {
    header: true,
    delimiter: ",",
    dynamicTyping: false,
    skipEmptyLines: "greedy",
    transformHeader: (h) => h.trim(),
  });

  const fatal = res.errors.filter((e) => e.type !== "FieldMismatch" || e.code === "TooManyFields");
  if (fatal.length > 0) {
    const first = fatal[0];
    const where = first.row !== undefined ? ` (row ${first.row + 1})` : "";
    throw new ValidationError(source, `malformed CSV${where}: ${first.message}`);
  }

  const columns = res.meta.fields ?? [];
  const rows = res.data.map((raw) => {
    const row: Record<string, string> = {};
    for (const col of columns) {
      row[col] = raw[col] ?? "";
    }
    return row;
  });

  return { source, columns, rows };
}

export function readCsvFile(filePath: string): CsvTable {
  if (!fs.existsSync(filePath)) {
    throw new InputNotFoundError(filePath);
  }
  return parseCsvText(fs.readFileSync(filePath, "utf-8"), filePath);
}
