// ─────────────────────────────────────────────────────────────
// pKa Reformatter — Long (row per pKa) → short (row per compound)
// ─────────────────────────────────────────────────────────────
//
//   vendor_id,pka_type,pka_value          vendor_id,reformatted_pkas
//   cpd1,base,6.75                  →     cpd1,"ACID,2.05,BASE,6.75"
//   cpd1,acid,2.05
// ─────────────────────────────────────────────────────────────

import { z } from "zod";
import { DEFAULT_COLUMNS } from "../config/runtimeConfig";
import { PKA_TYPES, formatPkaValue } from "../schema/resultSchema";
import { CsvTable, NumericText, RequiredText, requireColumns, validateRows } from "../schema/tableSchema";

export interface LongPkaColumns {
  id: string;
  pkaType: string;
  pkaValue: string;
  output: string;
}

const DEFAULT_LONG_COLUMNS: LongPkaColumns = {
  id: DEFAULT_COLUMNS.pkaId,
  pkaType: DEFAULT_COLUMNS.pkaType,
  pkaValue: DEFAULT_COLUMNS.pkaValue,
  output: DEFAULT_COLUMNS.reformattedPkas,
};

const LongPkaRow = z.object({
  id: RequiredText,
  pkaType: z.string().trim().toLowerCase().pipe(z.enum(PKA_TYPES)),
  pkaValue: NumericText.transform((v) => Number(v)),
});

/**
 * Group pKas by compound and join them as TYPE,value pairs in
 * ascending value order. Compounds are emitted sorted by id.
 */
export function convertLongPkaTable(
  table: CsvTable,
  columns: Partial<LongPkaColumns> = {}
): CsvTable {
  const cols = { ...DEFAULT_LONG_COLUMNS, ...columns };
  requireColumns(table, [cols.id, cols.pkaType, cols.pkaValue]);

  const rows = validateRows(
    table.source,
    table.rows.map((r) => ({ id: r[cols.id], pkaType: r[cols.pkaType], pkaValue: r[cols.pkaValue] })),
    LongPkaRow
  );

  const byCompound = new Map<string, { pkaType: string; pkaValue: number }[]>();
  for (const row of rows) {
    const list = byCompound.get(row.id) ?? [];
    list.push({ pkaType: row.pkaType, pkaValue: row.pkaValue });
    byCompound.set(row.id, list);
  }

  const ids = [...byCompound.keys()].sort();
  return {
    source: table.source,
    columns: [cols.id, cols.output],
    rows: ids.map((id) => {
      const pkas = [...(byCompound.get(id) ?? [])].sort((a, b) => a.pkaValue - b.pkaValue);
      return {
        [cols.id]: id,
        [cols.output]: pkas.map((p) => `${p.pkaType.toUpperCase()},${formatPkaValue(p.pkaValue)}`).join(","),
      };
    }),
  };
}
