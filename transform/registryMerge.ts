// ─────────────────────────────────────────────────────────────
// Registry Merge — Join sample registry rows to pKa estimates
// ─────────────────────────────────────────────────────────────

import { DEFAULT_COLUMNS } from "../config/runtimeConfig";
import { Logger } from "../logging/logger";
import { ValidationError } from "../schema/errors";
import { CsvTable, isBlank, requireColumns } from "../schema/tableSchema";
import { convertLongPkaTable } from "./pkaReformatter";

/** Registry columns required besides the id column */
export const REGISTRY_REQUIRED_COLUMNS = ["Registry Number", "Batch Name", "Well", "MW"] as const;

export const BATCH_SAMPLE_COLUMN = "batch_sample";

export interface MergeOptions {
  registryIdColumn: string;
  pkaIdColumn: string;
  pkaColumn: string;
  /** Keep only registry rows whose id is listed */
  filterIds?: ReadonlySet<string>;
}

export interface MergeResult {
  table: CsvTable;
  /** Registry ids dropped for lack of pKa data */
  dropped: string[];
}

const DEFAULT_MERGE_OPTIONS: MergeOptions = {
  registryIdColumn: DEFAULT_COLUMNS.registryId,
  pkaIdColumn: DEFAULT_COLUMNS.pkaId,
  pkaColumn: DEFAULT_COLUMNS.reformattedPkas,
};

/**
 * Left-join the registry to the pKa table on the id columns.
 * Registry rows without a (non-empty) pKa string are logged and
 * dropped here rather than carried forward with empty values.
 */
export function mergeRegistryWithPkas(
  registry: CsvTable,
  pkaTable: CsvTable,
  logger: Logger,
  options: Partial<MergeOptions> = {}
): MergeResult {
  const opts = { ...DEFAULT_MERGE_OPTIONS, ...options };

  requireColumns(registry, [opts.registryIdColumn, ...REGISTRY_REQUIRED_COLUMNS]);
  requireColumns(pkaTable, [opts.pkaIdColumn]);

  const shortTable = pkaTable.columns.includes(opts.pkaColumn)
    ? pkaTable
    : convertLongPkaTable(pkaTable, { id: opts.pkaIdColumn, output: opts.pkaColumn });
  if (shortTable !== pkaTable) {
    logger.info(`Converted long-format pKa table ${pkaTable.source} (${shortTable.rows.length} compounds)`);
  }

  const pkasById = new Map<string, string[]>();
  for (const row of shortTable.rows) {
    const id = row[opts.pkaIdColumn].trim();
    const list = pkasById.get(id) ?? [];
    list.push(row[opts.pkaColumn] ?? "");
    pkasById.set(id, list);
  }

  const deriveBatchSample = !registry.columns.includes(BATCH_SAMPLE_COLUMN);
  const columns = [...registry.columns];
  if (deriveBatchSample) columns.push(BATCH_SAMPLE_COLUMN);
  if (!columns.includes(opts.pkaColumn)) columns.push(opts.pkaColumn);

  let registryRows = registry.rows;
  if (opts.filterIds) {
    const keep = opts.filterIds;
    registryRows = registryRows.filter((row) => keep.has(row[opts.registryIdColumn].trim()));
    logger.info(`Filter kept ${registryRows.length} of ${registry.rows.length} registry rows`);
  }

  const rows: Record<string, string>[] = [];
  const dropped: string[] = [];
  for (const row of registryRows) {
    const id = row[opts.registryIdColumn].trim();
    const matches = (pkasById.get(id) ?? []).filter((p) => !isBlank(p));
    if (matches.length === 0) {
      dropped.push(id);
      continue;
    }
    if (matches.length > 1) {
      logger.warn(`${id} has ${matches.length} pKa entries; each becomes its own sample row`);
    }

    const base: Record<string, string> = { ...row };
    if (deriveBatchSample) {
      base[BATCH_SAMPLE_COLUMN] = `${row["Registry Number"]}-${row["Batch Name"]}`;
    }
    for (const pkas of matches) {
      rows.push({ ...base, [opts.pkaColumn]: pkas });
    }
  }

  if (dropped.length > 0) {
    logger.warn(`${dropped.length} rows have missing pKa data and will be dropped: ${dropped.join(", ")}`);
  }
  logger.info(`Merged ${rows.length} sample row(s) with pKa estimates`);

  return {
    table: { source: `${registry.source} + ${pkaTable.source}`, columns, rows },
    dropped,
  };
}

/**
 * Read the ids listed in a filter table: the registry id column when
 * present, otherwise the first column.
 */
export function readFilterIds(table: CsvTable, idColumn: string = DEFAULT_COLUMNS.registryId): Set<string> {
  if (table.columns.length === 0) {
    throw new ValidationError(table.source, "filter file has no columns");
  }
  const column = table.columns.includes(idColumn) ? idColumn : table.columns[0];
  return new Set(table.rows.map((r) => r[column].trim()).filter((id) => id.length > 0));
}
