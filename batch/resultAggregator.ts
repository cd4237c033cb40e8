// ─────────────────────────────────────────────────────────────
// Result Aggregator — Extract rows from a file or a directory
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import { DEFAULT_CONFIG } from "../config/runtimeConfig";
import { readResultRows } from "../ingest";
import { Logger } from "../logging/logger";
import { InputNotFoundError, NoInputFilesError } from "../schema/errors";
import { AssayCategory, ResultRowMap, ResultSet } from "../schema/resultSchema";

/**
 * Discover result documents in a directory (non-recursive), sorted by name.
 * A plain file path is returned as the only entry.
 */
export function discoverResultFiles(inputPath: string, extension = DEFAULT_CONFIG.resultExtension): string[] {
  if (!fs.existsSync(inputPath)) {
    throw new InputNotFoundError(inputPath);
  }

  if (!fs.statSync(inputPath).isDirectory()) {
    return [inputPath];
  }

  const files = fs
    .readdirSync(inputPath, { withFileTypes: true })
    .filter((entry) => entry.isFile() && path.extname(entry.name).toLowerCase() === extension)
    .map((entry) => path.join(inputPath, entry.name))
    .sort();

  if (files.length === 0) {
    throw new NoInputFilesError(inputPath, extension);
  }
  return files;
}

/**
 * Extract normalized rows from every result document under `inputPath`.
 * A file that fails is recorded in `failed` and contributes no rows;
 * the batch itself only fails on missing input.
 */
export function extractResults<C extends AssayCategory>(
  inputPath: string,
  category: C,
  logger: Logger,
  options?: { extension?: string }
): ResultSet<C> {
  const files = discoverResultFiles(inputPath, options?.extension);
  logger.info(`Found ${files.length} result file(s)`);

  const result: ResultSet<C> = {
    category,
    filesAttempted: files.length,
    rows: [],
    failed: [],
  };

  files.forEach((file, i) => {
    const name = path.basename(file);
    logger.debug(`(${i + 1}/${files.length}) ${name}`);

    let rows: ResultRowMap[C][];
    try {
      rows = readResultRows(file, category, logger);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      logger.error(`Failed: ${reason}`);
      result.failed.push({ filename: name, reason });
      return;
    }
    result.rows.push(...rows);
  });

  return result;
}

export function succeededCount(result: ResultSet): number {
  return result.filesAttempted - result.failed.length;
}

/**
 * Print a summary of an extraction batch.
 */
export function printBatchSummary(result: ResultSet, logger: Logger): void {
  logger.info("═══════════════════════════════════════════════════════");
  logger.info(`  EXTRACTION SUMMARY (${result.category.toUpperCase()})`);
  logger.info("═══════════════════════════════════════════════════════");
  logger.info(`  Files:     ${result.filesAttempted}`);
  logger.info(`  Succeeded: ${succeededCount(result)}`);
  logger.info(`  Failed:    ${result.failed.length}`);
  logger.info(`  Rows:      ${result.rows.length}`);

  if (result.failed.length > 0) {
    logger.info("  FAILURES:");
    for (const f of result.failed) {
      logger.info(`    - ${f.filename}: ${f.reason}`);
    }
  }
}
