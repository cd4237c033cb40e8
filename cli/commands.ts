// ─────────────────────────────────────────────────────────────
// CLI Commands — extract / gencsv
// ─────────────────────────────────────────────────────────────

import { RuntimeConfig } from "../config/runtimeConfig";
import { extractResults, printBatchSummary } from "../batch/resultAggregator";
import { exportResultSet, resultsToCsv } from "../export/csvExport";
import { readCsvFile } from "../ingest/csvIngest";
import { Logger } from "../logging/logger";
import { createScheduleGenerator } from "../schedule/protocols";
import { ResultSet } from "../schema/resultSchema";
import { mergeRegistryWithPkas, readFilterIds } from "../transform/registryMerge";
import { ExtractOptions, GenerateOptions } from "./options";

/**
 * Extract result rows and write them (plus the failed-files list)
 * to --output, or print the results CSV to stdout.
 */
export function runExtract(
  opts: ExtractOptions,
  config: RuntimeConfig,
  logger: Logger,
  write: (text: string) => void = (text) => process.stdout.write(text)
): ResultSet {
  const result = extractResults(opts.inputPath, opts.protocol, logger.child("EXTRACT"), {
    extension: config.resultExtension,
  });

  if (opts.output) {
    exportResultSet(result, opts.output, logger.child("EXPORT"));
  } else {
    write(resultsToCsv(result) + "\n");
  }

  printBatchSummary(result, logger);
  if (result.failed.length > 0) {
    logger.warn(`${result.failed.length} file(s) failed to parse`);
  }
  return result;
}

/**
 * Merge registry and pKa tables and write one schedule file per tray.
 * Returns the written file paths.
 */
export function runGenerate(opts: GenerateOptions, logger: Logger): string[] {
  const registry = readCsvFile(opts.regi);
  const pkaTable = readCsvFile(opts.pka);
  logger.info(`Registry: ${registry.rows.length} row(s); pKa table: ${pkaTable.rows.length} row(s)`);

  const filterIds = opts.filterFile ? readFilterIds(readCsvFile(opts.filterFile), opts.regiIdCol) : undefined;

  const { table } = mergeRegistryWithPkas(registry, pkaTable, logger.child("MERGE"), {
    registryIdColumn: opts.regiIdCol,
    pkaIdColumn: opts.pkaIdCol,
    filterIds,
  });

  const generator = createScheduleGenerator(opts.protocol, table, {
    logger: logger.child("SCHEDULE"),
    columns: { sampleId: opts.sampleCol },
    concentrationMm: opts.concentrationMm,
    volumeUl: opts.volumeUl,
    logpSolvent: opts.logpSolvent ?? undefined,
  });
  logger.info(
    `Scheduling ${generator.numSamples} sample(s) for ${generator.protocol} ` +
      `(${generator.trays().length} tray(s) of up to ${generator.samplesPerTray})`
  );

  const files = generator.generateFiles(opts.output);
  logger.info(`✓ ${files.length} schedule file(s) written to ${opts.output}`);
  return files;
}
