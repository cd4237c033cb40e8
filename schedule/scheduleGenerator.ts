// ─────────────────────────────────────────────────────────────
// Schedule Generator — Tray import files for the titrator
// ─────────────────────────────────────────────────────────────
//
// Layout of one tray file:
//
//   ScheduleImportCsv
//
//   <sample>,<TYPE,value,...>,SYM,<well>,MW,<mw>      × samples
//
//   TRAY,<output dir name>_<tray index>
//   <experiment lines, protocol specific>
//
// Subclasses set the tray capacity and write the experiment lines.
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import { z } from "zod";
import { DEFAULT_COLUMNS } from "../config/runtimeConfig";
import { Logger } from "../logging/logger";
import { ExperimentSectionNotImplementedError, OutputExistsError, ValidationError } from "../schema/errors";
import { CsvTable, NumericText, RequiredText, isBlank, requireColumns, validateRows } from "../schema/tableSchema";

export const HEADER_MARKER = "ScheduleImportCsv";

export const DEFAULT_SAMPLES_PER_TRAY = 48;

export interface ScheduleColumns {
  sampleId: string;
  pkas: string;
  well: string;
  molecularWeight: string;
  formulaWeight: string;
  massMg: string;
}

export interface ScheduleSample {
  sampleId: string;
  pkas: string;
  well: string;
  molecularWeight: string;
  /** Only loaded for protocols dosed by weight */
  formulaWeight: string | null;
  massMg: string | null;
}

export interface ScheduleTray {
  index: number;
  samples: ScheduleSample[];
}

export interface GeneratorOptions {
  logger: Logger;
  columns?: Partial<ScheduleColumns>;
}

const DEFAULT_SCHEDULE_COLUMNS: ScheduleColumns = {
  sampleId: DEFAULT_COLUMNS.sampleId,
  pkas: DEFAULT_COLUMNS.reformattedPkas,
  well: DEFAULT_COLUMNS.well,
  molecularWeight: DEFAULT_COLUMNS.molecularWeight,
  formulaWeight: DEFAULT_COLUMNS.formulaWeight,
  massMg: DEFAULT_COLUMNS.massMg,
};

const VolumeDosedSample = z.object({
  sampleId: RequiredText,
  pkas: RequiredText,
  well: RequiredText,
  molecularWeight: NumericText,
});

const WeightDosedSample = VolumeDosedSample.extend({
  formulaWeight: NumericText,
  massMg: NumericText,
});

/**
 * Base generator. Loads and validates the sample table at
 * construction; a protocol without an experiment section fails
 * when a tray is rendered.
 */
export class ScheduleGenerator {
  readonly samples: ScheduleSample[];
  protected readonly columns: ScheduleColumns;
  protected readonly logger: Logger;

  constructor(table: CsvTable, options: GeneratorOptions) {
    this.logger = options.logger;
    this.columns = lowercaseValues({ ...DEFAULT_SCHEDULE_COLUMNS, ...options.columns });
    this.samples = this.loadSamples(table);
  }

  /** Protocol name used in messages */
  get protocol(): string {
    return "generic";
  }

  get samplesPerTray(): number {
    return DEFAULT_SAMPLES_PER_TRAY;
  }

  /** Protocols dosing solid sample by weight need formula weight and mass */
  get dosedByWeight(): boolean {
    return false;
  }

  get numSamples(): number {
    return this.samples.length;
  }

  /** Contiguous slices of `samplesPerTray`, in input order */
  trays(): ScheduleTray[] {
    const trays: ScheduleTray[] = [];
    for (let i = 0; i < this.samples.length; i += this.samplesPerTray) {
      trays.push({
        index: trays.length,
        samples: this.samples.slice(i, i + this.samplesPerTray),
      });
    }
    return trays;
  }

  headerSection(): string {
    return `${HEADER_MARKER}\n\n`;
  }

  sampleSection(samples: readonly ScheduleSample[]): string {
    return samples
      .map((s) =>
        [s.sampleId, s.pkas.replace(/,+$/, ""), `SYM,${s.well}`, `MW,${s.molecularWeight}`].join(",")
      )
      .join("\n");
  }

  experimentSection(_samples: readonly ScheduleSample[]): string {
    throw new ExperimentSectionNotImplementedError(this.protocol);
  }

  renderTray(tray: ScheduleTray, trayName: string): string {
    return (
      this.headerSection() +
      this.sampleSection(tray.samples) +
      `\n\nTRAY,${trayName}\n` +
      this.experimentSection(tray.samples)
    );
  }

  /**
   * Write one `tray_<n>.csv` per tray into a new directory.
   * The directory must not exist yet. Returns the written paths.
   */
  generateFiles(outputDir: string): string[] {
    if (fs.existsSync(outputDir)) {
      throw new OutputExistsError(outputDir);
    }

    const baseName = path.basename(path.resolve(outputDir));
    const rendered = this.trays().map((tray) => ({
      file: path.join(outputDir, `tray_${tray.index}.csv`),
      content: this.renderTray(tray, `${baseName}_${tray.index}`),
    }));

    fs.mkdirSync(outputDir, { recursive: true });
    for (const { file, content } of rendered) {
      fs.writeFileSync(file, content, "utf-8");
      this.logger.info(`Wrote ${file}`);
    }
    return rendered.map((r) => r.file);
  }

  // ── Loading ────────────────────────────────────────────────

  private loadSamples(table: CsvTable): ScheduleSample[] {
    const lowered: CsvTable = {
      source: table.source,
      columns: table.columns.map((c) => c.toLowerCase()),
      rows: table.rows.map((row) =>
        Object.fromEntries(Object.entries(row).map(([k, v]) => [k.toLowerCase(), v]))
      ),
    };

    const cols = this.columns;
    const required = [cols.pkas, cols.sampleId, cols.well, cols.molecularWeight];
    if (this.dosedByWeight) required.push(cols.formulaWeight, cols.massMg);
    requireColumns(lowered, required);

    if (lowered.rows.length === 0) {
      throw new ValidationError(table.source, "no sample rows to schedule");
    }

    const missingPkas = lowered.rows.filter((r) => isBlank(r[cols.pkas]));
    if (missingPkas.length > 0) {
      throw new ValidationError(
        table.source,
        `${missingPkas.length} row(s) have missing estimated pKas: ${missingPkas.map((r) => r[cols.sampleId]).join(", ")}`
      );
    }

    const picked = lowered.rows.map((r) => ({
      sampleId: r[cols.sampleId],
      pkas: r[cols.pkas],
      well: r[cols.well],
      molecularWeight: r[cols.molecularWeight],
      formulaWeight: r[cols.formulaWeight],
      massMg: r[cols.massMg],
    }));

    if (this.dosedByWeight) {
      return validateRows(table.source, picked, WeightDosedSample);
    }
    return validateRows(table.source, picked, VolumeDosedSample).map((s) => ({
      ...s,
      formulaWeight: null,
      massMg: null,
    }));
  }
}

function lowercaseValues(columns: ScheduleColumns): ScheduleColumns {
  return {
    sampleId: columns.sampleId.toLowerCase(),
    pkas: columns.pkas.toLowerCase(),
    well: columns.well.toLowerCase(),
    molecularWeight: columns.molecularWeight.toLowerCase(),
    formulaWeight: columns.formulaWeight.toLowerCase(),
    massMg: columns.massMg.toLowerCase(),
  };
}
