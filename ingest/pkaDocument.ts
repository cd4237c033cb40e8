// ─────────────────────────────────────────────────────────────
// pKa Result Document — Measured & predicted pKa extraction
// ─────────────────────────────────────────────────────────────
//
// Measured pKas come from exactly one location, tried in order:
//   1. ProcessedData.FastDpasMeanResult
//        parallel space-separated lists (mean, std, I, T)
//   2. ProcessedData.YasudaShedlovskyResult.DielectricFit.YasudaShedlovskyFit
//        one record per fit
// Predicted pKas (ProcessedData.PhMetricModel.Sample.Pka) supply
// the acid/base type, paired with measured values by position.
// ─────────────────────────────────────────────────────────────

import { Logger } from "../logging/logger";
import { AssayFileError, InvalidFieldError, NoPkaDataError } from "../schema/errors";
import { PkaMeasurement, PkaResultRow, formatPkaValue, parsePkaType } from "../schema/resultSchema";
import { ResultDocument, loadResultTree } from "./resultDocument";
import { TreeReader, XmlRecord, XmlValue, asList, textOf, toNumber } from "./xmlTree";

interface PkaLocation {
  name: string;
  path: readonly string[];
  extract(section: XmlValue, filename: string): PkaMeasurement[];
}

const MEAN_RESULT_PATH = ["ProcessedData", "FastDpasMeanResult"];
const DIELECTRIC_FIT_PATH = ["ProcessedData", "YasudaShedlovskyResult", "DielectricFit", "YasudaShedlovskyFit"];
const PREDICTED_PATH = ["ProcessedData", "PhMetricModel", "Sample", "Pka"];
const SWEEP_PATH = ["ProcessedData", "Sweep"];
const COSOLVENT_PATH = ["FastDpasResult", "CosolventRatio"];

/** Fast/mean result: the i-th entry of each list belongs together */
const meanResultLocation: PkaLocation = {
  name: "FastDpasMeanResult",
  path: MEAN_RESULT_PATH,
  extract(value, filename) {
    const section = TreeReader.of(filename, value, MEAN_RESULT_PATH);
    const sizeAttr = section.find(["MeanPkaResults", "@size"]);
    const declared =
      typeof sizeAttr === "string"
        ? toNumber(sizeAttr, section.filename, [...MEAN_RESULT_PATH, "MeanPkaResults", "@size"])
        : null;
    if (declared === 0) return [];

    const values = splitValues(section, "MeanPkaResults");
    const count = declared ?? values.length;

    const stds = splitValues(section, "MeanPkasStdDevs");
    const ionicStrengths = splitValues(section, "MeanPkasAverageIonicStrength");
    const temperatures = splitValues(section, "MeanPkasAverageTemperature");

    const lists: [string, number[]][] = [
      ["MeanPkaResults", values],
      ["MeanPkasStdDevs", stds],
      ["MeanPkasAverageIonicStrength", ionicStrengths],
      ["MeanPkasAverageTemperature", temperatures],
    ];
    for (const [key, list] of lists) {
      if (list.length < count) {
        throw new InvalidFieldError(
          section.filename,
          [...MEAN_RESULT_PATH, key].join("."),
          `has ${list.length} value(s), expected ${count}`
        );
      }
    }

    const results: PkaMeasurement[] = [];
    for (let i = 0; i < count; i++) {
      results.push({
        value: values[i],
        std: stds[i],
        ionicStrength: ionicStrengths[i],
        temperature: temperatures[i],
        pkaType: null,
        source: null,
      });
    }
    return results;
  },
};

/** Dielectric fit: one self-contained record per fit */
const dielectricFitLocation: PkaLocation = {
  name: "YasudaShedlovskyFit",
  path: DIELECTRIC_FIT_PATH,
  extract(value, filename) {
    return asList(value).map((entry, i) => {
      const fit = TreeReader.of(filename, entry, [...DIELECTRIC_FIT_PATH, String(i)]);
      return {
        value: fit.number(["AqueousPka"]),
        std: fit.number(["ConfidenceInterval"]),
        ionicStrength: fit.number(["AverageIonicStrength"]),
        temperature: fit.number(["AverageTemperature"]),
        pkaType: null,
        source: null,
      };
    });
  },
};

const PKA_LOCATIONS: readonly PkaLocation[] = [meanResultLocation, dielectricFitLocation];

/**
 * Result document from a pKa assay.
 */
export class PkaResultDocument extends ResultDocument<"pka"> {
  readonly category = "pka" as const;

  private measured: PkaMeasurement[] | null = null;
  private predicted: PkaMeasurement[] | null = null;
  private sweepList: XmlValue[] | null = null;

  constructor(filePath: string, tree: XmlRecord, logger: Logger) {
    super(filePath, tree, "pka", logger);
  }

  static open(filePath: string, logger: Logger): PkaResultDocument {
    return new PkaResultDocument(filePath, loadResultTree(filePath), logger);
  }

  /**
   * Measured pKas, typed by position against the predicted list.
   * Entries past the end of the predicted list keep a null type.
   */
  pkaMeasurements(): PkaMeasurement[] {
    if (this.measured) return this.measured;

    const raw = this.extractMeasured();
    const predicted = this.predictedPkas();
    if (raw.length !== predicted.length) {
      this.logger.warn(
        `${this.filename}: ${raw.length} measured pKa(s) but ${predicted.length} predicted; ` +
          `pairing stops after ${Math.min(raw.length, predicted.length)}`
      );
    }

    this.measured = raw.map((m, i) =>
      i < predicted.length ? { ...m, pkaType: predicted[i].pkaType } : m
    );
    return this.measured;
  }

  /** Predicted pKas entered for the experiment, in declared order */
  predictedPkas(): PkaMeasurement[] {
    if (this.predicted) return this.predicted;

    const entries = asList(this.reader.require(PREDICTED_PATH));
    this.predicted = entries.map((entry, i) => {
      const pred = TreeReader.of(this.filename, entry, [...PREDICTED_PATH, String(i)]);
      const source = pred.find(["PkaValue", "Source"]);
      return {
        value: pred.number(["PkaValue", "Value"]),
        std: null,
        ionicStrength: null,
        temperature: null,
        pkaType: parsePkaType(pred.text(["PkaType", "Value"]), this.filename, [...PREDICTED_PATH, "PkaType", "Value"].join(".")),
        source: typeof source === "string" ? source : null,
      };
    });
    return this.predicted;
  }

  /**
   * Instrument-ready pKa string, e.g. "acid,2.86,base,9.64".
   * Pairs predicted type with measured value by position.
   */
  formattedPkas(): string {
    const measured = this.pkaMeasurements();
    const predicted = this.predictedPkas();
    const pairs: string[] = [];
    for (let i = 0; i < Math.min(measured.length, predicted.length); i++) {
      pairs.push(`${predicted[i].pkaType},${formatPkaValue(measured[i].value)}`);
    }
    return pairs.join(",");
  }

  /** Cosolvent named in the first sweep, or null when not recorded */
  cosolventName(): string | null {
    const sweeps = this.sweeps();
    if (sweeps.length === 0) return null;
    return this.optional("cosolvent name", () =>
      TreeReader.of(this.filename, sweeps[0], SWEEP_PATH).text([...COSOLVENT_PATH, "CosolventName"])
    );
  }

  /** Cosolvent weight fraction of each sweep; empty when not recorded */
  cosolventFractions(): number[] {
    const sweeps = this.sweeps();
    if (sweeps.length === 0) return [];
    return (
      this.optional("cosolvent fractions", () =>
        sweeps.map((sweep) =>
          TreeReader.of(this.filename, sweep, SWEEP_PATH).number([...COSOLVENT_PATH, "WtFraction"])
        )
      ) ?? []
    );
  }

  /** One row per measured pKa, sharing the document's metadata */
  toRows(): PkaResultRow[] {
    const metadata = this.sampleMetadata();
    const cosolvent = this.cosolventName();
    const fractions = this.cosolventFractions();
    const reformatted = this.formattedPkas();

    return this.pkaMeasurements().map((pka, i) => ({
      ...metadata,
      pka_number: i + 1,
      pka_type: pka.pkaType,
      pka_value: pka.value,
      pka_std: pka.std,
      pka_ionic_strength: pka.ionicStrength,
      pka_temperature: pka.temperature,
      cosolvent,
      cosolvent_fractions: fractions,
      reformatted_pkas: reformatted,
    }));
  }

  // ── Helpers ────────────────────────────────────────────────

  private extractMeasured(): PkaMeasurement[] {
    for (const location of PKA_LOCATIONS) {
      const section = this.reader.find(location.path);
      if (section === undefined) continue;

      this.logger.debug(`${this.filename}: reading pKas from ${location.name}`);
      return location.extract(section, this.filename);
    }
    throw new NoPkaDataError(
      this.filename,
      PKA_LOCATIONS.map((l) => l.path.join("."))
    );
  }

  private sweeps(): XmlValue[] {
    if (this.sweepList) return this.sweepList;

    const sweeps = this.reader.find(SWEEP_PATH);
    if (sweeps === undefined) {
      this.logger.warn(`${this.filename}: no ${SWEEP_PATH.join(".")} section, cosolvent not recorded`);
      this.sweepList = [];
    } else {
      this.sweepList = asList(sweeps);
    }
    return this.sweepList;
  }

  /** Optional enrichment: a missing or malformed field is logged, not raised */
  private optional<T>(what: string, read: () => T): T | null {
    try {
      return read();
    } catch (err: unknown) {
      if (!(err instanceof AssayFileError)) throw err;
      this.logger.warn(`${this.filename}: could not extract ${what}: ${err.message}`);
      return null;
    }
  }
}

function splitValues(section: TreeReader, key: string): number[] {
  const path = [...MEAN_RESULT_PATH, key];
  const text = textOf(section.require([key]), section.filename, path);
  return text
    .trim()
    .split(/\s+/)
    .filter((v) => v.length > 0)
    .map((v) => toNumber(v, section.filename, path));
}
