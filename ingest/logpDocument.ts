// ─────────────────────────────────────────────────────────────
// logP Result Document — Multi-sweep partition result
// ─────────────────────────────────────────────────────────────

import { Logger } from "../logging/logger";
import { InvalidFieldError } from "../schema/errors";
import { LogPMeasurement, LogPResultRow } from "../schema/resultSchema";
import { ResultDocument, loadResultTree } from "./resultDocument";
import { XmlRecord, asList, textOf, toNumber } from "./xmlTree";

const MULTISWEEP_PATH = ["ProcessedData", "MultisweepPhMetricResult"];
const SAMPLE_LOGP_PATH = ["MultisweepPhMetricLevelResult", "SampleValues", "Logp"];
const SOLVENT_PATH = ["AssayData", "AssayTemplate", "Settings", "PartitionType", "Value"];

/**
 * The protocol records two sweep-level logP values and the reported
 * value is the larger one. Pending confirmation from the assay owners.
 */
export const LOGP_VALUE_POLICY = "max-of-sweeps" as const;

/**
 * Result document from a logP assay.
 */
export class LogPResultDocument extends ResultDocument<"logp"> {
  readonly category = "logp" as const;

  private result: LogPMeasurement | null = null;

  constructor(filePath: string, tree: XmlRecord, logger: Logger) {
    super(filePath, tree, "logp", logger);
  }

  static open(filePath: string, logger: Logger): LogPResultDocument {
    return new LogPResultDocument(filePath, loadResultTree(filePath), logger);
  }

  logpMeasurement(): LogPMeasurement {
    if (this.result) return this.result;

    const section = this.reader.at(MULTISWEEP_PATH);
    const rmsd = section.number(["Rmsd"]);

    const fieldPath = [...MULTISWEEP_PATH, ...SAMPLE_LOGP_PATH];
    const values = asList(section.require(SAMPLE_LOGP_PATH)).map((v) =>
      toNumber(textOf(v, this.filename, fieldPath), this.filename, fieldPath)
    );
    if (values.length === 0) {
      throw new InvalidFieldError(this.filename, fieldPath.join("."), "no logP values");
    }
    if (values.length !== 2) {
      this.logger.warn(`${this.filename}: expected 2 sweep logP values, found ${values.length}`);
    }

    this.result = {
      value: Math.max(...values),
      rmsd,
      solvent: this.solvent(),
    };
    return this.result;
  }

  /** Partition solvent label from the assay settings */
  solvent(): string {
    return this.reader.text(SOLVENT_PATH);
  }

  toRows(): LogPResultRow[] {
    const logp = this.logpMeasurement();
    return [
      {
        ...this.sampleMetadata(),
        logp: logp.value,
        rmsd: logp.rmsd,
        solvent: logp.solvent,
      },
    ];
  }
}
