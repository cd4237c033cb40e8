// ─────────────────────────────────────────────────────────────
// Result Schema — Normalized record model for assay results
// ─────────────────────────────────────────────────────────────

import { InvalidFieldError, UnknownAssayCategoryError } from "./errors";

/** Assay categories the pipeline understands */
export const ASSAY_CATEGORIES = ["pka", "logp"] as const;

export type AssayCategory = (typeof ASSAY_CATEGORIES)[number];

/** Possible pKa types */
export const PKA_TYPES = ["acid", "base"] as const;

export type PkaType = (typeof PKA_TYPES)[number];

/**
 * Case-insensitive lookup of an assay category ("PKA", "pKa", "logp", ...).
 */
export function parseAssayCategory(value: string, filename?: string): AssayCategory {
  const normalized = value.trim().toLowerCase();
  const match = ASSAY_CATEGORIES.find((c) => c === normalized);
  if (!match) {
    throw new UnknownAssayCategoryError(value, filename);
  }
  return match;
}

/**
 * Case-insensitive lookup of a pKa type ("Base", "ACID", ...).
 */
export function parsePkaType(value: string, filename: string, fieldPath: string): PkaType {
  const normalized = value.trim().toLowerCase();
  const match = PKA_TYPES.find((t) => t === normalized);
  if (!match) {
    throw new InvalidFieldError(filename, fieldPath, `unknown pKa type "${value}"`);
  }
  return match;
}

/**
 * pKa value as written in instrument pKa strings: integral values keep
 * one decimal ("8.0"), others use the shortest round-trip form.
 */
export function formatPkaValue(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/** A single measured (or predicted) pKa */
export interface PkaMeasurement {
  readonly value: number;
  readonly std: number | null;
  readonly ionicStrength: number | null;
  readonly temperature: number | null;
  readonly pkaType: PkaType | null;
  readonly source: string | null;
}

/** A single logP result */
export interface LogPMeasurement {
  /** Larger of the two sweep-level values; see LOGP_VALUE_POLICY */
  readonly value: number;
  readonly rmsd: number;
  readonly solvent: string;
}

/** Metadata every result document exposes */
export interface SampleMetadata {
  sample: string;
  filename: string;
  assay_name: string;
  assay_quality: string;
  assay_datetime: string;
}

/** One row per measured pKa */
export interface PkaResultRow extends SampleMetadata {
  pka_number: number;           // 1-based position within the document
  pka_type: PkaType | null;
  pka_value: number;
  pka_std: number | null;
  pka_ionic_strength: number | null;
  pka_temperature: number | null;
  cosolvent: string | null;
  cosolvent_fractions: number[];
  reformatted_pkas: string;
}

/** One row per logP document */
export interface LogPResultRow extends SampleMetadata {
  logp: number;
  rmsd: number;
  solvent: string;
}

/** Row type produced for each assay category */
export interface ResultRowMap {
  pka: PkaResultRow;
  logp: LogPResultRow;
}

export type ResultRow = ResultRowMap[AssayCategory];

/** Column order for result CSVs */
export const RESULT_COLUMNS: { [C in AssayCategory]: readonly (keyof ResultRowMap[C] & string)[] } = {
  pka: [
    "sample",
    "filename",
    "assay_name",
    "assay_quality",
    "assay_datetime",
    "pka_number",
    "pka_type",
    "pka_value",
    "pka_std",
    "pka_ionic_strength",
    "pka_temperature",
    "cosolvent",
    "cosolvent_fractions",
    "reformatted_pkas",
  ],
  logp: [
    "sample",
    "filename",
    "assay_name",
    "assay_quality",
    "assay_datetime",
    "logp",
    "rmsd",
    "solvent",
  ],
};

/** A file the aggregator could not turn into rows */
export interface FailedFile {
  filename: string;
  reason: string;
}

/** Normalized rows for a batch plus the files that failed */
export interface ResultSet<C extends AssayCategory = AssayCategory> {
  category: C;
  filesAttempted: number;
  rows: ResultRowMap[C][];
  failed: FailedFile[];
}
