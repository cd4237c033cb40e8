// ─────────────────────────────────────────────────────────────
// Runtime Configuration — Defaults, environment overrides
// ─────────────────────────────────────────────────────────────

import { z } from "zod";
import { LOG_LEVELS, LogLevel } from "../logging/logger";
import { UsageError } from "../schema/errors";

/** Solvents the logP protocol accepts */
export const LOGP_SOLVENTS = ["octanol", "toluene", "cyclohexane", "chloroform"] as const;

export type LogPSolvent = (typeof LOGP_SOLVENTS)[number];

/** Column names used when joining and scheduling */
export interface ColumnConfig {
  registryId: string;
  pkaId: string;
  pkaType: string;
  pkaValue: string;
  reformattedPkas: string;
  sampleId: string;
  well: string;
  molecularWeight: string;
  formulaWeight: string;
  massMg: string;
}

export interface RuntimeConfig {
  logLevel: LogLevel;
  /** Sample concentration in mM */
  concentrationMm: number;
  /** Sample volume in µL */
  volumeUl: number;
  columns: ColumnConfig;
  /** Extension of instrument result documents */
  resultExtension: string;
}

export const DEFAULT_COLUMNS: ColumnConfig = {
  registryId: "ID",
  pkaId: "vendor_id",
  pkaType: "pka_type",
  pkaValue: "pka_value",
  reformattedPkas: "reformatted_pkas",
  sampleId: "batch_sample",
  well: "well",
  molecularWeight: "mw",
  formulaWeight: "fw",
  massMg: "mg",
};

export const DEFAULT_CONFIG: RuntimeConfig = {
  logLevel: "info",
  concentrationMm: 10,
  volumeUl: 5,
  columns: DEFAULT_COLUMNS,
  resultExtension: ".t3r",
};

export const LOG_LEVEL_ENV = "ASSAY_BRIDGE_LOG_LEVEL";

const EnvSchema = z.object({
  [LOG_LEVEL_ENV]: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(LOG_LEVELS))
    .optional(),
});

/**
 * Resolve configuration from defaults and the environment.
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new UsageError(
      `${LOG_LEVEL_ENV} must be one of ${LOG_LEVELS.join(", ")} (got "${env[LOG_LEVEL_ENV]}")`
    );
  }

  return {
    ...DEFAULT_CONFIG,
    logLevel: parsed.data[LOG_LEVEL_ENV] ?? DEFAULT_CONFIG.logLevel,
  };
}
