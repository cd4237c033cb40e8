// ─────────────────────────────────────────────────────────────
// Schedule Protocols — Experiment templates per titrator method
// ─────────────────────────────────────────────────────────────

import { DEFAULT_CONFIG, LogPSolvent } from "../config/runtimeConfig";
import { UsageError } from "../schema/errors";
import { CsvTable } from "../schema/tableSchema";
import { GeneratorOptions, ScheduleGenerator, ScheduleSample } from "./scheduleGenerator";

export const SCHEDULE_PROTOCOLS = ["fast-uv-pska", "uv-metric-pska", "ph-metric-pska", "logp"] as const;

export type ScheduleProtocol = (typeof SCHEDULE_PROTOCOLS)[number];

export interface VolumeDosingOptions extends GeneratorOptions {
  /** mM */
  concentrationMm?: number;
  /** µL; written to the file in mL */
  volumeUl?: number;
}

/**
 * Shared fields for protocols dosing a DMSO stock by volume.
 */
abstract class VolumeDosedGenerator extends ScheduleGenerator {
  protected readonly concentrationMm: number;
  protected readonly volumeUl: number;

  constructor(table: CsvTable, options: VolumeDosingOptions) {
    super(table, options);
    this.concentrationMm = options.concentrationMm ?? DEFAULT_CONFIG.concentrationMm;
    this.volumeUl = options.volumeUl ?? DEFAULT_CONFIG.volumeUl;
  }

  protected dosingFields(): string[] {
    return [`volume,${this.volumeUl / 1000}`, `Concentration,${this.concentrationMm}`, "DMSO,1"];
  }
}

/**
 * Fast UV psKa: one "Fast UV Buffer Calib MeOH" calibration per tray,
 * then one experiment per sample.
 */
export class FastUvPskaGenerator extends VolumeDosedGenerator {
  get protocol(): string {
    return "fast-uv-pska";
  }

  get samplesPerTray(): number {
    return 47;
  }

  experimentSection(samples: readonly ScheduleSample[]): string {
    const lines = samples.map(({ sampleId }) =>
      ["Fast UV psKa", `title,pka of ${sampleId}`, sampleId, `${sampleId},1`, ...this.dosingFields()].join(",")
    );
    return ["Fast UV Buffer Calib MeOH", ...lines].join("\n");
  }
}

/**
 * UV-metric psKa: the instrument adds a calibration before each sample.
 */
export class UvMetricPskaGenerator extends VolumeDosedGenerator {
  get protocol(): string {
    return "uv-metric-pska";
  }

  get samplesPerTray(): number {
    return 24;
  }

  experimentSection(samples: readonly ScheduleSample[]): string {
    return samples
      .map(({ sampleId }) =>
        [
          "UV-metric psKa",
          `title,UV-metric psKa of ${sampleId} by volume`,
          sampleId,
          `${sampleId},1`,
          ...this.dosingFields(),
        ].join(",")
      )
      .join("\n");
  }
}

/**
 * pH-metric psKa on solid sample: dosed by weight, "Clean Up" after each.
 */
export class PhMetricPskaGenerator extends ScheduleGenerator {
  get protocol(): string {
    return "ph-metric-pska";
  }

  get samplesPerTray(): number {
    return 24;
  }

  get dosedByWeight(): boolean {
    return true;
  }

  experimentSection(samples: readonly ScheduleSample[]): string {
    return samples
      .flatMap((s) => [
        [
          "pH-metric psKa",
          `title,pH-metric psKa of ${s.sampleId} by weight`,
          s.sampleId,
          `${s.sampleId},1`,
          `fw,${s.formulaWeight}`,
          `mg,${s.massMg}`,
        ].join(","),
        "Clean Up",
      ])
      .join("\n");
  }
}

export interface LogPOptions extends GeneratorOptions {
  solvent: LogPSolvent;
}

/**
 * pH-metric medium logP in the chosen partition solvent, two
 * "Clean Up" steps between samples.
 */
export class LogPGenerator extends ScheduleGenerator {
  readonly solvent: LogPSolvent;

  constructor(table: CsvTable, options: LogPOptions) {
    super(table, options);
    this.solvent = options.solvent;
  }

  get protocol(): string {
    return "logp";
  }

  get samplesPerTray(): number {
    return 16;
  }

  get dosedByWeight(): boolean {
    return true;
  }

  experimentSection(samples: readonly ScheduleSample[]): string {
    return samples
      .flatMap((s) => [
        [
          `pH-metric medium logP ${this.solvent}`,
          `title,logP of ${s.sampleId}`,
          s.sampleId,
          `${s.sampleId},1`,
          `fw,${s.formulaWeight}`,
          `mg,${s.massMg}`,
        ].join(","),
        "Clean Up",
        "Clean Up",
      ])
      .join("\n");
  }
}

// ── Registry ─────────────────────────────────────────────────

export interface ProtocolOptions extends VolumeDosingOptions {
  logpSolvent?: LogPSolvent;
}

/**
 * Case-insensitive protocol lookup ("LogP", "fast-uv-pska", ...).
 */
export function parseProtocol(name: string): ScheduleProtocol {
  const normalized = name.trim().toLowerCase();
  const match = SCHEDULE_PROTOCOLS.find((p) => p === normalized);
  if (!match) {
    throw new UsageError(`Unknown protocol "${name}". Supported: ${SCHEDULE_PROTOCOLS.join(", ")}`);
  }
  return match;
}

/**
 * Build the generator for a protocol over a merged sample table.
 */
export function createScheduleGenerator(
  protocol: ScheduleProtocol,
  table: CsvTable,
  options: ProtocolOptions
): ScheduleGenerator {
  switch (protocol) {
    case "fast-uv-pska":
      return new FastUvPskaGenerator(table, options);
    case "uv-metric-pska":
      return new UvMetricPskaGenerator(table, options);
    case "ph-metric-pska":
      return new PhMetricPskaGenerator(table, options);
    case "logp": {
      if (!options.logpSolvent) {
        throw new UsageError("A logP solvent is required for the logp protocol");
      }
      return new LogPGenerator(table, { ...options, solvent: options.logpSolvent });
    }
  }
}
