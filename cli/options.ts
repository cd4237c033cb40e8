// ─────────────────────────────────────────────────────────────
// CLI Options — Argument parsing for extract / gencsv
// ─────────────────────────────────────────────────────────────

import { DEFAULT_COLUMNS, DEFAULT_CONFIG, LOGP_SOLVENTS, LogPSolvent } from "../config/runtimeConfig";
import { ScheduleProtocol, parseProtocol } from "../schedule/protocols";
import { UsageError } from "../schema/errors";
import { AssayCategory, parseAssayCategory } from "../schema/resultSchema";

export interface ExtractOptions {
  command: "extract";
  inputPath: string;
  protocol: AssayCategory;
  output: string | null;
}

export interface GenerateOptions {
  command: "gencsv";
  regi: string;
  pka: string;
  output: string;
  protocol: ScheduleProtocol;
  filterFile: string | null;
  regiIdCol: string;
  pkaIdCol: string;
  sampleCol: string;
  concentrationMm: number;
  volumeUl: number;
  logpSolvent: LogPSolvent | null;
}

export interface HelpOptions {
  command: "help";
}

export type CLIOptions = ExtractOptions | GenerateOptions | HelpOptions;

const EXTRACT_FLAGS = new Set(["--protocol", "--output"]);
const GENERATE_FLAGS = new Set([
  "--regi", "--pka", "--output", "--protocol", "--filter-file",
  "--regi-id-col", "--pka-id-col", "--sample-col",
  "--concentration", "--volume", "--logp-solvent",
]);

/**
 * Parse argv (without the node and script entries).
 */
export function parseArgs(args: string[]): CLIOptions {
  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    return { command: "help" };
  }

  const [command, ...rest] = args;
  switch (command) {
    case "extract":
      return parseExtractArgs(rest);
    case "gencsv":
      return parseGenerateArgs(rest);
    default:
      throw new UsageError(`Unknown command "${command}". Use "extract" or "gencsv".`);
  }
}

function parseExtractArgs(args: string[]): ExtractOptions {
  const { flags, positional } = splitArgs(args, EXTRACT_FLAGS);
  if (positional.length !== 1) {
    throw new UsageError("extract takes exactly one input path (a .t3r file or a directory)");
  }

  const protocol = requireFlag(flags, "--protocol");
  let category: AssayCategory;
  try {
    category = parseAssayCategory(protocol);
  } catch {
    throw new UsageError(`--protocol must be pka or logp (got "${protocol}")`);
  }

  return {
    command: "extract",
    inputPath: positional[0],
    protocol: category,
    output: flags.get("--output") ?? null,
  };
}

function parseGenerateArgs(args: string[]): GenerateOptions {
  const { flags, positional } = splitArgs(args, GENERATE_FLAGS);
  if (positional.length > 0) {
    throw new UsageError(`Unexpected argument(s): ${positional.join(" ")}`);
  }

  const protocol = parseProtocol(requireFlag(flags, "--protocol"));
  const solventFlag = flags.get("--logp-solvent");
  const logpSolvent = solventFlag === undefined ? null : parseSolvent(solventFlag);
  if (protocol === "logp" && !logpSolvent) {
    throw new UsageError("--logp-solvent is required when --protocol is logp");
  }

  return {
    command: "gencsv",
    regi: requireFlag(flags, "--regi"),
    pka: requireFlag(flags, "--pka"),
    output: requireFlag(flags, "--output"),
    protocol,
    filterFile: flags.get("--filter-file") ?? null,
    regiIdCol: flags.get("--regi-id-col") ?? DEFAULT_COLUMNS.registryId,
    pkaIdCol: flags.get("--pka-id-col") ?? DEFAULT_COLUMNS.pkaId,
    sampleCol: flags.get("--sample-col") ?? DEFAULT_COLUMNS.sampleId,
    concentrationMm: parsePositive(flags, "--concentration", DEFAULT_CONFIG.concentrationMm),
    volumeUl: parsePositive(flags, "--volume", DEFAULT_CONFIG.volumeUl),
    logpSolvent,
  };
}

// ── Helpers ──────────────────────────────────────────────────

function splitArgs(
  args: string[],
  known: ReadonlySet<string>
): { flags: Map<string, string>; positional: string[] } {
  const flags = new Map<string, string>();
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg : arg.slice(0, eq);
    if (!known.has(name)) {
      throw new UsageError(`Unknown option ${name}`);
    }
    if (eq !== -1) {
      flags.set(name, arg.slice(eq + 1));
    } else if (i + 1 < args.length && !args[i + 1].startsWith("--")) {
      flags.set(name, args[++i]);
    } else {
      throw new UsageError(`Option ${name} needs a value`);
    }
  }

  return { flags, positional };
}

function requireFlag(flags: Map<string, string>, name: string): string {
  const value = flags.get(name);
  if (value === undefined || value.trim().length === 0) {
    throw new UsageError(`Missing required option ${name}`);
  }
  return value;
}

function parsePositive(flags: Map<string, string>, name: string, fallback: number): number {
  const raw = flags.get(name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new UsageError(`${name} must be a positive number (got "${raw}")`);
  }
  return value;
}

function parseSolvent(value: string): LogPSolvent {
  const normalized = value.trim().toLowerCase();
  const match = LOGP_SOLVENTS.find((s) => s === normalized);
  if (!match) {
    throw new UsageError(`--logp-solvent must be one of ${LOGP_SOLVENTS.join(", ")} (got "${value}")`);
  }
  return match;
}

export const USAGE = `
Usage:
  titration-bridge extract <file.t3r | directory> --protocol pka|logp [--output results.csv]
  titration-bridge gencsv --regi registry.csv --pka pkas.csv --output <new dir> --protocol <name> [options]

extract:
  Reads instrument result files and writes one row per pKa (or one per logP
  document). Files that fail to parse are listed in failed_filenames.csv next
  to --output. Without --output, the results CSV is printed to stdout.

gencsv options:
  --protocol NAME        ${"fast-uv-pska | uv-metric-pska | ph-metric-pska | logp"}
  --filter-file FILE     Only registry ids listed in this CSV are scheduled
  --regi-id-col NAME     Registry id column used for the join (default: ${DEFAULT_COLUMNS.registryId})
  --pka-id-col NAME      pKa table id column (default: ${DEFAULT_COLUMNS.pkaId})
  --sample-col NAME      Column written as the sample name (default: ${DEFAULT_COLUMNS.sampleId})
  --concentration MM     Sample concentration in mM (default: ${DEFAULT_CONFIG.concentrationMm})
  --volume UL            Sample volume in µL (default: ${DEFAULT_CONFIG.volumeUl})
  --logp-solvent NAME    ${LOGP_SOLVENTS.join(" | ")} (required for logp)

Environment:
  ASSAY_BRIDGE_LOG_LEVEL debug | info | warn | error (default: info)
`;
