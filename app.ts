#!/usr/bin/env node
// ─────────────────────────────────────────────────────────────
// Titration File Bridge — Main Application Controller
// ─────────────────────────────────────────────────────────────
//
// Usage:
//   npx tsx app.ts extract <file.t3r | dir> --protocol pka|logp [--output results.csv]
//   npx tsx app.ts gencsv --regi registry.csv --pka pkas.csv --output ./trays --protocol <name>
//
// Examples:
//   npx tsx app.ts extract ./results --protocol pka --output ./out/pkas.csv
//   npx tsx app.ts extract ./results/sample_1.t3r --protocol logp
//   npx tsx app.ts gencsv --regi registry.csv --pka pkas.csv --output ./plate_07 --protocol fast-uv-pska
//   npx tsx app.ts gencsv --regi registry.csv --pka pkas.csv --output ./plate_08 \
//       --protocol logp --logp-solvent octanol
//
// ─────────────────────────────────────────────────────────────

import { runExtract, runGenerate } from "./cli/commands";
import { USAGE, parseArgs } from "./cli/options";
import { loadRuntimeConfig } from "./config/runtimeConfig";
import { createConsoleLogger } from "./logging/logger";
import { UsageError } from "./schema/errors";

function main(argv: string[]): number {
  const options = parseArgs(argv);
  if (options.command === "help") {
    console.log(USAGE);
    return 0;
  }

  const config = loadRuntimeConfig();
  const logger = createConsoleLogger("BATCH", config.logLevel);

  switch (options.command) {
    case "extract":
      runExtract(options, config, logger);
      return 0;
    case "gencsv":
      runGenerate(options, logger);
      return 0;
  }
}

// ── Run ──────────────────────────────────────────────────────

try {
  process.exitCode = main(process.argv.slice(2));
} catch (err: unknown) {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`[ERROR] ✗ ${message}`);
  if (err instanceof UsageError) {
    console.error(USAGE);
    process.exitCode = 2;
  } else {
    process.exitCode = 1;
  }
}
