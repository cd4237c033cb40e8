// ─────────────────────────────────────────────────────────────
// Table Schema — In-memory CSV tables & row validation
// ─────────────────────────────────────────────────────────────

import { z } from "zod";
import { ValidationError } from "./errors";

/** A CSV table: ordered column names and rows keyed by column */
export interface CsvTable {
  /** Where the table came from, used in error messages */
  source: string;
  columns: string[];
  rows: Record<string, string>[];
}

/** Text holding a plain decimal number ("250", "-1.5", "3e-2") */
export const NumericText = z
  .string()
  .trim()
  .regex(/^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/, "must be numeric");

export const RequiredText = z.string().trim().min(1, "must not be empty");

/**
 * Throw ValidationError naming every column the table lacks.
 */
export function requireColumns(table: CsvTable, required: readonly string[]): void {
  const missing = required.filter((c) => !table.columns.includes(c));
  if (missing.length > 0) {
    throw new ValidationError(
      table.source,
      `missing required column(s): ${missing.map((c) => `"${c}"`).join(", ")}`
    );
  }
}

/** Empty or whitespace-only cells count as missing */
export function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim().length === 0;
}

/**
 * Validate every row against a zod schema, collecting all row errors
 * into one ValidationError (row numbers are 1-based data rows).
 */
export function validateRows<T>(
  source: string,
  rows: unknown[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T[] {
  const valid: T[] = [];
  const problems: string[] = [];

  rows.forEach((row, i) => {
    const parsed = schema.safeParse(row);
    if (parsed.success) {
      valid.push(parsed.data);
    } else {
      for (const issue of parsed.error.issues) {
        problems.push(`row ${i + 1} ${issue.path.join(".")}: ${issue.message}`);
      }
    }
  });

  if (problems.length > 0) {
    throw new ValidationError(source, problems.join("; "));
  }
  return valid;
}
