// ─────────────────────────────────────────────────────────────
// Error Taxonomy — Named failures for extraction & scheduling
// ─────────────────────────────────────────────────────────────
//
// Per-document errors (caught and recorded by the aggregator):
//   DocumentReadError, UnknownAssayCategoryError, WrongAssayTypeError,
//   NoPkaDataError, MissingFieldError, InvalidFieldError
//
// Batch-level errors (always propagate to the CLI):
//   InputNotFoundError, NoInputFilesError, ValidationError,
//   OutputExistsError, ExperimentSectionNotImplementedError, UsageError
// ─────────────────────────────────────────────────────────────

/** Common base so callers can tell our failures from programming errors */
export class AssayFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// ── Per-document ─────────────────────────────────────────────

export class DocumentReadError extends AssayFileError {
  constructor(readonly filename: string, reason: string) {
    super(`Could not read result document ${filename}: ${reason}`);
  }
}

export class UnknownAssayCategoryError extends AssayFileError {
  constructor(readonly value: string, readonly filename?: string) {
    super(
      `Unrecognized assay category "${value}"${filename ? ` in ${filename}` : ""} (expected PKA or LOGP)`
    );
  }
}

export class WrongAssayTypeError extends AssayFileError {
  constructor(
    readonly filename: string,
    readonly expected: string,
    readonly actual: string
  ) {
    super(
      `${filename} is a ${actual.toUpperCase()} assay, expected ${expected.toUpperCase()}`
    );
  }
}

export class NoPkaDataError extends AssayFileError {
  constructor(readonly filename: string, searched: string[]) {
    super(`Could not find pKa results in ${filename} (looked under ${searched.join(", ")})`);
  }
}

export class MissingFieldError extends AssayFileError {
  constructor(readonly filename: string, readonly fieldPath: string) {
    super(`Missing field ${fieldPath} in ${filename}`);
  }
}

export class InvalidFieldError extends AssayFileError {
  constructor(
    readonly filename: string,
    readonly fieldPath: string,
    reason: string
  ) {
    super(`Invalid field ${fieldPath} in ${filename}: ${reason}`);
  }
}

// ── Batch-level ──────────────────────────────────────────────

export class InputNotFoundError extends AssayFileError {
  constructor(readonly inputPath: string) {
    super(`Input path not found: ${inputPath}`);
  }
}

export class NoInputFilesError extends AssayFileError {
  constructor(readonly directory: string, extension: string) {
    super(`No ${extension} files found in directory: ${directory}`);
  }
}

export class ValidationError extends AssayFileError {
  constructor(readonly source: string, reason: string) {
    super(`${source}: ${reason}`);
  }
}

export class OutputExistsError extends AssayFileError {
  constructor(readonly outputDir: string) {
    super(`Output directory already exists: ${outputDir}`);
  }
}

export class ExperimentSectionNotImplementedError extends AssayFileError {
  constructor(readonly protocol: string) {
    super(`Protocol "${protocol}" has no experiment section implementation`);
  }
}

export class UsageError extends AssayFileError {}
