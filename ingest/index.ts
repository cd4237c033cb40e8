// ─────────────────────────────────────────────────────────────
// Ingest Index — Result document dispatcher by assay category
// ─────────────────────────────────────────────────────────────

import { Logger } from "../logging/logger";
import { AssayCategory, ResultRowMap } from "../schema/resultSchema";
import { LogPResultDocument } from "./logpDocument";
import { PkaResultDocument } from "./pkaDocument";
import { detectAssayCategory } from "./resultDocument";

/** Document model produced for each assay category */
export interface ResultDocumentMap {
  pka: PkaResultDocument;
  logp: LogPResultDocument;
}

export type AnyResultDocument = ResultDocumentMap[AssayCategory];

type DocumentOpener<C extends AssayCategory> = (filePath: string, logger: Logger) => ResultDocumentMap[C];

type RowReader<C extends AssayCategory> = (filePath: string, logger: Logger) => ResultRowMap[C][];

const OPENERS: { [C in AssayCategory]: DocumentOpener<C> } = {
  pka: (filePath, logger) => PkaResultDocument.open(filePath, logger),
  logp: (filePath, logger) => LogPResultDocument.open(filePath, logger),
};

const ROW_READERS: { [C in AssayCategory]: RowReader<C> } = {
  pka: (filePath, logger) => PkaResultDocument.open(filePath, logger).toRows(),
  logp: (filePath, logger) => LogPResultDocument.open(filePath, logger).toRows(),
};

/**
 * Open a result document as the given category.
 * Fails with WrongAssayTypeError if the file declares another one.
 */
export function openResultDocument<C extends AssayCategory>(
  filePath: string,
  category: C,
  logger: Logger
): ResultDocumentMap[C] {
  const open: DocumentOpener<C> = OPENERS[category];
  return open(filePath, logger);
}

/**
 * Open a result document and return its normalized rows.
 */
export function readResultRows<C extends AssayCategory>(
  filePath: string,
  category: C,
  logger: Logger
): ResultRowMap[C][] {
  const read: RowReader<C> = ROW_READERS[category];
  return read(filePath, logger);
}

export { PkaResultDocument, LogPResultDocument, detectAssayCategory };
export { LOGP_VALUE_POLICY } from "./logpDocument";
