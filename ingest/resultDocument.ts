// ─────────────────────────────────────────────────────────────
// Result Document — Shared model for instrument result files
// ─────────────────────────────────────────────────────────────
//
// Field locations common to every assay:
//   DirectControlAssayResultsFile
//     ├── Summary            { AssayName, StartTime, SampleName }
//     ├── AssayData.AssayTemplate.Category
//     └── ProcessedData.AssayQuality.Quality
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import { XMLValidator } from "fast-xml-parser";
import { Logger } from "../logging/logger";
import {
  DocumentReadError,
  InvalidFieldError,
  WrongAssayTypeError,
} from "../schema/errors";
import {
  AssayCategory,
  SampleMetadata,
  parseAssayCategory,
} from "../schema/resultSchema";
import { TreeReader, XmlRecord, parseXmlTree } from "./xmlTree";

export const ROOT_ELEMENT = "DirectControlAssayResultsFile";

const CATEGORY_PATH = ["AssayData", "AssayTemplate", "Category"];

/**
 * Read a file and fold it into a tree. Fails with DocumentReadError
 * for unreadable files, text that is not well-formed XML, or a
 * foreign root.
 */
export function loadResultTree(filePath: string): XmlRecord {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err: unknown) {
    throw new DocumentReadError(path.basename(filePath), err instanceof Error ? err.message : String(err));
  }

  const filename = path.basename(filePath);
  const body = content.replace(/^\uFEFF/, "").trimStart();
  if (!body.startsWith("<")) {
    throw new DocumentReadError(filename, "content is not XML markup");
  }

  const check = XMLValidator.validate(body);
  if (check !== true) {
    const { msg, line, col } = check.err;
    throw new DocumentReadError(filename, `malformed XML at line ${line}, column ${col}: ${msg}`);
  }

  const tree = parseXmlTree(body);
  if (!tree) {
    throw new DocumentReadError(filename, "no root element");
  }
  if (!(ROOT_ELEMENT in tree)) {
    throw new DocumentReadError(
      filename,
      `root element is <${Object.keys(tree)[0]}>, expected <${ROOT_ELEMENT}>`
    );
  }
  return tree;
}

/**
 * Base class for a parsed result document. Subclasses declare the
 * category they accept; a mismatch fails during construction.
 */
export abstract class ResultDocument<C extends AssayCategory = AssayCategory> {
  abstract readonly category: C;

  protected readonly reader: TreeReader;
  readonly filename: string;

  protected constructor(
    readonly filePath: string,
    tree: XmlRecord,
    expected: C,
    protected readonly logger: Logger
  ) {
    this.filename = path.basename(filePath);
    this.reader = TreeReader.of(this.filename, tree[ROOT_ELEMENT], [ROOT_ELEMENT]);

    const declared = this.declaredCategory();
    if (declared !== expected) {
      throw new WrongAssayTypeError(this.filename, expected, declared);
    }
    logger.debug(`Loaded ${this.filename} (${declared.toUpperCase()})`);
  }

  /** Category the document itself declares */
  declaredCategory(): AssayCategory {
    return parseAssayCategory(this.reader.text(CATEGORY_PATH), this.filename);
  }

  sampleName(): string {
    return this.reader.text(["Summary", "SampleName"]);
  }

  assayName(): string {
    return this.reader.text(["Summary", "AssayName"]);
  }

  assayQuality(): string {
    return this.reader.text(["ProcessedData", "AssayQuality", "Quality"]);
  }

  /** Raw StartTime text as recorded by the instrument */
  assayStartTime(): string {
    return this.reader.text(["Summary", "StartTime"]);
  }

  assayTimestamp(): Date {
    const raw = this.assayStartTime();
    const parsed = new Date(raw);
    if (Number.isNaN(parsed.getTime())) {
      throw new InvalidFieldError(this.filename, "Summary.StartTime", `"${raw}" is not an ISO timestamp`);
    }
    return parsed;
  }

  sampleMetadata(): SampleMetadata {
    return {
      sample: this.sampleName(),
      filename: this.filename,
      assay_name: this.assayName(),
      assay_quality: this.assayQuality(),
      assay_datetime: this.assayStartTime(),
    };
  }
}

/**
 * Read only the declared category of a result file.
 */
export function detectAssayCategory(filePath: string): AssayCategory {
  const filename = path.basename(filePath);
  const tree = loadResultTree(filePath);
  const reader = TreeReader.of(filename, tree[ROOT_ELEMENT], [ROOT_ELEMENT]);
  const category = reader.find(CATEGORY_PATH);
  if (typeof category !== "string") {
    throw new DocumentReadError(filename, "could not determine assay category");
  }
  return parseAssayCategory(category, filename);
}
