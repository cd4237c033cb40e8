// ─────────────────────────────────────────────────────────────
// XML Tree — Fold instrument XML into a nested key/value tree
// ─────────────────────────────────────────────────────────────
//
// Shape of the folded tree:
//   <A x="1">text</A>        → { A: { "@x": "1", "#text": "text" } }
//   <A><B>1</B><B>2</B></A>  → { A: { B: ["1", "2"] } }
//   <A>text</A>              → { A: "text" }
//   <A/>                     → { A: null }
//
// Repeated siblings become arrays, a single child stays a scalar
// or record, so readers must accept both (see asList).
// ─────────────────────────────────────────────────────────────

import * as cheerio from "cheerio";
import { ChildNode, Element, isCDATA, isTag, isText } from "domhandler";
import { InvalidFieldError, MissingFieldError } from "../schema/errors";

export type XmlValue = string | null | XmlRecord | XmlValue[];

export interface XmlRecord {
  [key: string]: XmlValue;
}

/**
 * Parse markup into a tree keyed by the root element's tag name.
 * Returns null when the text holds no element at all.
 */
export function parseXmlTree(xml: string): XmlRecord | null {
  const $ = cheerio.load(xml, { xml: true });
  const roots = $.root().children().toArray();
  if (roots.length === 0) return null;

  const tree: XmlRecord = {};
  for (const el of roots) {
    appendChild(tree, el.tagName, foldElement(el));
  }
  return tree;
}

function foldElement(el: Element): XmlValue {
  const record: XmlRecord = {};
  let hasKeys = false;

  for (const [name, value] of Object.entries(el.attribs)) {
    record[`@${name}`] = value;
    hasKeys = true;
  }

  for (const child of el.children) {
    if (isTag(child)) {
      appendChild(record, child.tagName, foldElement(child));
      hasKeys = true;
    }
  }

  const text = collectText(el.children).trim();
  if (!hasKeys) {
    return text.length > 0 ? text : null;
  }
  if (text.length > 0) {
    record["#text"] = text;
  }
  return record;
}

function collectText(nodes: ChildNode[]): string {
  let text = "";
  for (const node of nodes) {
    if (isText(node)) {
      text += node.data;
    } else if (isCDATA(node)) {
      text += collectText(node.children);
    }
  }
  return text;
}

function appendChild(record: XmlRecord, key: string, value: XmlValue): void {
  if (!(key in record)) {
    record[key] = value;
    return;
  }
  const existing = record[key];
  if (Array.isArray(existing)) {
    existing.push(value);
  } else {
    record[key] = [existing, value];
  }
}

// ── Readers ──────────────────────────────────────────────────

export function isRecord(value: XmlValue | undefined): value is XmlRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Normalize "one record or a list of records" into a list */
export function asList(value: XmlValue): XmlValue[] {
  return Array.isArray(value) ? value : [value];
}

/**
 * Walks a folded tree by key path, reporting the dotted path of the
 * first missing key against the owning file.
 */
export class TreeReader {
  constructor(
    readonly filename: string,
    private readonly root: XmlRecord
  ) {}

  /** Value at path, or undefined if any segment is absent */
  find(path: readonly string[]): XmlValue | undefined {
    let current: XmlValue | undefined = this.root;
    for (const key of path) {
      if (!isRecord(current) || !(key in current)) return undefined;
      current = current[key];
    }
    return current;
  }

  has(path: readonly string[]): boolean {
    return this.find(path) !== undefined;
  }

  require(path: readonly string[]): XmlValue {
    const value = this.find(path);
    if (value === undefined) {
      throw new MissingFieldError(this.filename, path.join("."));
    }
    return value;
  }

  /** Reader rooted at a sub-record */
  at(path: readonly string[]): TreeReader {
    return TreeReader.of(this.filename, this.require(path), path);
  }

  /** Text payload at path; `#text` is used when the element carries attributes */
  text(path: readonly string[]): string {
    return textOf(this.require(path), this.filename, path);
  }

  number(path: readonly string[]): number {
    return toNumber(this.text(path), this.filename, path);
  }

  static of(filename: string, value: XmlValue, path: readonly string[] = []): TreeReader {
    if (!isRecord(value)) {
      throw new InvalidFieldError(filename, path.join(".") || "(root)", "expected a nested element");
    }
    return new TreeReader(filename, value);
  }
}

export function textOf(value: XmlValue, filename: string, path: readonly string[]): string {
  if (typeof value === "string") return value;
  if (isRecord(value)) {
    const inner = value["#text"];
    if (typeof inner === "string") return inner;
  }
  if (value === null || (isRecord(value) && !("#text" in value))) {
    throw new MissingFieldError(filename, [...path, "#text"].join("."));
  }
  throw new InvalidFieldError(filename, path.join("."), "expected a single text value");
}

export function toNumber(text: string, filename: string, path: readonly string[]): number {
  const trimmed = text.trim();
  const value = trimmed.length > 0 ? Number(trimmed) : NaN;
  if (!Number.isFinite(value)) {
    throw new InvalidFieldError(filename, path.join("."), `"${text}" is not a number`);
  }
  return value;
}
