/**
 * Deterministic YAML formatting for stored documents
 *
 * Invariants:
 * - Pure functions: same input always produces the same output bytes
 * - Plain objects are written in ascending field-name order, ordered
 *   field lists and maps in their given order; nested mappings are sorted
 * - Fields whose value is undefined are left out
 * - Multi-line strings are written as literal blocks, after carriage
 *   returns are dropped, tabs expanded and trailing whitespace trimmed
 *   on every line
 * - Every call builds its own encoder options; nothing is registered globally
 */

import { dump, load, type DumpOptions } from "js-yaml";
import type { Document, DocumentInput, FieldEntry, Fields } from "./types.js";
import { DocumentParseError, FormatError } from "./errors.js";

/**
 * Spaces per nesting level in written documents
 */
export const INDENT = 4;

const TAB_WIDTH = 4;

/**
 * Encoder settings: block layout only, no line folding, no anchors,
 * nested mappings sorted
 */
function dumpOptions(): DumpOptions {
  return {
    indent: INDENT,
    flowLevel: -1,
    lineWidth: -1,
    noRefs: true,
    sortKeys: true,
  };
}

/**
 * Deterministic comparison for field names using UTF-16 code unit order
 */
function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Check whether a value is a plain object (the unordered document form)
 */
export function isFields(value: unknown): value is Fields {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isFieldEntry(value: unknown): value is FieldEntry {
  return Array.isArray(value) && value.length === 2 && typeof value[0] === "string";
}

function isFieldMap(value: unknown): value is ReadonlyMap<string, unknown> {
  return value instanceof Map;
}

/**
 * Collapse repeated names: the last value wins, the first position stays
 */
function uniqueEntries(entries: Iterable<FieldEntry>): FieldEntry[] {
  return [...new Map<string, unknown>(entries)].filter(([, value]) => value !== undefined);
}

/**
 * Interpret input as an ordered field list
 * @returns Field entries, or null when the input is an opaque value
 *   (a list of non-pairs, or a scalar)
 */
export function toFieldEntries(input: unknown): FieldEntry[] | null {
  if (isFieldMap(input)) {
    return uniqueEntries(input.entries());
  }

  if (Array.isArray(input)) {
    const items: unknown[] = input;
    const entries: FieldEntry[] = [];
    for (const item of items) {
      if (!isFieldEntry(item)) {
        return null;
      }
      entries.push(item);
    }
    return uniqueEntries(entries);
  }

  if (isFields(input)) {
    return Object.keys(input)
      .sort(compareNames)
      .map((name): FieldEntry => [name, input[name]])
      .filter(([, value]) => value !== undefined);
  }

  return null;
}

/**
 * Prepare a multi-line string for literal block output
 * @example normalizeMultiline("a \r\n\tb") // "a\n    b"
 */
export function normalizeMultiline(text: string): string {
  return text
    .replace(/\r/g, "")
    .replace(/\t/g, " ".repeat(TAB_WIDTH))
    .split("\n")
    .map((line) => line.trimEnd())
    .join("\n");
}

function prepareValue(value: unknown): unknown {
  if (typeof value === "string" && value.includes("\n")) {
    return normalizeMultiline(value);
  }
  return value;
}

/**
 * Encode a document as YAML text
 * @param input - Plain object, ordered field list or map, or an opaque value
 * @param target - Name used in error messages (usually the file path)
 * @returns YAML text ending in a newline
 * @throws {FormatError} If a value cannot be represented in YAML
 */
export function encodeDocument(input: DocumentInput, target = "document"): string {
  const entries = toFieldEntries(input);

  try {
    if (entries === null) {
      return dump(input, dumpOptions());
    }

    if (entries.length === 0) {
      return dump({}, dumpOptions());
    }

    // One mapping per field keeps the given order regardless of how the
    // runtime orders object keys (integer-like names would move first)
    return entries
      .map(([name, value]) => dump({ [name]: prepareValue(value) }, dumpOptions()))
      .join("");
  } catch (err) {
    throw new FormatError(target, { cause: err });
  }
}

/**
 * Narrow a parsed YAML value to a document
 */
function toDocument(value: unknown, source: string): Document | null {
  if (value === undefined || value === null) {
    return null;
  }

  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    value instanceof Date ||
    value instanceof Uint8Array
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    const items: unknown[] = value;
    return items;
  }

  if (isFields(value)) {
    return value;
  }

  throw new DocumentParseError(source, {
    cause: new TypeError(`Unsupported top-level value: ${Object.prototype.toString.call(value)}`),
  });
}

/**
 * Decode YAML text into a document
 * @param text - YAML text
 * @param source - Name used in error messages (usually the file path)
 * @returns The decoded document, or null for an empty or null document
 * @throws {DocumentParseError} If the text is not valid YAML
 */
export function decodeDocument(text: string, source = "<string>"): Document | null {
  let value: unknown;
  try {
    value = load(text, { filename: source });
  } catch (err) {
    throw new DocumentParseError(source, { cause: err });
  }
  return toDocument(value, source);
}
