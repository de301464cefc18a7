/**
 * Read-time field filters
 *
 * A field named "body|md|upper" holds a value that should pass through the
 * "md" and then the "upper" filter. Recognized tags are applied and removed
 * from the name; unknown tags stay in the name so they remain visible.
 */

import type { Document, Filter, FilterRegistry } from "./types.js";
import { isFields } from "./format.js";

/**
 * Separates a field's base name from its filter tags
 */
export const FILTER_SEPARATOR = "|";

/**
 * Split a field name into its base name and filter tags
 * @example parseFieldName("body|md|upper") // { base: "body", tags: ["md", "upper"] }
 */
export function parseFieldName(name: string): { base: string; tags: string[] } {
  const [base = "", ...tags] = name.split(FILTER_SEPARATOR);
  return { base, tags };
}

function lookupFilter(registry: FilterRegistry, tag: string): Filter | undefined {
  return Object.hasOwn(registry, tag) ? registry[tag] : undefined;
}

/**
 * Apply the filter tags of one field
 *
 * Tags are folded left to right. A registered tag transforms the running
 * value; an unregistered tag, or any tag met while the value is not a
 * string, is appended back to the name.
 * @returns The resulting field name and value
 */
export function applyFieldFilters(
  name: string,
  value: unknown,
  registry: FilterRegistry
): [string, unknown] {
  if (!name.includes(FILTER_SEPARATOR)) {
    return [name, value];
  }

  const { base, tags } = parseFieldName(name);
  let resultName = base;
  let current = value;

  for (const tag of tags) {
    const filter = lookupFilter(registry, tag);
    if (filter && typeof current === "string") {
      current = filter(current);
    } else {
      resultName += `${FILTER_SEPARATOR}${tag}`;
    }
  }

  return [resultName, current];
}

/**
 * Apply filter tags to every top-level field of a decoded document
 *
 * Returns a new object with fields in their original positions. When two
 * fields end up with the same name, the later one's value is kept.
 * Documents that are not mappings are returned unchanged.
 */
export function applyFilters(document: Document | null, registry: FilterRegistry): Document | null {
  if (!isFields(document)) {
    return document;
  }

  return Object.fromEntries(
    Object.entries(document).map(([name, value]) => applyFieldFilters(name, value, registry))
  );
}
