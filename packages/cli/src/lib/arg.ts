/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { BACKEND_KINDS, isBackendKind, isFields } from "@flatpages/sdk";
import type { BackendKind, DocumentInput } from "@flatpages/sdk";
import { BUILTIN_FILTER_NAMES } from "./store.js";
import { CliError } from "./errors.js";

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new CliError(`Invalid JSON in ${source}: ${err.message}`, { cause: err });
    }
    throw err;
  }
}

/**
 * Parse the --backend option
 */
export function parseBackend(value: string): BackendKind {
  if (!isBackendKind(value)) {
    throw new InvalidArgumentError(`Backend must be one of: ${BACKEND_KINDS.join(", ")}`);
  }
  return value;
}

/**
 * Collect repeated --filter options
 */
export function collectFilter(value: string, previous: string[] = []): string[] {
  if (!BUILTIN_FILTER_NAMES.includes(value)) {
    throw new InvalidArgumentError(
      `Unknown filter "${value}". Available: ${BUILTIN_FILTER_NAMES.join(", ")}`
    );
  }
  return [...previous, value];
}

/**
 * Turn parsed JSON into a storable document
 * @param value - Parsed JSON
 * @param ordered - Keep the field order of a JSON object instead of sorting
 */
export function toDocumentInput(value: unknown, ordered = false): DocumentInput {
  if (isFields(value)) {
    return ordered ? Object.entries(value) : value;
  }

  if (Array.isArray(value)) {
    const items: unknown[] = value;
    return items;
  }

  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }

  throw new CliError("Document must be a JSON object, array or scalar, not null");
}
