/**
 * Validation utilities for store operations
 */

import type { FilterRegistry, Key, StoreOptions } from "./types.js";
import { InvalidOptionError, KeyError } from "./errors.js";
import { BACKEND_KINDS, isBackendKind } from "./backends/index.js";

/**
 * Validate a document key
 *
 * Keys are opaque: any string is accepted, including the empty string.
 * @throws {KeyError} If the key is not a string
 */
export function validateKey(key: unknown): asserts key is Key {
  if (typeof key !== "string") {
    throw new KeyError(key);
  }
}

/**
 * Validate a filter registry
 * @throws {InvalidOptionError} If the registry is not an object of functions
 */
export function validateFilters(filters: unknown): asserts filters is FilterRegistry {
  if (filters === null || typeof filters !== "object" || Array.isArray(filters)) {
    throw new InvalidOptionError("filters", "must be an object mapping tags to functions");
  }

  for (const [tag, filter] of Object.entries(filters)) {
    if (typeof filter !== "function") {
      throw new InvalidOptionError("filters", `filter "${tag}" is not a function`);
    }
  }
}

/**
 * Validate options passed to openStore
 * @throws {InvalidOptionError} On the first invalid option
 */
export function validateStoreOptions(options: StoreOptions): void {
  if (options.root !== undefined && (typeof options.root !== "string" || !options.root)) {
    throw new InvalidOptionError("root", "must be a non-empty string");
  }

  if (options.backend !== undefined && !isBackendKind(options.backend)) {
    throw new InvalidOptionError(
      "backend",
      `expected one of ${BACKEND_KINDS.join(", ")}, got "${String(options.backend)}"`
    );
  }

  if (options.fileExtension !== undefined && typeof options.fileExtension !== "string") {
    throw new InvalidOptionError("fileExtension", "must be a string");
  }

  if (options.pathDelimiter !== undefined && typeof options.pathDelimiter !== "string") {
    throw new InvalidOptionError("pathDelimiter", "must be a string");
  }

  if (options.filters !== undefined) {
    validateFilters(options.filters);
  }
}
