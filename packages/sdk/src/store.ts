/**
 * Main store implementation
 */

import type {
  Backend,
  Document,
  DocumentInput,
  Key,
  Store,
  StoreOptions,
} from "./types.js";
import { createBackend } from "./backends/index.js";
import { encodeDocument, decodeDocument } from "./format.js";
import { applyFilters } from "./filters.js";
import { validateKey, validateStoreOptions } from "./validation.js";
import { logger } from "./observability/logs.js";

/**
 * Option defaults
 */
export const DEFAULT_OPTIONS = {
  root: ".",
  backend: "single-folder",
  fileExtension: "yaml",
  pathDelimiter: "^",
} as const satisfies StoreOptions;

/**
 * Flat-file YAML page store
 *
 * Maps each key to one YAML file through the configured backend. Reads are
 * not cached: every get goes back to disk.
 *
 * @example
 * ```typescript
 * const store = openStore({ root: "./content" });
 *
 * await store.put("my/url", [
 *   ["title", "foo"],
 *   ["body", "foo\nbar"],
 * ]);
 *
 * await store.get("my/url"); // { title: "foo", body: "foo\nbar" }
 * await store.get("not/found"); // null
 * ```
 */
class FlatPageStore implements Store {
  #options: Readonly<Required<StoreOptions>>;
  #backend: Backend;

  constructor(options: StoreOptions) {
    validateStoreOptions(options);

    this.#options = Object.freeze({
      root: options.root ?? DEFAULT_OPTIONS.root,
      backend: options.backend ?? DEFAULT_OPTIONS.backend,
      fileExtension: options.fileExtension ?? DEFAULT_OPTIONS.fileExtension,
      pathDelimiter: options.pathDelimiter ?? DEFAULT_OPTIONS.pathDelimiter,
      filters: Object.freeze({ ...options.filters }),
    });

    this.#backend = createBackend(this.#options.backend, {
      root: this.#options.root,
      fileExtension: this.#options.fileExtension,
      pathDelimiter: this.#options.pathDelimiter,
    });
  }

  get options(): Readonly<Required<StoreOptions>> {
    return this.#options;
  }

  keyToPath(key: Key): string {
    validateKey(key);
    return this.#backend.keyToPath(key);
  }

  /**
   * Check whether a document is stored under a key
   *
   * @param key - Document key
   * @returns false for missing keys and for paths that are not regular files
   */
  async exists(key: Key): Promise<boolean> {
    validateKey(key);
    return this.#backend.exists(key);
  }

  /**
   * Read a document
   *
   * Decodes the stored YAML and applies filter tags found in field names.
   *
   * @param key - Document key
   * @returns The document, or null if nothing readable is stored
   * @throws {DocumentParseError} If the stored text is not valid YAML
   *
   * @example
   * ```typescript
   * const store = openStore({ root: "./content", filters: { upper: (s) => s.toUpperCase() } });
   * // file contains "title|upper: hello"
   * await store.get("page"); // { title: "HELLO" }
   * ```
   */
  async get(key: Key): Promise<Document | null> {
    validateKey(key);

    const text = await this.#backend.get(key);
    if (text === null) {
      return null;
    }

    const filePath = this.#backend.keyToPath(key);
    logger.debug("store.get", { key, path: filePath });

    return applyFilters(decodeDocument(text, filePath), this.#options.filters);
  }

  /**
   * Store or replace a document
   *
   * Plain objects are written with sorted field names; `[name, value]` lists
   * and maps keep their order. Other arrays and scalars are written as-is.
   *
   * @param key - Document key
   * @param data - Document to store
   * @throws {FormatError} If the document cannot be encoded
   * @throws {DirectoryError} If the parent directory cannot be created
   * @throws {DocumentWriteError} If the file cannot be written
   */
  async put(key: Key, data: DocumentInput): Promise<void> {
    validateKey(key);

    const filePath = this.#backend.keyToPath(key);
    const text = encodeDocument(data, filePath);

    await this.#backend.put(key, text);
    logger.debug("store.put", { key, path: filePath, details: { bytes: Buffer.byteLength(text) } });
  }
}

/**
 * Open a store
 * @param options - Store configuration; every option has a default
 * @returns Store instance
 * @throws {InvalidOptionError} If an option is invalid
 */
export function openStore(options: StoreOptions = {}): Store {
  return new FlatPageStore(options);
}
