/**
 * Core types for Flat Pages
 */

/**
 * Logical document key, a slash-delimited path such as "my/url"
 */
export type Key = string;

/**
 * Unordered document fields; encoded in ascending field-name order
 */
export type Fields = Record<string, unknown>;

/**
 * A single named field of an ordered document
 */
export type FieldEntry = readonly [name: string, value: unknown];

/**
 * Ordered document fields; encoded in the given order
 */
export type OrderedFields = ReadonlyArray<FieldEntry> | ReadonlyMap<string, unknown>;

/**
 * Anything `put` accepts. Arrays that are not lists of `[name, value]` pairs
 * and bare scalars are stored as opaque YAML values.
 */
export type DocumentInput = Fields | OrderedFields | readonly unknown[] | string | number | boolean;

/**
 * Decoded top-level YAML value
 */
export type Document = Fields | unknown[] | string | number | boolean | Date | Uint8Array;

/**
 * Value transform selected by a filter tag in a field name
 */
export type Filter = (value: string) => string;

/**
 * Filter tag to transform
 * @example { upper: (s) => s.toUpperCase() }
 */
export type FilterRegistry = Readonly<Record<string, Filter>>;

/**
 * Available key-to-path strategies
 */
export type BackendKind = "single-folder" | "multi-folder";

/**
 * Settings shared by the file backends
 */
export interface BackendOptions {
  /** Base directory for all derived paths */
  root: string;
  /** Suffix appended to derived paths, normalized to a single leading dot */
  fileExtension: string;
  /** Separator substitute for single-folder layouts */
  pathDelimiter: string;
}

/**
 * Maps keys to files and performs raw text I/O on them
 */
export interface Backend {
  /**
   * Derive the file path for a key
   */
  keyToPath(key: Key): string;

  /**
   * Check whether the key's file exists as a regular file
   */
  exists(key: Key): Promise<boolean>;

  /**
   * Read the key's file as UTF-8 text
   * @returns File contents, or null if missing, unreadable or not UTF-8
   */
  get(key: Key): Promise<string | null>;

  /**
   * Write text to the key's file, creating parent directories
   */
  put(key: Key, text: string): Promise<void>;
}

/**
 * Configuration options for opening a store
 */
export interface StoreOptions {
  /** Root directory for stored documents (default: ".") */
  root?: string;
  /** Path mapping strategy (default: "single-folder") */
  backend?: BackendKind;
  /** File extension with or without leading dot (default: "yaml") */
  fileExtension?: string;
  /** Replacement for "/" in single-folder file names (default: "^") */
  pathDelimiter?: string;
  /** Filters applied to tagged field names on read (default: none) */
  filters?: FilterRegistry;
}

/**
 * Store interface
 */
export interface Store {
  /**
   * Check whether a document is stored under a key
   */
  exists(key: Key): Promise<boolean>;

  /**
   * Read, decode and filter the document stored under a key
   * @returns The document, or null when nothing readable is stored
   * @throws {DocumentParseError} If the stored text is not valid YAML
   */
  get(key: Key): Promise<Document | null>;

  /**
   * Encode and store a document under a key, replacing any previous one
   * @throws {DocumentWriteError} If the write fails
   */
  put(key: Key, data: DocumentInput): Promise<void>;

  /**
   * File path the active backend uses for a key
   */
  keyToPath(key: Key): string;

  /**
   * Resolved store options
   */
  readonly options: Readonly<Required<StoreOptions>>;
}
