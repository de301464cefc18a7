/**
 * Flat Pages SDK
 *
 * Flat-file YAML page store keyed by URL-like paths
 */

// Re-export types
export type {
  Key,
  Fields,
  FieldEntry,
  OrderedFields,
  DocumentInput,
  Document,
  Filter,
  FilterRegistry,
  BackendKind,
  BackendOptions,
  Backend,
  StoreOptions,
  Store,
} from "./types.js";

// Re-export backends
export {
  createBackend,
  isBackendKind,
  BACKEND_KINDS,
  FileBackend,
  SingleFolderBackend,
  MultiFolderBackend,
  normalizeExtension,
} from "./backends/index.js";

// Re-export codec and filters
export {
  encodeDocument,
  decodeDocument,
  normalizeMultiline,
  isFields,
  toFieldEntries,
  INDENT,
} from "./format.js";
export { applyFilters, applyFieldFilters, parseFieldName, FILTER_SEPARATOR } from "./filters.js";
export { validateKey, validateStoreOptions } from "./validation.js";

// Re-export I/O operations
export { readDocument, writeDocument, ensureDirectory, isRegularFile } from "./io.js";

// Re-export logging
export { logger, formatLogEntry } from "./observability/logs.js";
export { matchesDebugPattern } from "./observability/logs.js";
export type { LogEntry, LogSink } from "./observability/logs.js";

// Re-export errors
export {
  FlatPagesError,
  DocumentNotFoundError,
  DocumentReadError,
  DocumentEncodingError,
  DocumentWriteError,
  DirectoryError,
  DocumentParseError,
  FormatError,
  KeyError,
  InvalidOptionError,
} from "./errors.js";

export { openStore, DEFAULT_OPTIONS } from "./store.js";
