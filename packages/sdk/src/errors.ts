/**
 * Error types for Flat Pages operations
 *
 * Invariants:
 * - File errors include the target path in the message
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all Flat Pages errors
 */
export abstract class FlatPagesError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a document file does not exist
 */
export class DocumentNotFoundError extends FlatPagesError {
  readonly code = "ENOENT";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Document not found: ${filePath}`, options);
  }
}

/**
 * Thrown when a document file exists but cannot be read
 */
export class DocumentReadError extends FlatPagesError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read document: ${filePath}`, options);
  }
}

/**
 * Thrown when a document file is not valid UTF-8
 */
export class DocumentEncodingError extends FlatPagesError {
  readonly code = "ENCODING_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Document is not valid UTF-8: ${filePath}`, options);
  }
}

/**
 * Thrown when a document write operation fails
 */
export class DocumentWriteError extends FlatPagesError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write document: ${filePath}`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends FlatPagesError {
  readonly code = "DIRECTORY_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Directory operation failed: ${dirPath}`, options);
  }
}

/**
 * Thrown when stored content is not valid YAML
 */
export class DocumentParseError extends FlatPagesError {
  readonly code = "PARSE_ERROR";

  constructor(source: string, options?: ErrorOptions) {
    super(`Failed to parse document: ${source}`, options);
  }
}

/**
 * Thrown when a document cannot be encoded to YAML
 */
export class FormatError extends FlatPagesError {
  readonly code = "FORMAT_ERROR";

  constructor(target: string, options?: ErrorOptions) {
    super(`Failed to format document: ${target}`, options);
  }
}

/**
 * Thrown when a key is not a string
 */
export class KeyError extends FlatPagesError {
  readonly code = "INVALID_KEY";

  constructor(key: unknown, options?: ErrorOptions) {
    super(`Key must be a string, got ${key === null ? "null" : typeof key}`, options);
  }
}

/**
 * Thrown when store options are invalid
 */
export class InvalidOptionError extends FlatPagesError {
  readonly code = "INVALID_OPTION";

  constructor(
    public readonly option: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid option "${option}": ${reason}`, options);
  }
}
