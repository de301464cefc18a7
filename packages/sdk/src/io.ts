/**
 * File I/O for stored documents
 *
 * Invariants:
 * - Reads are UTF-8 only; missing files throw DocumentNotFoundError,
 *   undecodable bytes throw DocumentEncodingError
 * - Writes create parent directories first and overwrite in place
 * - Every failure is wrapped in a FlatPagesError carrying the original cause
 */

import * as fs from "node:fs/promises";
import { dirname } from "node:path";
import {
  DocumentNotFoundError,
  DocumentReadError,
  DocumentEncodingError,
  DocumentWriteError,
  DirectoryError,
} from "./errors.js";

/**
 * Extract the errno code from a filesystem error
 */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Ensure a directory exists, creating it and parent directories as needed
 * @param dirPath - Directory path to create
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  if (!dirPath) {
    throw new DirectoryError(String(dirPath), {
      cause: new TypeError("Directory path must be a non-empty string"),
    });
  }

  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new DirectoryError(dirPath, { cause: err });
  }
}

/**
 * Write content to a file, creating its directory first
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 */
export async function writeDocument(filePath: string, content: string): Promise<void> {
  await ensureDirectory(dirname(filePath));

  try {
    await fs.writeFile(filePath, content, "utf-8");
  } catch (err) {
    throw new DocumentWriteError(filePath, { cause: err });
  }
}

/**
 * Read a document file as strict UTF-8
 * @param filePath - File path to read
 * @returns File contents, without a byte order mark
 * @throws DocumentNotFoundError if file doesn't exist
 * @throws DocumentEncodingError if the bytes are not valid UTF-8
 * @throws DocumentReadError for other read failures
 */
export async function readDocument(filePath: string): Promise<string> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(filePath);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      throw new DocumentNotFoundError(filePath, { cause: err });
    }
    throw new DocumentReadError(filePath, { cause: err });
  }

  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (err) {
    throw new DocumentEncodingError(filePath, { cause: err });
  }
}

/**
 * Check whether a path exists and is a regular file
 * @param filePath - File path to check
 * @throws The underlying stat error for anything but a missing path
 */
export async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch (err) {
    const code = errnoCode(err);
    if (code === "ENOENT" || code === "ENOTDIR") {
      return false;
    }
    throw err;
  }
}
