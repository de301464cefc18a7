/**
 * Shared file I/O for path-mapping backends
 */

import type { Backend, BackendOptions, Key } from "../types.js";
import { isRegularFile, readDocument, writeDocument, errnoCode } from "../io.js";
import {
  DocumentNotFoundError,
  DocumentReadError,
  DocumentEncodingError,
} from "../errors.js";
import { logger } from "../observability/logs.js";
import { normalizeExtension } from "./codec.js";

/**
 * Base backend storing one UTF-8 file per key
 *
 * Subclasses only decide where a key lives. Reads report missing,
 * unreadable and undecodable files alike as null; the cause goes to the
 * debug log.
 */
export abstract class FileBackend implements Backend {
  readonly root: string;
  readonly extension: string;

  constructor(options: Pick<BackendOptions, "root" | "fileExtension">) {
    this.root = options.root;
    this.extension = normalizeExtension(options.fileExtension);
  }

  abstract keyToPath(key: Key): string;

  async exists(key: Key): Promise<boolean> {
    const filePath = this.keyToPath(key);
    try {
      return await isRegularFile(filePath);
    } catch (err) {
      logger.debug("backend.exists.error", {
        key,
        path: filePath,
        details: { code: errnoCode(err) ?? "UNKNOWN" },
      });
      return false;
    }
  }

  async get(key: Key): Promise<string | null> {
    const filePath = this.keyToPath(key);
    try {
      return await readDocument(filePath);
    } catch (err) {
      if (
        err instanceof DocumentNotFoundError ||
        err instanceof DocumentReadError ||
        err instanceof DocumentEncodingError
      ) {
        logger.debug("backend.read.absent", {
          key,
          path: filePath,
          details: { code: err.code, cause: errnoCode(err.cause) ?? null },
        });
        return null;
      }
      throw err;
    }
  }

  async put(key: Key, text: string): Promise<void> {
    await writeDocument(this.keyToPath(key), text);
  }

  /**
   * Path used when a key has no segments left: the root itself plus the extension
   */
  protected rootPath(): string {
    return `${this.root}${this.extension}`;
  }
}
