import { join } from "node:path";
import type { BackendOptions, Key } from "../types.js";
import { InvalidOptionError } from "../errors.js";
import { FileBackend } from "./file-backend.js";
import { flattenKey, hasSeparator } from "./codec.js";

/**
 * Stores every document directly in the root directory
 *
 * Key separators are replaced with the delimiter, so "a/b/c" becomes
 * "<root>/a^b^c.yaml". Keys whose flattened names coincide share a file.
 * The extension is part of the file name, so "." and ".." name files
 * ("<root>/..yaml", "<root>/...yaml") rather than directories.
 */
export class SingleFolderBackend extends FileBackend {
  readonly delimiter: string;

  constructor(options: BackendOptions) {
    super(options);

    if (!options.pathDelimiter) {
      throw new InvalidOptionError("pathDelimiter", "must be a non-empty string");
    }
    if (hasSeparator(options.pathDelimiter)) {
      throw new InvalidOptionError(
        "pathDelimiter",
        `cannot contain a path separator: "${options.pathDelimiter}"`
      );
    }

    this.delimiter = options.pathDelimiter;
  }

  keyToPath(key: Key): string {
    const file = flattenKey(key, this.delimiter) + this.extension;
    // Without an extension these would name the root or its parent
    if (file === "" || file === "." || file === "..") {
      return this.rootPath();
    }
    return join(this.root, file);
  }
}
