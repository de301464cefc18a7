import { join } from "node:path";
import type { BackendOptions, Key } from "../types.js";
import { FileBackend } from "./file-backend.js";
import { keySegments } from "./codec.js";

/**
 * Mirrors the key hierarchy as nested directories
 *
 * "a/b/c" becomes "<root>/a/b/c.yaml". Keys are normalized first, so
 * "../../a/b/c" lands on the same file and never escapes the root.
 */
export class MultiFolderBackend extends FileBackend {
  constructor(options: Pick<BackendOptions, "root" | "fileExtension">) {
    super(options);
  }

  keyToPath(key: Key): string {
    const segments = keySegments(key);
    if (segments.length === 0) {
      return this.rootPath();
    }
    return join(this.root, ...segments) + this.extension;
  }
}
