/**
 * Backend selection
 */

import type { Backend, BackendKind, BackendOptions } from "../types.js";
import { InvalidOptionError } from "../errors.js";
import { SingleFolderBackend } from "./single-folder.js";
import { MultiFolderBackend } from "./multi-folder.js";

const BACKENDS: Record<BackendKind, (options: BackendOptions) => Backend> = {
  "single-folder": (options) => new SingleFolderBackend(options),
  "multi-folder": (options) => new MultiFolderBackend(options),
};

/**
 * Names of the available backends
 */
export const BACKEND_KINDS: readonly BackendKind[] = ["single-folder", "multi-folder"];

/**
 * Check whether a string names a backend
 */
export function isBackendKind(value: string): value is BackendKind {
  return Object.hasOwn(BACKENDS, value);
}

/**
 * Build the backend for a path-mapping strategy
 * @param kind - Strategy name
 * @param options - Root, extension and delimiter
 * @throws {InvalidOptionError} If the strategy is unknown or the options are invalid
 */
export function createBackend(kind: string, options: BackendOptions): Backend {
  if (!isBackendKind(kind)) {
    throw new InvalidOptionError(
      "backend",
      `expected one of ${BACKEND_KINDS.join(", ")}, got "${kind}"`
    );
  }
  return BACKENDS[kind](options);
}

export { FileBackend } from "./file-backend.js";
export { SingleFolderBackend } from "./single-folder.js";
export { MultiFolderBackend } from "./multi-folder.js";
export { normalizeExtension, flattenKey, keySegments } from "./codec.js";
