/**
 * Store settings from flags and environment
 *
 * Each setting is taken from its flag, then its FLATPAGES_* variable, then
 * left to the SDK default (root defaults to "./content" here).
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { BACKEND_KINDS, isBackendKind } from "@flatpages/sdk";
import type { BackendKind } from "@flatpages/sdk";
import { CliError } from "./errors.js";

/**
 * Store-related global flags
 */
export interface StoreFlags {
  root?: string;
  backend?: BackendKind;
  ext?: string;
  delimiter?: string;
}

/**
 * Resolved store location and layout
 */
export interface StoreSettings {
  root: string;
  backend?: BackendKind;
  fileExtension?: string;
  pathDelimiter?: string;
}

export const DEFAULT_ROOT = "./content";

/**
 * Expand "~" and "~/..." to the home directory
 */
function expandTilde(input: string): string {
  if (input === "~") {
    return homedir();
  }

  const match = /^~[\\/](.*)$/.exec(input);
  return match ? path.join(homedir(), match[1] ?? "") : input;
}

/**
 * Resolve the store root directory to an absolute path
 */
export function resolveRoot(cliRoot?: string): string {
  return path.resolve(expandTilde(cliRoot ?? process.env.FLATPAGES_ROOT ?? DEFAULT_ROOT));
}

function envValue(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value === "" ? undefined : value;
}

function resolveBackend(flag: BackendKind | undefined): BackendKind | undefined {
  if (flag !== undefined) {
    return flag;
  }

  const value = envValue("FLATPAGES_BACKEND");
  if (value !== undefined && !isBackendKind(value)) {
    throw new CliError(
      `FLATPAGES_BACKEND must be one of: ${BACKEND_KINDS.join(", ")} (got "${value}")`
    );
  }
  return value;
}

/**
 * Combine flags with FLATPAGES_ROOT, FLATPAGES_BACKEND, FLATPAGES_EXT and
 * FLATPAGES_DELIMITER
 * @throws {CliError} If FLATPAGES_BACKEND names an unknown backend
 */
export function resolveSettings(flags: StoreFlags): StoreSettings {
  return {
    root: resolveRoot(flags.root),
    backend: resolveBackend(flags.backend),
    fileExtension: flags.ext ?? envValue("FLATPAGES_EXT"),
    pathDelimiter: flags.delimiter ?? envValue("FLATPAGES_DELIMITER"),
  };
}

/**
 * Check if command metrics should be written to stderr
 */
export function isVerbose(): boolean {
  return process.env.FLATPAGES_CLI_DEBUG === "1";
}
