/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";

/**
 * Standard exit codes
 */
export const EXIT_CODE = {
  /** Success */
  SUCCESS: 0,
  /** Usage, validation, I/O or unknown error */
  ERROR: 1,
  /** Document not found */
  NOT_FOUND: 2,
} as const;

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? EXIT_CODE.ERROR;
  }
}

/**
 * Exit code for an error that reached the top level
 *
 * Absent documents are reported by the commands themselves, so everything
 * without an exit code of its own is a plain failure.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CliError || error instanceof CommanderError) {
    return error.exitCode;
  }

  return EXIT_CODE.ERROR;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause) {
      const cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
      message += `\n  Cause: ${cause}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
