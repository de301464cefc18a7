/**
 * Reading documents for `put`
 */

import * as fs from "node:fs/promises";
import type { DocumentInput } from "@flatpages/sdk";
import { parseJson, toDocumentInput } from "./arg.js";
import { CliError } from "./errors.js";

/** Largest document accepted on stdin */
export const MAX_STDIN_BYTES = 10 * 1024 * 1024;

/**
 * Where the document comes from; stdin when neither file nor data is given
 */
export interface InputSource {
  file?: string;
  data?: string;
  /** Keep a JSON object's field order */
  ordered?: boolean;
}

type InputStream = AsyncIterable<string | Uint8Array> & { isTTY?: boolean };

/**
 * Read a stream to the end as UTF-8, refusing more than `maxBytes`
 */
export async function readStream(stream: InputStream, maxBytes = MAX_STDIN_BYTES): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of stream) {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk);
    size += bytes.length;
    if (size > maxBytes) {
      throw new CliError(`stdin too large (max ${Math.floor(maxBytes / (1024 * 1024))}MB)`);
    }
    chunks.push(bytes);
  }

  return Buffer.concat(chunks).toString("utf8");
}

async function readSourceText(source: InputSource, stdin: InputStream): Promise<[string, string]> {
  // Validate mutual exclusivity
  if (source.file !== undefined && source.data !== undefined) {
    throw new CliError("Cannot use both --file and --data; choose one or use stdin");
  }

  if (source.file !== undefined) {
    try {
      return [await fs.readFile(source.file, "utf8"), `file ${source.file}`];
    } catch (err) {
      throw new CliError(`Cannot read ${source.file}`, { cause: err });
    }
  }

  if (source.data !== undefined) {
    return [source.data, "--data"];
  }

  if (stdin.isTTY) {
    throw new CliError("No input provided. Use --file, --data, or pipe JSON to stdin");
  }

  const text = await readStream(stdin);
  if (!text.trim()) {
    throw new CliError("stdin is empty");
  }
  return [text, "stdin"];
}

/**
 * Read and parse the JSON document for `put`
 * @throws {CliError} On conflicting sources, unreadable input or invalid JSON
 */
export async function readDocumentInput(
  source: InputSource,
  stdin: InputStream = process.stdin
): Promise<DocumentInput> {
  const [text, label] = await readSourceText(source, stdin);
  return toDocumentInput(parseJson(text, label), source.ordered);
}
