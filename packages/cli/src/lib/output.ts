/**
 * Terminal output
 */

import type { Document } from "@flatpages/sdk";

type Color = "red" | "green" | "yellow";

const COLOR_CODES: Record<Color, string> = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
};

/**
 * Render a decoded document as JSON
 *
 * YAML timestamps become ISO strings and `!!binary` values base64 strings.
 */
export function renderDocument(doc: Document, options?: { raw?: boolean }): string {
  const replacer = (_key: string, value: unknown): unknown =>
    value instanceof Uint8Array ? Buffer.from(value).toString("base64") : value;

  return JSON.stringify(doc, replacer, options?.raw ? undefined : 2);
}

/**
 * Wrap text in an ANSI color when writing to a terminal
 */
export function colorize(text: string, color: Color, isTTY: boolean): string {
  return isTTY ? `${COLOR_CODES[color]}${text}\x1b[0m` : text;
}
