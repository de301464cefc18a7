/**
 * Key and file-name helpers shared by the file backends
 */

/**
 * Characters treated as key segment separators
 */
const SEPARATOR = /[\\/]/;

/**
 * Normalize a file extension to exactly one leading dot
 * @param extension - Extension with or without leading dots (e.g. "yaml", ".yml")
 * @returns ".yaml" style suffix, or "" for an empty extension
 */
export function normalizeExtension(extension: string): string {
  const bare = extension.replace(/^\.+/, "");
  return bare ? `.${bare}` : "";
}

/**
 * Check whether a string contains a key separator
 */
export function hasSeparator(value: string): boolean {
  return SEPARATOR.test(value);
}

/**
 * Flatten a key into a single file name
 * Leading separators are dropped, remaining ones become the delimiter.
 * @example flattenKey("/a/b/c", "^") // "a^b^c"
 */
export function flattenKey(key: string, delimiter: string): string {
  const trimmed = key.replace(/^[\\/]+/, "");
  return trimmed.split(SEPARATOR).join(delimiter);
}

/**
 * Split a key into normalized path segments
 *
 * Empty and "." segments are dropped, ".." removes the previous segment,
 * and ".." with nothing left to remove is discarded so the result never
 * climbs above the root.
 * @example keySegments("../a/./b//../c") // ["a", "c"]
 */
export function keySegments(key: string): string[] {
  const segments: string[] = [];

  for (const segment of key.split(SEPARATOR)) {
    if (segment === "" || segment === ".") {
      continue;
    }
    if (segment === "..") {
      segments.pop();
      continue;
    }
    segments.push(segment);
  }

  return segments;
}
