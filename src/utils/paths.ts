/**
 * Project-relative path algebra.
 *
 * Paths handled here are always relative to the real project root, use '/'
 * separators and never start or end with one. The empty string is the root.
 */

/**
 * Parent of a relative path; the parent of a top-level entry is ''.
 */
export function parentDirectory(relativePath: string): string {
  const slash = relativePath.lastIndexOf('/');
  return slash === -1 ? '' : relativePath.slice(0, slash);
}

/**
 * Number of path components ('' has depth 0).
 */
export function pathDepth(relativePath: string): number {
  return relativePath === '' ? 0 : relativePath.split('/').length;
}

/**
 * True when `child` equals `ancestor` or lies beneath it.
 * Every path descends from the root ('').
 */
export function isDescendantOrSame(child: string, ancestor: string): boolean {
  return ancestor === '' || child === ancestor || child.startsWith(`${ancestor}/`);
}

/**
 * Append a child name to a relative directory.
 */
export function joinRelative(directory: string, name: string): string {
  return directory === '' ? name : `${directory}/${name}`;
}

/**
 * Remove duplicates, keeping the first occurrence of each value.
 */
export function deduplicatePreservingOrder(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

/**
 * Lexical comparison by UTF-16 code unit, independent of locale.
 */
export function compareLexically(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
