/**
 * Compile-pattern synthesis: turn a module's owned directories into a
 * minimal list of include/exclude globs.
 */
import {
  compareLexically,
  deduplicatePreservingOrder,
  isDescendantOrSame,
  parentDirectory,
  pathDepth,
} from '../../utils/paths.js';
import type { OwnershipMap, OwnershipResolver } from '../ownership/resolver.js';

export interface CompilePattern {
  include: string;
  /** Lexical descendants of (or equal to) the include directory, first-seen order */
  exclude: string[];
}

/**
 * Glob matching the direct source files of one directory.
 */
export function flatPattern(directory: string, extension: string): string {
  return directory === '' ? `*${extension}` : `${directory}/*${extension}`;
}

/**
 * Glob matching every source file beneath a directory.
 */
export function recursivePattern(directory: string, extension: string): string {
  return directory === '' ? `**/*${extension}` : `${directory}/**/*${extension}`;
}

/**
 * One non-recursive include per owned directory, sorted by include.
 */
export function synthesizeFlatPatterns(directories: Iterable<string>, extension: string): CompilePattern[] {
  return [...new Set(directories)]
    .map((directory) => ({ include: flatPattern(directory, extension), exclude: [] }))
    .sort((a, b) => compareLexically(a.include, b.include));
}

export interface RecursivePatternInput {
  moduleName: string;
  /** Ownership roots of every module */
  roots: OwnershipMap;
  /** Nearest-ancestor lookup over the same roots */
  resolver: OwnershipResolver;
  /** Pruned directories found by the scan */
  ignoredDirectories: readonly string[];
  extension: string;
}

/**
 * One recursive include per region the module owns, excluding nested
 * regions owned by other modules and pruned directories.
 *
 * A root is emitted unless its parent already resolves to the same module,
 * so nested roots of one module collapse into the outermost one while a
 * root inside another module's excluded region keeps its own include.
 */
export function synthesizeRecursivePatterns(input: RecursivePatternInput): CompilePattern[] {
  const { moduleName, roots, resolver, ignoredDirectories, extension } = input;

  const ownRoots: string[] = [];
  const foreignRoots: string[] = [];
  for (const [directory, owner] of roots) {
    (owner === moduleName ? ownRoots : foreignRoots).push(directory);
  }
  foreignRoots.sort(compareLexically);

  const emitted = ownRoots
    .filter((root) => root === '' || resolver.resolve(parentDirectory(root)) !== moduleName)
    .sort(compareLexically);
  if (emitted.length === 0) return [];

  // Deepest emitted root containing a directory; its include is the one to carve.
  const owningEmittedRoot = (directory: string): string | undefined => {
    let best: string | undefined;
    for (const root of emitted) {
      if (isDescendantOrSame(directory, root) && (best === undefined || pathDepth(root) > pathDepth(best))) {
        best = root;
      }
    }
    return best;
  };

  const excludesByRoot = new Map<string, string[]>(emitted.map((root) => [root, []]));
  const candidates = [...foreignRoots, ...[...ignoredDirectories].sort(compareLexically)];
  for (const directory of candidates) {
    if (directory === '' || resolver.resolve(parentDirectory(directory)) !== moduleName) continue;
    const root = owningEmittedRoot(directory);
    if (root === undefined) continue;
    excludesByRoot.get(root)?.push(recursivePattern(directory, extension));
  }

  return emitted
    .map((root) => ({
      include: recursivePattern(root, extension),
      exclude: deduplicatePreservingOrder(excludesByRoot.get(root) ?? []),
    }))
    .sort((a, b) => compareLexically(a.include, b.include));
}
