/**
 * Types for the project filesystem scan.
 */

/**
 * Categorized paths found by one walk over the configured sub-roots.
 * All paths are relative to the real project root and sorted.
 */
export interface FileScan {
  /** Real (symlink-resolved) absolute project root */
  rootPath: string;
  /** Compilable source files */
  sourceFiles: string[];
  /** Module-declaration files */
  declarationPaths: string[];
  /** Module-reference-extension files */
  referenceExtensionPaths: string[];
  /** Pruned '.'-prefixed or '~'-suffixed directories (subtree roots only) */
  ignoredDirectories: string[];
}

/**
 * Per-worker result buffer. Owned by exactly one worker until merge.
 */
export interface ScanBucket {
  sourceFiles: string[];
  declarationPaths: string[];
  referenceExtensionPaths: string[];
  ignoredDirectories: string[];
}

export interface ScanOptions {
  /** Sub-roots relative to the project root */
  roots: string[];
  extensions: {
    source: string;
    declaration: string;
    referenceExtension: string;
  };
  /** Maximum number of subtrees walked at once */
  concurrency?: number;
}
