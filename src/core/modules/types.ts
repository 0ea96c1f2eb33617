/**
 * Module declaration and reference-extension records.
 */

/** Build category inferred from platform and define constraints. */
export type ModuleCategory = 'runtime' | 'editor' | 'test';

/**
 * A logical compilation unit declared by a declaration file.
 * Identity is `name`; records are immutable after loading.
 */
export interface ModuleRecord {
  readonly name: string;
  /** Directory holding the declaration file; the module's ownership root */
  readonly directory: string;
  /** Declaration file path, relative to the project root */
  readonly declarationPath: string;
  /** Lower-cased global identifier from the sibling .meta file, if any */
  readonly guid: string | null;
  /** Raw reference tokens, in declaration order */
  readonly references: readonly string[];
  readonly category: ModuleCategory;
  /** Platforms the module is limited to; empty means unrestricted */
  readonly includePlatforms: readonly string[];
  readonly excludePlatforms: readonly string[];
}

/**
 * Extends an existing module's ownership into another directory.
 */
export interface ReferenceExtensionRecord {
  readonly directory: string;
  readonly path: string;
  /** Raw token naming the extended module */
  readonly reference: string;
}

/**
 * Lookup tables over the loaded module records.
 */
export interface ModuleIndex {
  readonly byName: ReadonlyMap<string, ModuleRecord>;
  /** Lower-cased global identifier → module name */
  readonly byGuid: ReadonlyMap<string, string>;
}
