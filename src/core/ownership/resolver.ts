/**
 * Ownership resolution: which module compiles the sources of a directory.
 */
import { parentDirectory, compareLexically } from '../../utils/paths.js';
import { logger } from '../../utils/logger.js';
import { resolveReference } from '../modules/declarations.js';
import type { ModuleIndex, ReferenceExtensionRecord } from '../modules/types.js';
import { resolveLegacyModule, type LegacyRules } from './legacy.js';

const log = logger.child('ownership');

/** Ownership roots: directory → owning module name. */
export type OwnershipMap = ReadonlyMap<string, string>;

export interface OwnershipMapResult {
  roots: OwnershipMap;
  warnings: string[];
}

export interface OwnershipOptions {
  /**
   * Restrict ownership to these module names. Roots of other modules are
   * left unbound, so their directories fall through to an ancestor.
   */
  knownNames?: ReadonlySet<string>;
}

/**
 * Build the ownership map from declarations and reference extensions.
 *
 * A declaration always owns its own directory; an extension only binds a
 * directory no declaration claims. Unresolvable extensions are dropped.
 */
export function buildOwnershipMap(
  index: ModuleIndex,
  extensions: readonly ReferenceExtensionRecord[],
  options: OwnershipOptions = {}
): OwnershipMapResult {
  const { knownNames } = options;
  const roots = new Map<string, string>();
  const warnings: string[] = [];
  const declaredDirectories = new Map<string, string>();

  for (const record of index.byName.values()) {
    declaredDirectories.set(record.directory, record.name);
    if (!knownNames || knownNames.has(record.name)) {
      roots.set(record.directory, record.name);
    }
  }

  const extensionOwners = new Map<string, ReferenceExtensionRecord>();
  for (const extension of extensions) {
    const moduleName = resolveReference(extension.reference, index);
    if (!moduleName) {
      log.debug(`Dropping ${extension.path}: unresolved reference '${extension.reference}'`);
      continue;
    }

    const declared = declaredDirectories.get(extension.directory);
    if (declared !== undefined) {
      warnings.push(
        `${extension.path}: reference extension ignored, directory already declares module ${declared}`
      );
      continue;
    }

    const previous = extensionOwners.get(extension.directory);
    if (previous) {
      warnings.push(`${extension.path}: reference extension ignored, ${previous.path} already binds this directory`);
      continue;
    }
    extensionOwners.set(extension.directory, extension);

    if (!knownNames || knownNames.has(moduleName)) {
      roots.set(extension.directory, moduleName);
    }
  }

  return { roots, warnings };
}

/**
 * Nearest-ancestor lookup over an ownership map.
 *
 * Every directory visited during a walk is memoized with the walk's final
 * result, so sibling lookups stop at the first cached ancestor. Instances
 * are not meant to be shared between concurrent scans.
 */
export class OwnershipResolver {
  private readonly cache = new Map<string, string | null>();

  constructor(private readonly roots: OwnershipMap) {}

  resolve(directory: string): string | null {
    const walked: string[] = [];
    let current = directory;
    let owner: string | null = null;

    for (;;) {
      const cached = this.cache.get(current);
      if (cached !== undefined) {
        owner = cached;
        break;
      }

      const root = this.roots.get(current);
      if (root !== undefined) {
        owner = root;
        walked.push(current);
        break;
      }

      walked.push(current);
      if (current === '') break;
      current = parentDirectory(current);
    }

    for (const path of walked) {
      this.cache.set(path, owner);
    }
    return owner;
  }

  /** Number of memoized directories. */
  get cacheSize(): number {
    return this.cache.size;
  }
}

export interface SourceAssignments {
  /** Module name → owned source directories, sorted */
  directoriesByModule: Map<string, string[]>;
  /** Module name → source file count */
  fileCountByModule: Map<string, number>;
  /** Directories with sources and no owner, sorted */
  unresolvedDirectories: string[];
  unresolvedFileCount: number;
}

/**
 * Assign every source-bearing directory to exactly one owner: a module via
 * nearest ancestor, else a legacy module, else unresolved.
 */
export function assignSources(
  sourceFilesByDirectory: ReadonlyMap<string, readonly string[]>,
  resolver: OwnershipResolver,
  legacyRules: LegacyRules,
  options: OwnershipOptions = {}
): SourceAssignments {
  const { knownNames } = options;
  const directoriesByModule = new Map<string, string[]>();
  const fileCountByModule = new Map<string, number>();
  const unresolvedDirectories: string[] = [];
  let unresolvedFileCount = 0;

  const directories = [...sourceFilesByDirectory.keys()].sort(compareLexically);
  for (const directory of directories) {
    const fileCount = sourceFilesByDirectory.get(directory)?.length ?? 0;

    let owner = resolver.resolve(directory);
    if (owner === null) {
      const legacy = resolveLegacyModule(directory, legacyRules);
      if (legacy !== null && (!knownNames || knownNames.has(legacy))) {
        owner = legacy;
      }
    }

    if (owner === null) {
      unresolvedDirectories.push(directory);
      unresolvedFileCount += fileCount;
      continue;
    }

    const owned = directoriesByModule.get(owner);
    if (owned) {
      owned.push(directory);
    } else {
      directoriesByModule.set(owner, [directory]);
    }
    fileCountByModule.set(owner, (fileCountByModule.get(owner) ?? 0) + fileCount);
  }

  log.debug(`Assigned ${directories.length - unresolvedDirectories.length} of ${directories.length} source directories`);
  return { directoriesByModule, fileCountByModule, unresolvedDirectories, unresolvedFileCount };
}
