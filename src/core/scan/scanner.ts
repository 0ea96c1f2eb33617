/**
 * Parallel project scanner.
 *
 * The immediate children of each sub-root are listed serially; every child
 * directory then becomes one walk task with its own ScanBucket. Buckets are
 * merged only after all tasks settle, so no collection is shared between
 * concurrent walks.
 */
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { joinRelative, compareLexically } from '../../utils/paths.js';
import { logger } from '../../utils/logger.js';
import type { FileScan, ScanBucket, ScanOptions } from './types.js';

const log = logger.child('scan');

interface ClassifiedEntry {
  name: string;
  absolutePath: string;
  relativePath: string;
  isDirectory: boolean;
}

interface WalkTarget {
  absolutePath: string;
  relativePath: string;
}

/**
 * Default walk width: 75% of available CPUs, min 2, max 16.
 */
export function defaultScanConcurrency(): number {
  return Math.min(Math.max(Math.floor(os.cpus().length * 0.75), 2), 16);
}

/**
 * Entries hidden by convention: dot-prefixed (version control, OS metadata)
 * and tilde-suffixed (folders the engine ignores, editor backups).
 */
export function isIgnoredName(name: string): boolean {
  return name.startsWith('.') || name.endsWith('~');
}

function createBucket(): ScanBucket {
  return {
    sourceFiles: [],
    declarationPaths: [],
    referenceExtensionPaths: [],
    ignoredDirectories: [],
  };
}

/**
 * Scan the configured sub-roots of a project.
 */
export async function scanProjectFiles(projectRoot: string, options: ScanOptions): Promise<FileScan> {
  const rootPath = await fs.promises.realpath(projectRoot);
  const concurrency = options.concurrency ?? defaultScanConcurrency();

  const rootBucket = createBucket();
  const targets: WalkTarget[] = [];

  for (const root of options.roots) {
    const entries = await listDirectory(path.join(rootPath, root));
    if (!entries) continue;

    for (const entry of entries) {
      const classified = await classifyEntry(entry, path.join(rootPath, root), root);
      if (!classified) continue;

      if (isIgnoredName(classified.name)) {
        if (classified.isDirectory) rootBucket.ignoredDirectories.push(classified.relativePath);
        continue;
      }

      if (classified.isDirectory) {
        targets.push({ absolutePath: classified.absolutePath, relativePath: classified.relativePath });
      } else {
        collectFile(classified, options, rootBucket);
      }
    }
  }

  const buckets: ScanBucket[] = [];
  for (let i = 0; i < targets.length; i += concurrency) {
    const batch = targets.slice(i, i + concurrency);
    const results = await Promise.all(
      batch.map(async (target) => {
        const bucket = createBucket();
        await walkDirectory(target, options, bucket, new Set(), []);
        return bucket;
      })
    );
    buckets.push(...results);
  }

  log.debug(`Walked ${targets.length} subtree(s) under ${options.roots.join(', ')}`);
  return mergeBuckets(rootPath, [rootBucket, ...buckets]);
}

async function walkDirectory(
  target: WalkTarget,
  options: ScanOptions,
  bucket: ScanBucket,
  visitedLinks: Set<string>,
  ancestry: readonly string[]
): Promise<void> {
  const entries = await listDirectory(target.absolutePath);
  if (!entries) return;
  const real = await resolveRealPath(target.absolutePath);
  if (!real) return;
  const lineage = [...ancestry, real];

  const subdirectories: WalkTarget[] = [];

  for (const entry of entries) {
    const classified = await classifyEntry(entry, target.absolutePath, target.relativePath);
    if (!classified) continue;

    if (isIgnoredName(classified.name)) {
      if (classified.isDirectory) bucket.ignoredDirectories.push(classified.relativePath);
      continue;
    }

    if (!classified.isDirectory) {
      collectFile(classified, options, bucket);
      continue;
    }

    if (entry.isSymbolicLink()) {
      // Linked directories are walked once per subtree and never back into the current path.
      const linked = await resolveRealPath(classified.absolutePath);
      if (!linked || visitedLinks.has(linked)) continue;
      if (lineage.some((directory) => isWithin(directory, linked))) continue;
      visitedLinks.add(linked);
    }
    subdirectories.push({ absolutePath: classified.absolutePath, relativePath: classified.relativePath });
  }

  for (const subdirectory of subdirectories) {
    await walkDirectory(subdirectory, options, bucket, visitedLinks, lineage);
  }
}

/**
 * List a directory by name, or null when it cannot be opened.
 * Unreadable directories contribute nothing to the scan.
 */
async function listDirectory(absolutePath: string): Promise<fs.Dirent[] | null> {
  try {
    const entries = await fs.promises.readdir(absolutePath, { withFileTypes: true });
    return entries.sort((a, b) => compareLexically(a.name, b.name));
  } catch (error) {
    log.debug(`Skipping unreadable directory ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}

/**
 * Resolve an entry to a directory or regular file. Symlinks and entries
 * without a reported type fall back to stat; anything else is dropped.
 */
async function classifyEntry(
  entry: fs.Dirent,
  parentAbsolute: string,
  parentRelative: string
): Promise<ClassifiedEntry | null> {
  const absolutePath = path.join(parentAbsolute, entry.name);
  const relativePath = joinRelative(parentRelative, entry.name);

  let isDirectory = entry.isDirectory();
  let isFile = entry.isFile();

  if (entry.isSymbolicLink() || (!isDirectory && !isFile)) {
    try {
      const stat = await fs.promises.stat(absolutePath);
      isDirectory = stat.isDirectory();
      isFile = stat.isFile();
    } catch { /* dangling link or vanished entry */
      return null;
    }
  }

  if (!isDirectory && !isFile) return null;
  return { name: entry.name, absolutePath, relativePath, isDirectory };
}

async function resolveRealPath(absolutePath: string): Promise<string | null> {
  try {
    return await fs.promises.realpath(absolutePath);
  } catch { /* target vanished */
    return null;
  }
}

function isWithin(directory: string, ancestor: string): boolean {
  return directory === ancestor || directory.startsWith(ancestor.endsWith(path.sep) ? ancestor : ancestor + path.sep);
}

function collectFile(entry: ClassifiedEntry, options: ScanOptions, bucket: ScanBucket): void {
  const { source, declaration, referenceExtension } = options.extensions;
  if (entry.name.endsWith(source)) {
    bucket.sourceFiles.push(entry.relativePath);
  } else if (entry.name.endsWith(declaration)) {
    bucket.declarationPaths.push(entry.relativePath);
  } else if (entry.name.endsWith(referenceExtension)) {
    bucket.referenceExtensionPaths.push(entry.relativePath);
  }
}

function mergeBuckets(rootPath: string, buckets: ScanBucket[]): FileScan {
  const merged = createBucket();
  for (const bucket of buckets) {
    merged.sourceFiles.push(...bucket.sourceFiles);
    merged.declarationPaths.push(...bucket.declarationPaths);
    merged.referenceExtensionPaths.push(...bucket.referenceExtensionPaths);
    merged.ignoredDirectories.push(...bucket.ignoredDirectories);
  }

  return {
    rootPath,
    sourceFiles: merged.sourceFiles.sort(compareLexically),
    declarationPaths: merged.declarationPaths.sort(compareLexically),
    referenceExtensionPaths: merged.referenceExtensionPaths.sort(compareLexically),
    ignoredDirectories: merged.ignoredDirectories.sort(compareLexically),
  };
}
