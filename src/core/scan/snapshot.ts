/**
 * In-memory scan snapshot shared by every later pipeline stage.
 */
import { scanProjectFiles } from './scanner.js';
import type { FileScan } from './types.js';
import type { GeneratorConfig } from '../config/schema.js';
import { loadModuleRecords, loadReferenceExtensions } from '../modules/declarations.js';
import type { ModuleRecord, ReferenceExtensionRecord } from '../modules/types.js';
import { parentDirectory } from '../../utils/paths.js';

export interface ScanSnapshot {
  /** Real (symlink-resolved) absolute project root */
  rootPath: string;
  /** Source-bearing directory → its direct source files */
  sourceFilesByDirectory: ReadonlyMap<string, readonly string[]>;
  records: readonly ModuleRecord[];
  extensions: readonly ReferenceExtensionRecord[];
  ignoredDirectories: readonly string[];
  /** Total number of source files found */
  sourceFileCount: number;
}

/**
 * Group source files by the directory that directly contains them.
 */
export function groupByDirectory(files: readonly string[]): Map<string, string[]> {
  const grouped = new Map<string, string[]>();
  for (const file of files) {
    const directory = parentDirectory(file);
    const existing = grouped.get(directory);
    if (existing) {
      existing.push(file);
    } else {
      grouped.set(directory, [file]);
    }
  }
  return grouped;
}

/**
 * Build a snapshot from a completed file scan.
 */
export async function buildScanSnapshot(scan: FileScan): Promise<ScanSnapshot> {
  const [records, extensions] = await Promise.all([
    loadModuleRecords(scan.rootPath, scan.declarationPaths),
    loadReferenceExtensions(scan.rootPath, scan.referenceExtensionPaths),
  ]);

  return {
    rootPath: scan.rootPath,
    sourceFilesByDirectory: groupByDirectory(scan.sourceFiles),
    records,
    extensions,
    ignoredDirectories: scan.ignoredDirectories,
    sourceFileCount: scan.sourceFiles.length,
  };
}

/**
 * Scan the configured sub-roots and load every record found.
 */
export async function scanProjectTree(projectRoot: string, config: GeneratorConfig): Promise<ScanSnapshot> {
  const scan = await scanProjectFiles(projectRoot, {
    roots: config.sourceRoots,
    extensions: config.extensions,
    concurrency: config.scanConcurrency,
  });
  return buildScanSnapshot(scan);
}
