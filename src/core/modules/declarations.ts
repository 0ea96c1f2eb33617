/**
 * Loading of module-declaration and reference-extension files.
 *
 * Only the ownership-relevant fields are read; everything else in the
 * files is ignored.
 */
import * as path from 'node:path';
import { z } from 'zod';
import { readFile, readFileIfExists } from '../../utils/file-system.js';
import { parentDirectory } from '../../utils/paths.js';
import { OwnershipError, ErrorCodes } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';
import { logger } from '../../utils/logger.js';
import { inferCategory } from './category.js';
import type { ModuleIndex, ModuleRecord, ReferenceExtensionRecord } from './types.js';

const log = logger.child('modules');

const GUID_REFERENCE_PREFIX = 'GUID:';
const GUID_LENGTH = 32;

const DeclarationFileSchema = z.object({
  name: z.string().optional(),
  references: z.array(z.string()).default([]),
  includePlatforms: z.array(z.string()).default([]),
  excludePlatforms: z.array(z.string()).default([]),
  defineConstraints: z.array(z.string()).default([]),
});

const ReferenceExtensionFileSchema = z.object({
  reference: z.string().optional(),
});

/**
 * Parse a JSON record file, failing with the file path on malformed input.
 */
async function readJsonRecord<T>(
  rootPath: string,
  relativePath: string,
  schema: z.ZodType<T>
): Promise<T> {
  // Some editors write a byte-order mark.
  const content = (await readFile(path.join(rootPath, relativePath))).replace(/^\uFEFF/, '');

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new OwnershipError(
      ErrorCodes.INVALID_DECLARATION,
      `Invalid JSON in ${relativePath}: ${error instanceof Error ? error.message : String(error)}`,
      { path: relativePath }
    );
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new OwnershipError(
      ErrorCodes.INVALID_DECLARATION,
      `Invalid record in ${relativePath}: ${formatZodError(result.error)}`,
      { path: relativePath }
    );
  }
  return result.data;
}

/**
 * Read the global identifier from an asset's .meta sidecar.
 */
export async function loadMetaGuid(rootPath: string, relativePath: string): Promise<string | null> {
  const content = await readFileIfExists(path.join(rootPath, `${relativePath}.meta`));
  if (content === null) return null;

  for (const line of content.split('\n')) {
    if (line.startsWith('guid:')) {
      const guid = line.slice('guid:'.length).trim();
      return guid ? guid.toLowerCase() : null;
    }
  }
  return null;
}

/**
 * Load one ModuleRecord per declaration file. Files without a name are skipped.
 */
export async function loadModuleRecords(rootPath: string, declarationPaths: string[]): Promise<ModuleRecord[]> {
  const records = await Promise.all(
    declarationPaths.map(async (relativePath): Promise<ModuleRecord | null> => {
      const raw = await readJsonRecord(rootPath, relativePath, DeclarationFileSchema);
      if (!raw.name) {
        log.debug(`Skipping ${relativePath}: no module name`);
        return null;
      }
      return {
        name: raw.name,
        directory: parentDirectory(relativePath),
        declarationPath: relativePath,
        guid: await loadMetaGuid(rootPath, relativePath),
        references: raw.references,
        category: inferCategory(raw.includePlatforms, raw.defineConstraints),
        includePlatforms: raw.includePlatforms,
        excludePlatforms: raw.excludePlatforms,
      };
    })
  );
  return records.filter((record): record is ModuleRecord => record !== null);
}

/**
 * Load reference-extension records. Files without a reference are skipped.
 */
export async function loadReferenceExtensions(
  rootPath: string,
  extensionPaths: string[]
): Promise<ReferenceExtensionRecord[]> {
  const records = await Promise.all(
    extensionPaths.map(async (relativePath): Promise<ReferenceExtensionRecord | null> => {
      const raw = await readJsonRecord(rootPath, relativePath, ReferenceExtensionFileSchema);
      if (!raw.reference) {
        log.debug(`Skipping ${relativePath}: no reference`);
        return null;
      }
      return { directory: parentDirectory(relativePath), path: relativePath, reference: raw.reference };
    })
  );
  return records.filter((record): record is ReferenceExtensionRecord => record !== null);
}

/**
 * Index records by name and global identifier.
 * Module names must be unique across the whole scan.
 */
export function indexModules(records: ModuleRecord[]): ModuleIndex {
  const byName = new Map<string, ModuleRecord>();
  const byGuid = new Map<string, string>();

  for (const record of records) {
    const existing = byName.get(record.name);
    if (existing) {
      throw new OwnershipError(
        ErrorCodes.DUPLICATE_MODULE,
        `Duplicate module name '${record.name}' (${existing.declarationPath}, ${record.declarationPath})`,
        { name: record.name, paths: [existing.declarationPath, record.declarationPath] }
      );
    }
    byName.set(record.name, record);
    if (record.guid) byGuid.set(record.guid, record.name);
  }

  return { byName, byGuid };
}

/**
 * Resolve a raw reference token to a module name.
 *
 * Accepted forms: a module name, `GUID:<identifier>`, or a bare identifier.
 * Identifier lookups are case-insensitive.
 */
export function resolveReference(token: string, index: ModuleIndex): string | null {
  if (index.byName.has(token)) return token;

  if (token.startsWith(GUID_REFERENCE_PREFIX)) {
    return index.byGuid.get(token.slice(GUID_REFERENCE_PREFIX.length).toLowerCase()) ?? null;
  }

  if (token.length === GUID_LENGTH) {
    return index.byGuid.get(token.toLowerCase()) ?? null;
  }

  return null;
}
