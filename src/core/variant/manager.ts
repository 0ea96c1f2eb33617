/**
 * Variant preparation: filtered, define-rewritten copies of the generated
 * descriptors for one platform and build configuration.
 *
 * The modification time of each copy is the only cache: a copy at least as
 * new as its base descriptor is left alone.
 */
import * as path from 'node:path';
import type { GeneratorConfig } from '../config/schema.js';
import type { ProjectInfo, ProjectRegistry } from '../registry/types.js';
import { writeIfChanged } from '../render/writer.js';
import { xmlEscape } from '../render/template.js';
import { readFile, writeFile, fileExists, getModifiedTime } from '../../utils/file-system.js';
import { compareLexically } from '../../utils/paths.js';
import { logger } from '../../utils/logger.js';
import { RegistryError, ErrorCodes } from '../../utils/errors.js';
import { keepsDebugDefines, rewriteDefineConstants } from './defines.js';
import { rewriteProjectReferences } from './references.js';
import { rewriteSolution } from './solution.js';
import {
  PLATFORM_TRAITS,
  variantName,
  variantPath,
  variantSuffix,
  type VariantResult,
  type VariantSpec,
} from './types.js';

const log = logger.child('variant');

const PROPERTIES_FILE = 'Variant.props';
const PROJECT_OPEN_TAG = /<Project\b[^>]*>/;

export interface DeriveVariantOptions extends VariantSpec {
  projectRoot: string;
  config: GeneratorConfig;
  registry: ProjectRegistry;
}

/**
 * Whether a project takes part in a variant.
 */
export function includedInVariant(project: ProjectInfo, spec: VariantSpec): boolean {
  if (spec.configuration === 'editor') return true;
  if (project.category !== 'runtime') return false;

  const { platformName } = PLATFORM_TRAITS[spec.platform];
  if (project.includePlatforms.length > 0 && !project.includePlatforms.includes(platformName)) return false;
  return !project.excludePlatforms.includes(platformName);
}

/**
 * Copy is fresh when it exists and is not older than its source.
 */
export async function isVariantFresh(sourcePath: string, copyPath: string): Promise<boolean> {
  const [sourceTime, copyTime] = await Promise.all([getModifiedTime(sourcePath), getModifiedTime(copyPath)]);
  return sourceTime !== null && copyTime !== null && copyTime >= sourceTime;
}

export function renderVariantProperties(spec: VariantSpec): string {
  const name = variantName(spec);
  const defines = [PLATFORM_TRAITS[spec.platform].define];
  if (keepsDebugDefines(spec)) defines.push('DEBUG', 'TRACE');

  return [
    '<Project>',
    '  <PropertyGroup>',
    `    <VariantName>${name}</VariantName>`,
    `    <VariantDefineConstants>${defines.join(';')}</VariantDefineConstants>`,
    `    <BaseIntermediateOutputPath>obj/${name}/</BaseIntermediateOutputPath>`,
    '  </PropertyGroup>',
    '</Project>',
    '',
  ].join('\n');
}

/**
 * Import the properties file right after the opening `<Project>` tag.
 */
export function insertPropertiesImport(content: string, importPath: string): string {
  const importLine = `<Import Project="${xmlEscape(importPath)}" />`;
  if (content.includes(importLine)) return content;

  const match = PROJECT_OPEN_TAG.exec(content);
  if (!match) return content;

  const end = match.index + match[0].length;
  return `${content.slice(0, end)}\n  ${importLine}${content.slice(end)}`;
}

export async function deriveVariant(options: DeriveVariantOptions): Promise<VariantResult> {
  const { projectRoot, config, registry } = options;
  const spec: VariantSpec = {
    platform: options.platform,
    configuration: options.configuration,
    debug: options.debug,
  };
  const name = variantName(spec);
  const suffix = variantSuffix(spec);

  const survivors = registry.projects.filter((project) => includedInVariant(project, spec));
  const removedGuids = new Set(
    registry.projects.filter((project) => !survivors.includes(project)).map((project) => project.guid)
  );
  const retargets = new Map(survivors.map((project) => [project.outputPath, variantPath(project.outputPath, suffix)]));

  // Every base descriptor must exist before anything is written.
  const required = [registry.solution.outputPath, ...survivors.map((project) => project.outputPath)];
  for (const relativePath of required) {
    if (!(await fileExists(path.join(projectRoot, relativePath)))) {
      throw new RegistryError(
        ErrorCodes.MISSING_DESCRIPTOR,
        `Descriptor ${relativePath} not found; run generate first`,
        { path: relativePath }
      );
    }
  }

  const propertiesPath = `${config.templateRoot}/variants/${name}/${PROPERTIES_FILE}`;
  await writeIfChanged(path.join(projectRoot, propertiesPath), renderVariantProperties(spec));

  const generated: string[] = [];
  const skipped: string[] = [];

  for (const project of survivors) {
    const copyPath = variantPath(project.outputPath, suffix);
    const sourceFile = path.join(projectRoot, project.outputPath);
    const copyFile = path.join(projectRoot, copyPath);

    if (await isVariantFresh(sourceFile, copyFile)) {
      log.debug(`${copyPath} is up to date`);
      skipped.push(copyPath);
      continue;
    }

    const importPath = path.posix.relative(path.posix.dirname(copyPath), propertiesPath);
    let content = await readFile(sourceFile);
    content = rewriteDefineConstants(content, spec);
    content = rewriteProjectReferences(content, retargets);
    content = insertPropertiesImport(content, importPath);

    // Always written: an unchanged copy must still become newer than its source.
    await writeFile(copyFile, content);
    generated.push(copyPath);
  }

  const solutionPath = variantPath(registry.solution.outputPath, suffix);
  const baseSolution = await readFile(path.join(projectRoot, registry.solution.outputPath));
  await writeIfChanged(path.join(projectRoot, solutionPath), rewriteSolution(baseSolution, retargets, removedGuids));

  log.debug(`Variant ${name}: ${generated.length} generated, ${skipped.length} skipped`);
  return {
    variant: name,
    suffix,
    generated: generated.sort(compareLexically),
    skipped: skipped.sort(compareLexically),
    solutionPath,
    propertiesPath,
  };
}
