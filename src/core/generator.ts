/**
 * Descriptor generation pipeline.
 *
 * scan → ownership → compile patterns → render → write. Every fatal check
 * runs while descriptors are rendered in memory; writing starts only once
 * all of them succeeded.
 */
import * as path from 'node:path';
import type { GeneratorConfig } from './config/schema.js';
import { scanProjectTree, type ScanSnapshot } from './scan/snapshot.js';
import { indexModules } from './modules/declarations.js';
import type { ModuleIndex } from './modules/types.js';
import {
  buildOwnershipMap,
  OwnershipResolver,
  assignSources,
  type OwnershipMap,
  type SourceAssignments,
} from './ownership/resolver.js';
import type { LegacyRules } from './ownership/legacy.js';
import {
  synthesizeFlatPatterns,
  synthesizeRecursivePatterns,
  type CompilePattern,
} from './patterns/synthesizer.js';
import { loadProjectRegistry } from './registry/loader.js';
import { discoverProjects } from './registry/discovery.js';
import type { ProjectInfo, ProjectRegistry } from './registry/types.js';
import { PLACEHOLDERS, renderTemplate, usesPlaceholder } from './render/template.js';
import {
  renderCompilePatterns,
  renderProjectReferences,
  renderSolutionConfigs,
  renderSolutionEntries,
  resolveProjectReferences,
} from './render/descriptor.js';
import { loadEditorVersion } from './render/version.js';
import { writeIfChanged } from './render/writer.js';
import { deriveVariant } from './variant/manager.js';
import type { VariantResult, VariantSpec } from './variant/types.js';
import { readFileIfExists, realPath } from '../utils/file-system.js';
import { compareLexically } from '../utils/paths.js';
import { logger } from '../utils/logger.js';
import { OwnershipError, TemplateError, ErrorCodes } from '../utils/errors.js';

const log = logger.child('render');

export interface GenerateOptions {
  projectRoot: string;
  config: GeneratorConfig;
  /** Sample unresolved directories into the warnings */
  verbose?: boolean;
  /** Fail when the registry file is missing instead of discovering projects */
  requireRegistry?: boolean;
}

export interface ProjectStats {
  sourceFiles: number;
  patterns: number;
}

export interface GenerationStats {
  registrySource: ProjectRegistry['source'];
  sourceFileCount: number;
  /** Project name → counts */
  projects: Record<string, ProjectStats>;
  unresolvedDirectoryCount: number;
  unresolvedFileCount: number;
}

export interface GenerateResult {
  /** Files written by this run, relative to the project root, sorted */
  updatedFiles: string[];
  warnings: string[];
  stats: GenerationStats;
}

interface RenderedFile {
  path: string;
  content: string;
}

function legacyRulesOf(config: GeneratorConfig): LegacyRules {
  return {
    legacyRoot: config.legacyRoot,
    firstPassDirectories: config.firstPassDirectories,
    editorDirectoryName: config.editorDirectoryName,
  };
}

interface ResolvedRegistry {
  registry: ProjectRegistry;
  warnings: string[];
}

/**
 * The registry file when present, else projects discovered from templates.
 */
async function resolveRegistry(
  rootPath: string,
  config: GeneratorConfig,
  snapshot: ScanSnapshot,
  index: ModuleIndex,
  requireRegistry: boolean
): Promise<ResolvedRegistry> {
  const manifest = await loadProjectRegistry(rootPath, config, { required: requireRegistry });
  if (manifest) {
    const declared = manifest.projects.filter((project) => project.kind === 'declared');
    if (declared.length > 0 && index.byName.size === 0) {
      throw new OwnershipError(ErrorCodes.NO_DECLARATIONS, 'No module declarations found', {
        roots: config.sourceRoots,
      });
    }
    for (const project of declared) {
      if (!index.byName.has(project.name)) {
        throw new OwnershipError(
          ErrorCodes.MISSING_DECLARATION,
          `Registry project '${project.name}' has no module declaration`,
          { name: project.name }
        );
      }
    }
    return { registry: manifest, warnings: [] };
  }

  if (index.byName.size === 0) {
    throw new OwnershipError(ErrorCodes.NO_DECLARATIONS, 'No module declarations found', {
      roots: config.sourceRoots,
    });
  }

  // Unrestricted ownership, only to report modules that have no template.
  const { roots } = buildOwnershipMap(index, snapshot.extensions);
  const unrestricted = assignSources(
    snapshot.sourceFilesByDirectory,
    new OwnershipResolver(roots),
    legacyRulesOf(config)
  );
  return discoverProjects(rootPath, config, index, new Set(unrestricted.directoriesByModule.keys()));
}

function compilePatternsFor(
  project: ProjectInfo,
  assignments: SourceAssignments,
  roots: OwnershipMap,
  resolver: OwnershipResolver,
  snapshot: ScanSnapshot,
  config: GeneratorConfig
): CompilePattern[] {
  const extension = config.extensions.source;
  const directories = assignments.directoriesByModule.get(project.name) ?? [];

  if (project.kind === 'legacy' || config.patternMode === 'flat') {
    return synthesizeFlatPatterns(directories, extension);
  }

  const ownsRoot = [...roots.values()].includes(project.name);
  if (!ownsRoot) return synthesizeFlatPatterns(directories, extension);

  return synthesizeRecursivePatterns({
    moduleName: project.name,
    roots,
    resolver,
    ignoredDirectories: snapshot.ignoredDirectories,
    extension,
  });
}

async function loadTemplate(rootPath: string, templatePath: string, code: string): Promise<string> {
  const template = await readFileIfExists(path.join(rootPath, templatePath));
  if (template === null) {
    throw new TemplateError(code, `Template not found: ${templatePath}`, { path: templatePath });
  }
  return template;
}

/**
 * Regenerate every project descriptor and the solution index.
 * A second run over an unchanged tree writes nothing.
 */
export async function generate(options: GenerateOptions): Promise<GenerateResult> {
  const { config } = options;
  const rootPath = await realPath(options.projectRoot);

  const snapshot = await scanProjectTree(rootPath, config);
  const index = indexModules([...snapshot.records]);
  log.debug(
    `Scanned ${snapshot.sourceFileCount} source file(s), ${index.byName.size} module(s), ${snapshot.extensions.length} extension(s)`
  );

  const { registry, warnings: registryWarnings } = await resolveRegistry(
    rootPath,
    config,
    snapshot,
    index,
    options.requireRegistry ?? false
  );
  const warnings = [...registryWarnings];
  const knownNames = new Set(registry.projects.map((project) => project.name));
  const projectsByName = new Map(registry.projects.map((project) => [project.name, project]));

  const ownership = buildOwnershipMap(index, snapshot.extensions, { knownNames });
  warnings.push(...ownership.warnings);
  const resolver = new OwnershipResolver(ownership.roots);
  const assignments = assignSources(snapshot.sourceFilesByDirectory, resolver, legacyRulesOf(config), {
    knownNames,
  });

  // Templates first: a missing one aborts before any rendering or writing.
  const templates = new Map<string, string>();
  for (const project of registry.projects) {
    templates.set(project.name, await loadTemplate(rootPath, project.templatePath, ErrorCodes.MISSING_TEMPLATE));
  }
  const solutionTemplate = await loadTemplate(
    rootPath,
    registry.solution.templatePath,
    ErrorCodes.MISSING_SOLUTION_TEMPLATE
  );

  const needsVersion = [...templates.values()].some((template) =>
    usesPlaceholder(template, PLACEHOLDERS.editorVersion)
  );
  const editorVersion = needsVersion ? await loadEditorVersion(rootPath) : undefined;

  const rendered: RenderedFile[] = [];
  const projectStats: Record<string, ProjectStats> = {};

  for (const project of registry.projects) {
    const patterns = compilePatternsFor(project, assignments, ownership.roots, resolver, snapshot, config);
    const references =
      project.kind === 'declared'
        ? resolveProjectReferences(project.name, index.byName.get(project.name)?.references ?? [], index, projectsByName)
        : [];

    rendered.push({
      path: project.outputPath,
      content: renderTemplate(templates.get(project.name) ?? '', {
        [PLACEHOLDERS.sourceFolders]: renderCompilePatterns(patterns),
        [PLACEHOLDERS.projectReferences]: renderProjectReferences(references),
        [PLACEHOLDERS.projectRoot]: rootPath,
        [PLACEHOLDERS.editorVersion]: editorVersion,
      }),
    });
    projectStats[project.name] = {
      sourceFiles: assignments.fileCountByModule.get(project.name) ?? 0,
      patterns: patterns.length,
    };
  }

  rendered.push({
    path: registry.solution.outputPath,
    content: renderTemplate(solutionTemplate, {
      [PLACEHOLDERS.projectEntries]: renderSolutionEntries(registry),
      [PLACEHOLDERS.projectConfigs]: renderSolutionConfigs(registry),
    }),
  });

  const updatedFiles: string[] = [];
  for (const file of rendered) {
    if (await writeIfChanged(path.join(rootPath, file.path), file.content)) {
      log.debug(`Wrote ${file.path}`);
      updatedFiles.push(file.path);
    }
  }

  if (assignments.unresolvedFileCount > 0) {
    warnings.push(
      `${assignments.unresolvedFileCount} source file(s) in ${assignments.unresolvedDirectories.length} director${
        assignments.unresolvedDirectories.length === 1 ? 'y' : 'ies'
      } belong to no project`
    );
    if (options.verbose) {
      warnings.push(
        ...assignments.unresolvedDirectories
          .slice(0, config.unresolvedSampleSize)
          .map((directory) => `unresolved: ${directory}`)
      );
    }
  }

  return {
    updatedFiles: updatedFiles.sort(compareLexically),
    warnings,
    stats: {
      registrySource: registry.source,
      sourceFileCount: snapshot.sourceFileCount,
      projects: projectStats,
      unresolvedDirectoryCount: assignments.unresolvedDirectories.length,
      unresolvedFileCount: assignments.unresolvedFileCount,
    },
  };
}

export interface PrepareVariantOptions extends VariantSpec {
  projectRoot: string;
  config: GeneratorConfig;
  requireRegistry?: boolean;
}

/**
 * Derive the descriptor copies of one variant from the last generation.
 */
export async function prepareVariant(options: PrepareVariantOptions): Promise<VariantResult> {
  const { config } = options;
  const rootPath = await realPath(options.projectRoot);

  // Categories and platforms come from the registry, or from the scan when
  // projects are discovered.
  let registry = await loadProjectRegistry(rootPath, config, { required: options.requireRegistry ?? false });
  if (!registry) {
    const snapshot = await scanProjectTree(rootPath, config);
    const index = indexModules([...snapshot.records]);
    registry = (await resolveRegistry(rootPath, config, snapshot, index, false)).registry;
  }

  return deriveVariant({
    projectRoot: rootPath,
    config,
    registry,
    platform: options.platform,
    configuration: options.configuration,
    debug: options.debug,
  });
}
