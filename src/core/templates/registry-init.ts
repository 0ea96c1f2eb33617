/**
 * Seed a project registry from an existing solution.
 */
import * as path from 'node:path';
import type { GeneratorConfig } from '../config/schema.js';
import { getRegistryPath, getTemplatesDir } from '../config/loader.js';
import type { RegistryFile } from '../registry/schema.js';
import { scanProjectTree } from '../scan/snapshot.js';
import { indexModules } from '../modules/declarations.js';
import { inferCategoryFromName } from '../modules/category.js';
import { writeIfChanged } from '../render/writer.js';
import { readFile, realPath } from '../../utils/file-system.js';
import { stringifyYaml } from '../../utils/yaml.js';
import { RegistryError, ErrorCodes } from '../../utils/errors.js';
import { findSolutionFile, parseSolutionProjects } from './solution.js';

export interface InitRegistryOptions {
  projectRoot: string;
  config: GeneratorConfig;
}

export interface InitRegistryResult {
  /** Registry path, relative to the project root */
  registryPath: string;
  written: boolean;
  projectCount: number;
}

/**
 * Write a registry listing every project of the solution. Projects with a
 * declaration of the same name are `declared`; the rest are `legacy`.
 * Identifiers are kept from the solution.
 */
export async function initRegistry(options: InitRegistryOptions): Promise<InitRegistryResult> {
  const { config } = options;
  const rootPath = await realPath(options.projectRoot);
  const templatesDir = getTemplatesDir(config);

  const solutionFile = await findSolutionFile(rootPath);
  const entries = parseSolutionProjects(await readFile(solutionFile));
  const [first] = entries;
  if (first === undefined) {
    throw new RegistryError(
      ErrorCodes.NO_PROJECTS_IN_SOLUTION,
      `No projects found in ${path.basename(solutionFile)}`,
      { path: solutionFile }
    );
  }

  const snapshot = await scanProjectTree(rootPath, config);
  const index = indexModules([...snapshot.records]);

  const solutionName = path.basename(solutionFile);
  const registry: RegistryFile = {
    solutionPath: solutionName,
    solutionTemplatePath: `${templatesDir}/${path.basename(solutionName, '.sln')}.sln.template`,
    projectTypeGuid: first.typeGuid,
    projects: entries.map((entry) => {
      const record = index.byName.get(entry.name);
      return {
        name: entry.name,
        outputPath: entry.descriptorPath,
        templatePath: `${templatesDir}/${entry.descriptorPath}.template`,
        guid: entry.projectGuid,
        kind: record ? 'declared' : 'legacy',
        category: record ? record.category : inferCategoryFromName(entry.name),
        includePlatforms: record ? [...record.includePlatforms] : [],
        excludePlatforms: record ? [...record.excludePlatforms] : [],
      };
    }),
  };

  const registryPath = getRegistryPath(config);
  const written = await writeIfChanged(path.join(rootPath, registryPath), stringifyYaml(registry));
  return { registryPath, written, projectCount: registry.projects.length };
}
