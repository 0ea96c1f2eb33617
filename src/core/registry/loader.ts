import * as path from 'node:path';
import { RegistryFileSchema, type RegistryFile } from './schema.js';
import type { ProjectRegistry } from './types.js';
import type { GeneratorConfig } from '../config/schema.js';
import { getRegistryPath } from '../config/loader.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { fileExists } from '../../utils/file-system.js';
import { deterministicGuid } from '../../utils/checksum.js';
import { RegistryError, ErrorCodes } from '../../utils/errors.js';

export interface LoadRegistryOptions {
  /** Fail when the registry file is absent instead of returning null */
  required?: boolean;
}

/**
 * Load the project registry, or null when none exists and none is required.
 */
export async function loadProjectRegistry(
  projectRoot: string,
  config: GeneratorConfig,
  options: LoadRegistryOptions = {}
): Promise<ProjectRegistry | null> {
  const relativePath = getRegistryPath(config);
  const fullPath = path.resolve(projectRoot, relativePath);

  if (!(await fileExists(fullPath))) {
    if (options.required) {
      throw new RegistryError(ErrorCodes.MISSING_REGISTRY, `Registry file not found: ${fullPath}`, {
        path: fullPath,
      });
    }
    return null;
  }

  let file: RegistryFile;
  try {
    file = await loadYamlWithSchema(fullPath, RegistryFileSchema);
  } catch (error) {
    throw new RegistryError(
      ErrorCodes.INVALID_REGISTRY,
      `Invalid registry ${relativePath}: ${error instanceof Error ? error.message : String(error)}`,
      { path: fullPath }
    );
  }

  return toProjectRegistry(file, config);
}

/**
 * Normalize a parsed registry file, filling derived identifiers.
 */
export function toProjectRegistry(file: RegistryFile, config: GeneratorConfig): ProjectRegistry {
  const seen = new Set<string>();
  for (const project of file.projects) {
    if (seen.has(project.name)) {
      throw new RegistryError(ErrorCodes.INVALID_REGISTRY, `Registry lists project '${project.name}' twice`, {
        name: project.name,
      });
    }
    seen.add(project.name);
  }

  return {
    source: 'manifest',
    solution: {
      outputPath: file.solutionPath,
      templatePath: file.solutionTemplatePath,
      projectTypeGuid: file.projectTypeGuid ?? config.projectTypeGuid,
    },
    projects: file.projects.map((project) => ({
      name: project.name,
      outputPath: project.outputPath,
      templatePath: project.templatePath,
      guid: project.guid ?? deterministicGuid(project.name),
      kind: project.kind,
      category: project.category,
      includePlatforms: project.includePlatforms,
      excludePlatforms: project.excludePlatforms,
    })),
  };
}
