/**
 * Build a project registry from the templates directory when no registry
 * file exists.
 */
import * as path from 'node:path';
import type { ProjectInfo, ProjectRegistry } from './types.js';
import type { GeneratorConfig } from '../config/schema.js';
import { getTemplatesDir } from '../config/loader.js';
import type { ModuleIndex } from '../modules/types.js';
import { inferCategoryFromName } from '../modules/category.js';
import { isLegacyModuleName } from '../ownership/legacy.js';
import { globFiles } from '../../utils/file-system.js';
import { deterministicGuid } from '../../utils/checksum.js';
import { compareLexically } from '../../utils/paths.js';
import { TemplateError, ErrorCodes } from '../../utils/errors.js';

export const PROJECT_TEMPLATE_SUFFIX = '.csproj.template';
export const SOLUTION_TEMPLATE_SUFFIX = '.sln.template';

export interface DiscoveryResult {
  registry: ProjectRegistry;
  warnings: string[];
}

/**
 * One project per `*.csproj.template`, matched against declared modules and
 * the legacy names.
 *
 * @param sourcedModules - declared modules that own at least one source
 *   directory; those without a template are reported
 */
export async function discoverProjects(
  projectRoot: string,
  config: GeneratorConfig,
  index: ModuleIndex,
  sourcedModules: ReadonlySet<string> = new Set()
): Promise<DiscoveryResult> {
  const templatesDir = getTemplatesDir(config);
  const templateFiles = await globFiles(['*.csproj.template', '*.sln.template'], {
    cwd: path.resolve(projectRoot, templatesDir),
    deep: 1,
  });

  const warnings: string[] = [];
  const projects: ProjectInfo[] = [];

  for (const file of templateFiles.filter((f) => f.endsWith(PROJECT_TEMPLATE_SUFFIX))) {
    const outputPath = file.slice(0, -'.template'.length);
    const name = outputPath.slice(0, -'.csproj'.length);
    const templatePath = `${templatesDir}/${file}`;
    const record = index.byName.get(name);

    if (record) {
      projects.push({
        name,
        outputPath,
        templatePath,
        guid: deterministicGuid(name),
        kind: 'declared',
        category: record.category,
        includePlatforms: [...record.includePlatforms],
        excludePlatforms: [...record.excludePlatforms],
      });
    } else if (isLegacyModuleName(name)) {
      projects.push({
        name,
        outputPath,
        templatePath,
        guid: deterministicGuid(name),
        kind: 'legacy',
        category: inferCategoryFromName(name),
        includePlatforms: [],
        excludePlatforms: [],
      });
    } else {
      warnings.push(`template ${file} matches no module`);
    }
  }

  const templated = new Set(projects.map((p) => p.name));
  for (const name of [...sourcedModules].sort(compareLexically)) {
    if (index.byName.has(name) && !templated.has(name)) {
      warnings.push(`module ${name} has sources but no template`);
    }
  }

  const solutionName = pickSolutionName(
    config,
    templateFiles.filter((f) => f.endsWith(SOLUTION_TEMPLATE_SUFFIX)),
    warnings
  );
  if (solutionName === null) {
    throw new TemplateError(
      ErrorCodes.MISSING_SOLUTION_TEMPLATE,
      `No solution template (*${SOLUTION_TEMPLATE_SUFFIX}) in ${templatesDir}`,
      { directory: templatesDir }
    );
  }

  return {
    registry: {
      source: 'discovered',
      solution: {
        outputPath: `${solutionName}.sln`,
        templatePath: `${templatesDir}/${solutionName}${SOLUTION_TEMPLATE_SUFFIX}`,
        projectTypeGuid: config.projectTypeGuid,
      },
      projects: projects.sort((a, b) => compareLexically(a.name, b.name)),
    },
    warnings,
  };
}

function pickSolutionName(config: GeneratorConfig, solutionTemplates: string[], warnings: string[]): string | null {
  // A configured name is checked when the template is loaded.
  if (config.solutionName) return config.solutionName;

  const [first] = solutionTemplates;
  if (first === undefined) return null;
  if (solutionTemplates.length > 1) {
    warnings.push(`several solution templates found, using ${first}`);
  }
  return first.slice(0, -SOLUTION_TEMPLATE_SUFFIX.length);
}
