/**
 * Text blocks substituted into project and solution templates.
 */
import type { CompilePattern } from '../patterns/synthesizer.js';
import type { ModuleIndex } from '../modules/types.js';
import { resolveReference } from '../modules/declarations.js';
import type { ProjectInfo, ProjectRegistry } from '../registry/types.js';
import { deduplicatePreservingOrder } from '../../utils/paths.js';
import { xmlEscape } from './template.js';

const ITEM_INDENT = '    ';
const SOLUTION_CONFIGURATION = 'Debug|Any CPU';

/**
 * One `<Compile>` item per pattern.
 */
export function renderCompilePatterns(patterns: readonly CompilePattern[]): string {
  return patterns
    .map((pattern) => {
      const include = `Include="${xmlEscape(pattern.include)}"`;
      if (pattern.exclude.length === 0) {
        return `${ITEM_INDENT}<Compile ${include} />`;
      }
      return `${ITEM_INDENT}<Compile ${include} Exclude="${xmlEscape(pattern.exclude.join(';'))}" />`;
    })
    .join('\n');
}

/**
 * Resolve raw reference tokens to known projects.
 * Unresolvable tokens, unknown projects and the project itself are skipped;
 * the first occurrence of each target wins.
 */
export function resolveProjectReferences(
  selfName: string,
  tokens: readonly string[],
  index: ModuleIndex,
  projectsByName: ReadonlyMap<string, ProjectInfo>
): ProjectInfo[] {
  const names: string[] = [];
  for (const token of tokens) {
    const name = resolveReference(token, index);
    if (name === null || name === selfName || !projectsByName.has(name)) continue;
    names.push(name);
  }

  const resolved: ProjectInfo[] = [];
  for (const name of deduplicatePreservingOrder(names)) {
    const project = projectsByName.get(name);
    if (project) resolved.push(project);
  }
  return resolved;
}

export function renderProjectReferences(references: readonly ProjectInfo[]): string {
  return references
    .map((project) =>
      [
        `${ITEM_INDENT}<ProjectReference Include="${xmlEscape(project.outputPath)}">`,
        `${ITEM_INDENT}  <Project>${project.guid}</Project>`,
        `${ITEM_INDENT}  <Name>${xmlEscape(project.name)}</Name>`,
        `${ITEM_INDENT}</ProjectReference>`,
      ].join('\n')
    )
    .join('\n');
}

/**
 * `Project(...)` blocks for the solution index, in registry order.
 */
export function renderSolutionEntries(registry: ProjectRegistry): string {
  const typeGuid = registry.solution.projectTypeGuid;
  return registry.projects
    .map(
      (project) =>
        `Project("${typeGuid}") = "${project.name}", "${project.outputPath}", "${project.guid}"\nEndProject`
    )
    .join('\n');
}

/**
 * Per-project build configuration lines for the solution index.
 */
export function renderSolutionConfigs(registry: ProjectRegistry): string {
  return registry.projects
    .flatMap((project) => [
      `\t\t${project.guid}.${SOLUTION_CONFIGURATION}.ActiveCfg = ${SOLUTION_CONFIGURATION}`,
      `\t\t${project.guid}.${SOLUTION_CONFIGURATION}.Build.0 = ${SOLUTION_CONFIGURATION}`,
    ])
    .join('\n');
}
