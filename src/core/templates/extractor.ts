/**
 * Turn existing descriptors into templates with placeholders, so that a
 * project can switch from IDE-generated descriptors to this generator.
 */
import * as path from 'node:path';
import type { GeneratorConfig } from '../config/schema.js';
import { getTemplatesDir } from '../config/loader.js';
import { PLACEHOLDERS } from '../render/template.js';
import { readEditorVersion } from '../render/version.js';
import { writeIfChanged } from '../render/writer.js';
import { readFile, readFileIfExists, realPath } from '../../utils/file-system.js';
import { compareLexically } from '../../utils/paths.js';
import { logger } from '../../utils/logger.js';
import { RegistryError, ErrorCodes } from '../../utils/errors.js';
import { findSolutionFile, parseSolutionProjects } from './solution.js';

const log = logger.child('templates');

export interface ExtractTemplatesOptions {
  projectRoot: string;
  config: GeneratorConfig;
}

/**
 * Replace the generated parts of a project descriptor with placeholders.
 *
 * Comments and `<None>` items are dropped; the first `<Compile>` item and
 * the first `<ProjectReference>` item become placeholders and the rest
 * are dropped.
 */
export function templatizeDescriptor(content: string, projectRoot: string, editorVersion: string | null): string {
  const lines: string[] = [];
  let sourcesEmitted = false;
  let referencesEmitted = false;
  let inReference = false;
  let inComment = false;

  for (const rawLine of content.split('\n')) {
    let line = rawLine.split(projectRoot).join(PLACEHOLDERS.projectRoot);
    if (editorVersion) line = line.split(editorVersion).join(PLACEHOLDERS.editorVersion);

    if (inComment) {
      if (line.includes('-->')) inComment = false;
      continue;
    }
    if (line.includes('<!--')) {
      if (!line.includes('-->')) inComment = true;
      continue;
    }

    if (line.includes('<None Include="')) continue;

    if (inReference) {
      if (line.includes('</ProjectReference>')) inReference = false;
      continue;
    }
    if (line.includes('<ProjectReference Include="')) {
      if (!referencesEmitted) {
        lines.push(`    ${PLACEHOLDERS.projectReferences}`);
        referencesEmitted = true;
      }
      // Self-closing items end on the same line.
      inReference = !line.includes('/>') && !line.includes('</ProjectReference>');
      continue;
    }

    if (line.includes('<Compile Include="')) {
      if (!sourcesEmitted) {
        lines.push(`    ${PLACEHOLDERS.sourceFolders}`);
        sourcesEmitted = true;
      }
      continue;
    }

    lines.push(line);
  }

  return lines.join('\n');
}

/**
 * Replace the project blocks and per-project configuration lines of a
 * solution with placeholders.
 */
export function templatizeSolution(content: string, projectTypeGuid: string): string {
  const lines: string[] = [];
  const projectPrefix = `Project("${projectTypeGuid}") = `;
  let inProjects = false;
  let entriesEmitted = false;
  let configsEmitted = false;

  for (const line of content.split('\n')) {
    if (line.startsWith(projectPrefix)) {
      if (!entriesEmitted) {
        lines.push(PLACEHOLDERS.projectEntries);
        entriesEmitted = true;
      }
      inProjects = true;
      continue;
    }

    if (inProjects) {
      if (line.trimEnd() === 'Global') {
        inProjects = false;
        lines.push(line);
      }
      continue;
    }

    const trimmed = line.trim();
    if (
      trimmed.startsWith('{') &&
      trimmed.includes('.Debug|Any CPU.') &&
      (trimmed.includes('ActiveCfg') || trimmed.includes('Build.0'))
    ) {
      if (!configsEmitted) {
        lines.push(PLACEHOLDERS.projectConfigs);
        configsEmitted = true;
      }
      continue;
    }

    lines.push(line);
  }

  return lines.join('\n');
}

/**
 * Write one template per descriptor listed in the project's solution, plus
 * the solution template. Returns the templates written, sorted.
 */
export async function extractTemplates(options: ExtractTemplatesOptions): Promise<string[]> {
  const rootPath = await realPath(options.projectRoot);
  const templatesDir = getTemplatesDir(options.config);

  const solutionFile = await findSolutionFile(rootPath);
  const solutionContent = await readFile(solutionFile);
  const entries = parseSolutionProjects(solutionContent);
  const [first] = entries;
  if (first === undefined) {
    throw new RegistryError(
      ErrorCodes.NO_PROJECTS_IN_SOLUTION,
      `No projects found in ${path.basename(solutionFile)}`,
      { path: solutionFile }
    );
  }

  const editorVersion = await readEditorVersion(rootPath);
  const written: string[] = [];

  for (const entry of entries) {
    const descriptor = await readFileIfExists(path.join(rootPath, entry.descriptorPath));
    if (descriptor === null) {
      log.debug(`Skipping ${entry.descriptorPath}: descriptor not found`);
      continue;
    }

    const templatePath = `${templatesDir}/${entry.descriptorPath}.template`;
    const template = templatizeDescriptor(descriptor, rootPath, editorVersion);
    if (await writeIfChanged(path.join(rootPath, templatePath), template)) {
      written.push(templatePath);
    }
  }

  const solutionBase = path.basename(solutionFile, '.sln');
  const solutionTemplatePath = `${templatesDir}/${solutionBase}.sln.template`;
  if (await writeIfChanged(path.join(rootPath, solutionTemplatePath), templatizeSolution(solutionContent, first.typeGuid))) {
    written.push(solutionTemplatePath);
  }

  return written.sort(compareLexically);
}
