/**
 * Reading of existing solution index files.
 */
import * as path from 'node:path';
import { globFiles } from '../../utils/file-system.js';
import { RegistryError, ErrorCodes } from '../../utils/errors.js';

export interface SolutionProjectEntry {
  typeGuid: string;
  name: string;
  /** Descriptor path as written in the solution */
  descriptorPath: string;
  projectGuid: string;
}

const PROJECT_LINE_PREFIX = 'Project("';

/**
 * The quoted values of a `Project("…") = "…", "…", "…"` line, or null for
 * any other line.
 */
export function parseProjectLine(line: string): SolutionProjectEntry | null {
  if (!line.startsWith(PROJECT_LINE_PREFIX)) return null;

  const quoted = [...line.matchAll(/"([^"]*)"/g)].map((match) => match[1] ?? '');
  const [typeGuid, name, descriptorPath, projectGuid] = quoted;
  if (typeGuid === undefined || name === undefined || descriptorPath === undefined || projectGuid === undefined) {
    return null;
  }
  return { typeGuid, name, descriptorPath, projectGuid };
}

/**
 * Project entries of a solution, limited to descriptors at the project root.
 */
export function parseSolutionProjects(content: string): SolutionProjectEntry[] {
  const entries: SolutionProjectEntry[] = [];
  for (const line of content.split(/\r?\n/)) {
    const entry = parseProjectLine(line);
    if (!entry) continue;
    if (!entry.descriptorPath.endsWith('.csproj')) continue;
    if (entry.descriptorPath.includes('/') || entry.descriptorPath.includes('\\')) continue;
    entries.push(entry);
  }
  return entries;
}

/**
 * First solution file (by name) in the project root, ignoring hidden files
 * and variant copies.
 */
export async function findSolutionFile(projectRoot: string): Promise<string> {
  const solutions = await globFiles('*.sln', { cwd: projectRoot, deep: 1 });
  const [first] = solutions.filter((name) => !/\.v\.[^.]+\.sln$/.test(name));

  if (first === undefined) {
    throw new RegistryError(ErrorCodes.NO_SOLUTION, `No solution file found in ${projectRoot}`, {
      path: projectRoot,
    });
  }
  return path.join(projectRoot, first);
}
