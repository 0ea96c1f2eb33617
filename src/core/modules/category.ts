import type { ModuleCategory } from './types.js';

const TEST_DEFINE = 'UNITY_INCLUDE_TESTS';
const EDITOR_DEFINE = 'UNITY_EDITOR';
const EDITOR_PLATFORM = 'Editor';

/**
 * Infer a declared module's category from its constraints.
 * Test constraints win over editor-only platform restrictions.
 */
export function inferCategory(
  includePlatforms: readonly string[],
  defineConstraints: readonly string[]
): ModuleCategory {
  if (defineConstraints.includes(TEST_DEFINE)) return 'test';
  if (includePlatforms.length === 1 && includePlatforms[0] === EDITOR_PLATFORM) return 'editor';
  if (defineConstraints.includes(EDITOR_DEFINE)) return 'editor';
  return 'runtime';
}

/**
 * Infer a category from a project name alone, for projects with no
 * declaration file (legacy modules, solution entries).
 */
export function inferCategoryFromName(name: string): ModuleCategory {
  const lower = name.toLowerCase();
  if (lower.includes('editor')) return 'editor';
  if (lower.includes('.tests.') || lower.includes('testrunner')) return 'test';
  return 'runtime';
}
