/**
 * Fallback modules for sources under the legacy root that no declaration
 * or reference extension claims.
 */

export const LEGACY_MODULES = {
  runtime: 'Assembly-CSharp',
  runtimeFirstPass: 'Assembly-CSharp-firstpass',
  editor: 'Assembly-CSharp-Editor',
  editorFirstPass: 'Assembly-CSharp-Editor-firstpass',
} as const;

export type LegacyModuleName = (typeof LEGACY_MODULES)[keyof typeof LEGACY_MODULES];

export const LEGACY_MODULE_NAMES: readonly string[] = Object.values(LEGACY_MODULES);

export interface LegacyRules {
  /** Top-level directory the fallback applies to */
  legacyRoot: string;
  /** Second-level directory names compiled in the first pass */
  firstPassDirectories: readonly string[];
  /** Directory name marking editor-only sources, at any depth */
  editorDirectoryName: string;
}

export function isLegacyModuleName(name: string): boolean {
  return LEGACY_MODULE_NAMES.includes(name);
}

/**
 * Pick the legacy module for a directory, or null outside the legacy root.
 */
export function resolveLegacyModule(directory: string, rules: LegacyRules): LegacyModuleName | null {
  const components = directory.split('/');
  if (components[0] !== rules.legacyRoot) return null;

  const isEditor = components.includes(rules.editorDirectoryName);
  const isFirstPass = components.length > 1 && rules.firstPassDirectories.includes(components[1]);

  if (isEditor) {
    return isFirstPass ? LEGACY_MODULES.editorFirstPass : LEGACY_MODULES.editor;
  }
  return isFirstPass ? LEGACY_MODULES.runtimeFirstPass : LEGACY_MODULES.runtime;
}
