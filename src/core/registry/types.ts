/**
 * Project registry types: which descriptors exist and where they go.
 */
import type { ModuleCategory } from '../modules/types.js';

/** `declared` projects come from a declaration file; `legacy` ones from the fallback rules. */
export type ProjectKind = 'declared' | 'legacy';

/**
 * One generated project descriptor.
 */
export interface ProjectInfo {
  name: string;
  /** Descriptor path, relative to the project root */
  outputPath: string;
  /** Template path, relative to the project root */
  templatePath: string;
  /** Braced identifier used in cross-references */
  guid: string;
  kind: ProjectKind;
  category: ModuleCategory;
  includePlatforms: string[];
  excludePlatforms: string[];
}

/**
 * The aggregate solution index.
 */
export interface SolutionInfo {
  outputPath: string;
  templatePath: string;
  projectTypeGuid: string;
}

export interface ProjectRegistry {
  /** `manifest` when read from a registry file, `discovered` when built from templates */
  source: 'manifest' | 'discovered';
  solution: SolutionInfo;
  projects: ProjectInfo[];
}
