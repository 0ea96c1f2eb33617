import { z } from 'zod';

/**
 * Optional object field whose inner defaults apply when the key is absent.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** File-suffix classification used by the scanner. */
export const ExtensionsSchema = z.object({
  source: z.string().default('.cs'),
  declaration: z.string().default('.asmdef'),
  referenceExtension: z.string().default('.asmref'),
});

/** Compile-pattern strategy for declared modules. */
export const PatternModeSchema = z.enum(['recursive', 'flat']);

export const ConfigSchema = z.object({
  /** Sub-roots of the project scanned for sources and declarations */
  sourceRoots: z.array(z.string().min(1)).default(['Assets', 'Packages']),
  /** Generator state directory, relative to the project root */
  templateRoot: z.string().min(1).default('Library/CsprojForge'),
  /** Project registry path; defaults to <templateRoot>/registry.yaml */
  registry: z.string().min(1).optional(),
  /** Solution base name; defaults to the single *.sln.template found */
  solutionName: z.string().min(1).optional(),
  /** Top-level directory whose unowned sources fall back to legacy modules */
  legacyRoot: z.string().min(1).default('Assets'),
  /** Second-level directories compiled in the first pass */
  firstPassDirectories: z.array(z.string()).default(['Plugins', 'Standard Assets', 'Pro Standard Assets']),
  /** Directory name marking editor-only legacy sources at any depth */
  editorDirectoryName: z.string().min(1).default('Editor'),
  extensions: withDefaults(ExtensionsSchema),
  patternMode: PatternModeSchema.default('recursive'),
  /** Project-type identifier written into solution entries */
  projectTypeGuid: z.string().default('{FAE04EC0-301F-11D3-BF4B-00C04F79EFBC}'),
  /** Parallel scan width (default: 75% of CPUs, min 2, max 16) */
  scanConcurrency: z.number().int().min(1).max(64).optional(),
  /** Unresolved directories sampled into warnings in verbose mode */
  unresolvedSampleSize: z.number().int().min(0).default(20),
});

export type GeneratorConfig = z.infer<typeof ConfigSchema>;
export type PatternMode = z.infer<typeof PatternModeSchema>;
export type SourceExtensions = z.infer<typeof ExtensionsSchema>;
