/**
 * Formatter type definitions.
 */
import type { GenerateResult } from '../../core/generator.js';
import type { VariantResult } from '../../core/variant/types.js';

export type OutputFormat = 'human' | 'json';

export interface FormatOptions {
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
  /** Per-project statistics */
  verbose: boolean;
}

/**
 * Renders command results for stdout.
 */
export interface IFormatter {
  formatGenerateResult(result: GenerateResult): string;
  formatVariantResult(result: VariantResult): string;
  /** Written template paths */
  formatWrittenFiles(title: string, files: string[]): string;
}
