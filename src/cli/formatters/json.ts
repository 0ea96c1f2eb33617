import type { GenerateResult } from '../../core/generator.js';
import type { VariantResult } from '../../core/variant/types.js';
import type { IFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  formatGenerateResult(result: GenerateResult): string {
    return JSON.stringify(
      {
        updated_files: result.updatedFiles,
        warnings: result.warnings,
        stats: {
          registry_source: result.stats.registrySource,
          source_files: result.stats.sourceFileCount,
          unresolved_directories: result.stats.unresolvedDirectoryCount,
          unresolved_files: result.stats.unresolvedFileCount,
          projects: result.stats.projects,
        },
      },
      null,
      2
    );
  }

  formatVariantResult(result: VariantResult): string {
    return JSON.stringify(
      {
        variant: result.variant,
        suffix: result.suffix,
        generated: result.generated,
        skipped: result.skipped,
        solution: result.solutionPath,
        properties: result.propertiesPath,
      },
      null,
      2
    );
  }

  formatWrittenFiles(_title: string, files: string[]): string {
    return JSON.stringify({ written: files }, null, 2);
  }
}
