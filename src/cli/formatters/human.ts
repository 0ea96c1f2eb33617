import chalk from 'chalk';
import type { GenerateResult } from '../../core/generator.js';
import type { VariantResult } from '../../core/variant/types.js';
import { compareLexically } from '../../utils/paths.js';
import type { IFormatter, FormatOptions } from './types.js';

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
    };
  }

  formatGenerateResult(result: GenerateResult): string {
    const lines: string[] = [];
    const { stats } = result;

    if (result.updatedFiles.length === 0) {
      lines.push(`${this.colorize('✓', 'green')} Descriptors are up to date`);
    } else {
      lines.push(`${this.colorize('✓', 'green')} Updated ${result.updatedFiles.length} file(s)`);
      for (const file of result.updatedFiles) {
        lines.push(`   ${file}`);
      }
    }

    const projectNames = Object.keys(stats.projects).sort(compareLexically);
    lines.push(
      this.colorize(
        `   ${projectNames.length} project(s), ${stats.sourceFileCount} source file(s), ${stats.unresolvedFileCount} unresolved`,
        'dim'
      )
    );

    if (this.options.verbose) {
      for (const name of projectNames) {
        const project = stats.projects[name];
        if (!project) continue;
        lines.push(`   ${name}: ${project.sourceFiles} file(s), ${project.patterns} pattern(s)`);
      }
    }

    return lines.join('\n');
  }

  formatVariantResult(result: VariantResult): string {
    const lines = [
      `${this.colorize('✓', 'green')} Variant ${result.variant}: ${result.generated.length} generated, ${result.skipped.length} up to date`,
    ];
    if (this.options.verbose) {
      lines.push(...result.generated.map((file) => `   + ${file}`));
      lines.push(...result.skipped.map((file) => this.colorize(`   = ${file}`, 'dim')));
    }
    return lines.join('\n');
  }

  formatWrittenFiles(title: string, files: string[]): string {
    if (files.length === 0) {
      return `${this.colorize('✓', 'green')} ${title}: nothing changed`;
    }
    return [`${this.colorize('✓', 'green')} ${title}: ${files.length} file(s)`, ...files.map((file) => `   ${file}`)].join(
      '\n'
    );
  }

  private colorize(text: string, color: 'green' | 'dim'): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'green':
        return chalk.green(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}
