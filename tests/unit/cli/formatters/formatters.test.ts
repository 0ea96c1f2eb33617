/**
 * Tests for the human and JSON formatters.
 */
import { describe, it, expect } from 'vitest';
import { HumanFormatter } from '../../../../src/cli/formatters/human.js';
import { JsonFormatter } from '../../../../src/cli/formatters/json.js';
import { createFormatter } from '../../../../src/cli/formatters/index.js';
import type { GenerateResult } from '../../../../src/core/generator.js';
import type { VariantResult } from '../../../../src/core/variant/types.js';

const RESULT: GenerateResult = {
  updatedFiles: ['Game.sln', 'Main.csproj'],
  warnings: [],
  stats: {
    registrySource: 'manifest',
    sourceFileCount: 5,
    projects: {
      Main: { sourceFiles: 4, patterns: 1 },
      Core: { sourceFiles: 1, patterns: 2 },
    },
    unresolvedDirectoryCount: 1,
    unresolvedFileCount: 2,
  },
};

const VARIANT: VariantResult = {
  variant: 'android-dev',
  suffix: '.v.android-dev',
  generated: ['Main.v.android-dev.csproj'],
  skipped: ['Core.v.android-dev.csproj'],
  solutionPath: 'Game.v.android-dev.sln',
  propertiesPath: 'Library/CsprojForge/variants/android-dev/Variant.props',
};

describe('HumanFormatter', () => {
  it('should list updated files and totals', () => {
    const formatter = new HumanFormatter({ colors: false });

    expect(formatter.formatGenerateResult(RESULT)).toBe(
      ['✓ Updated 2 file(s)', '   Game.sln', '   Main.csproj', '   2 project(s), 5 source file(s), 2 unresolved'].join(
        '\n'
      )
    );
  });

  it('should report an unchanged tree', () => {
    const formatter = new HumanFormatter({ colors: false });

    expect(formatter.formatGenerateResult({ ...RESULT, updatedFiles: [] }).split('\n')[0]).toBe(
      '✓ Descriptors are up to date'
    );
  });

  it('should add per-project details when verbose', () => {
    const formatter = new HumanFormatter({ colors: false, verbose: true });
    const lines = formatter.formatGenerateResult(RESULT).split('\n');

    expect(lines.slice(-2)).toEqual(['   Core: 1 file(s), 2 pattern(s)', '   Main: 4 file(s), 1 pattern(s)']);
  });

  it('should summarize a variant', () => {
    expect(new HumanFormatter({ colors: false }).formatVariantResult(VARIANT)).toBe(
      '✓ Variant android-dev: 1 generated, 1 up to date'
    );
    expect(new HumanFormatter({ colors: false, verbose: true }).formatVariantResult(VARIANT)).toBe(
      [
        '✓ Variant android-dev: 1 generated, 1 up to date',
        '   + Main.v.android-dev.csproj',
        '   = Core.v.android-dev.csproj',
      ].join('\n')
    );
  });

  it('should list written files', () => {
    const formatter = new HumanFormatter({ colors: false });

    expect(formatter.formatWrittenFiles('Templates', [])).toBe('✓ Templates: nothing changed');
    expect(formatter.formatWrittenFiles('Templates', ['a.template'])).toBe('✓ Templates: 1 file(s)\n   a.template');
  });
});

describe('JsonFormatter', () => {
  it('should emit snake_case generation results', () => {
    const output = JSON.parse(new JsonFormatter().formatGenerateResult(RESULT));

    expect(output).toEqual({
      updated_files: ['Game.sln', 'Main.csproj'],
      warnings: [],
      stats: {
        registry_source: 'manifest',
        source_files: 5,
        unresolved_directories: 1,
        unresolved_files: 2,
        projects: {
          Main: { sourceFiles: 4, patterns: 1 },
          Core: { sourceFiles: 1, patterns: 2 },
        },
      },
    });
  });

  it('should emit variant results', () => {
    const output = JSON.parse(new JsonFormatter().formatVariantResult(VARIANT));

    expect(output.solution).toBe('Game.v.android-dev.sln');
    expect(output.properties).toBe('Library/CsprojForge/variants/android-dev/Variant.props');
    expect(output.skipped).toEqual(['Core.v.android-dev.csproj']);
  });

  it('should emit written files', () => {
    expect(JSON.parse(new JsonFormatter().formatWrittenFiles('Templates', ['a']))).toEqual({ written: ['a'] });
  });
});

describe('createFormatter', () => {
  it('should pick the formatter by format', () => {
    expect(createFormatter({ format: 'json' })).toBeInstanceOf(JsonFormatter);
    expect(createFormatter({ format: 'human' })).toBeInstanceOf(HumanFormatter);
    expect(createFormatter()).toBeInstanceOf(HumanFormatter);
  });
});
