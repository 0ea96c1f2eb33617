import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTempProject, type TempProject } from '../../../helpers/temp-project.js';
import {
  loadConfig,
  getDefaultConfig,
  getRegistryPath,
  getTemplatesDir,
} from '../../../../src/core/config/loader.js';
import { ConfigError, ErrorCodes } from '../../../../src/utils/errors.js';

describe('config loader', () => {
  let project: TempProject;

  beforeEach(() => {
    project = createTempProject();
  });

  afterEach(() => {
    project.cleanup();
  });

  it('should use defaults without a config file', async () => {
    const config = await loadConfig(project.root);

    expect(config).toEqual(getDefaultConfig());
    expect(config.sourceRoots).toEqual(['Assets', 'Packages']);
    expect(config.patternMode).toBe('recursive');
    expect(config.extensions).toEqual({ source: '.cs', declaration: '.asmdef', referenceExtension: '.asmref' });
  });

  it('should merge file values with defaults', async () => {
    project.write('.csproj-forge.yaml', 'patternMode: flat\nextensions:\n  source: .cs2\n');

    const config = await loadConfig(project.root);

    expect(config.patternMode).toBe('flat');
    expect(config.extensions.source).toBe('.cs2');
    expect(config.extensions.declaration).toBe('.asmdef');
    expect(config.legacyRoot).toBe('Assets');
  });

  it('should apply command-line overrides last', async () => {
    project.write('.csproj-forge.yaml', 'templateRoot: Custom\n');

    const config = await loadConfig(project.root, undefined, { templateRoot: 'Override', registry: 'r.yaml' });

    expect(config.templateRoot).toBe('Override');
    expect(config.registry).toBe('r.yaml');
  });

  it('should keep file values when no override is given', async () => {
    project.write('.csproj-forge.yaml', 'templateRoot: Custom\n');

    const config = await loadConfig(project.root, undefined, {});

    expect(config.templateRoot).toBe('Custom');
  });

  it('should reject invalid values', async () => {
    project.write('.csproj-forge.yaml', 'patternMode: sideways\n');

    await expect(loadConfig(project.root)).rejects.toMatchObject({
      name: 'ConfigError',
      code: ErrorCodes.CONFIG_LOAD_ERROR,
    });
  });

  it('should fail for a missing explicit config path', async () => {
    await expect(loadConfig(project.root, 'missing.yaml')).rejects.toBeInstanceOf(ConfigError);
  });

  it('should derive registry and template locations', () => {
    const config = getDefaultConfig();

    expect(getRegistryPath(config)).toBe('Library/CsprojForge/registry.yaml');
    expect(getTemplatesDir(config)).toBe('Library/CsprojForge/templates');
    expect(getRegistryPath({ ...config, registry: 'Tools/registry.yaml' })).toBe('Tools/registry.yaml');
  });
});
