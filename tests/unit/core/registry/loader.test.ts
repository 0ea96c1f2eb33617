import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTempProject, type TempProject } from '../../../helpers/temp-project.js';
import { loadProjectRegistry, toProjectRegistry } from '../../../../src/core/registry/loader.js';
import { getDefaultConfig } from '../../../../src/core/config/loader.js';
import { deterministicGuid } from '../../../../src/utils/checksum.js';
import { RegistryError, ErrorCodes } from '../../../../src/utils/errors.js';

const REGISTRY = `solutionPath: Game.sln
solutionTemplatePath: Library/CsprojForge/templates/Game.sln.template
projects:
  - name: Main
    outputPath: Main.csproj
    templatePath: Library/CsprojForge/templates/Main.csproj.template
    guid: "{11111111-2222-3333-4444-555555555555}"
    kind: declared
    includePlatforms: [iOS]
  - name: Assembly-CSharp-Editor
    outputPath: Assembly-CSharp-Editor.csproj
    templatePath: Library/CsprojForge/templates/Assembly-CSharp-Editor.csproj.template
    kind: legacy
    category: editor
`;

describe('loadProjectRegistry', () => {
  let project: TempProject;

  beforeEach(() => {
    project = createTempProject();
  });

  afterEach(() => {
    project.cleanup();
  });

  it('should return null when no registry exists', async () => {
    expect(await loadProjectRegistry(project.root, getDefaultConfig())).toBeNull();
  });

  it('should fail when a required registry is missing', async () => {
    await expect(
      loadProjectRegistry(project.root, getDefaultConfig(), { required: true })
    ).rejects.toMatchObject({ code: ErrorCodes.MISSING_REGISTRY });
  });

  it('should load and normalize the registry file', async () => {
    project.write('Library/CsprojForge/registry.yaml', REGISTRY);

    const registry = await loadProjectRegistry(project.root, getDefaultConfig());

    expect(registry).toEqual({
      source: 'manifest',
      solution: {
        outputPath: 'Game.sln',
        templatePath: 'Library/CsprojForge/templates/Game.sln.template',
        projectTypeGuid: '{FAE04EC0-301F-11D3-BF4B-00C04F79EFBC}',
      },
      projects: [
        {
          name: 'Main',
          outputPath: 'Main.csproj',
          templatePath: 'Library/CsprojForge/templates/Main.csproj.template',
          guid: '{11111111-2222-3333-4444-555555555555}',
          kind: 'declared',
          category: 'runtime',
          includePlatforms: ['iOS'],
          excludePlatforms: [],
        },
        {
          name: 'Assembly-CSharp-Editor',
          outputPath: 'Assembly-CSharp-Editor.csproj',
          templatePath: 'Library/CsprojForge/templates/Assembly-CSharp-Editor.csproj.template',
          guid: deterministicGuid('Assembly-CSharp-Editor'),
          kind: 'legacy',
          category: 'editor',
          includePlatforms: [],
          excludePlatforms: [],
        },
      ],
    });
  });

  it('should honor a configured registry path', async () => {
    project.write('Tools/projects.yaml', REGISTRY);

    const registry = await loadProjectRegistry(project.root, { ...getDefaultConfig(), registry: 'Tools/projects.yaml' });

    expect(registry?.projects.map((p) => p.name)).toEqual(['Main', 'Assembly-CSharp-Editor']);
  });

  it('should reject a malformed registry', async () => {
    project.write('Library/CsprojForge/registry.yaml', 'solutionPath: Game.sln\nprojects: 3\n');

    await expect(loadProjectRegistry(project.root, getDefaultConfig())).rejects.toMatchObject({
      name: 'RegistryError',
      code: ErrorCodes.INVALID_REGISTRY,
    });
  });
});

describe('toProjectRegistry', () => {
  it('should reject duplicate project names', () => {
    const entry = {
      name: 'Main',
      outputPath: 'Main.csproj',
      templatePath: 't/Main.csproj.template',
      kind: 'declared' as const,
      category: 'runtime' as const,
      includePlatforms: [],
      excludePlatforms: [],
    };

    expect(() =>
      toProjectRegistry(
        { solutionPath: 'Game.sln', solutionTemplatePath: 't/Game.sln.template', projects: [entry, entry] },
        getDefaultConfig()
      )
    ).toThrow(RegistryError);
  });

  it('should prefer the file project type over the configured one', () => {
    const registry = toProjectRegistry(
      {
        solutionPath: 'Game.sln',
        solutionTemplatePath: 't/Game.sln.template',
        projectTypeGuid: '{00000000-0000-0000-0000-000000000001}',
        projects: [],
      },
      getDefaultConfig()
    );

    expect(registry.solution.projectTypeGuid).toBe('{00000000-0000-0000-0000-000000000001}');
  });
});
