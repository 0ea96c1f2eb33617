import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { realpathSync } from 'node:fs';
import { createTempProject, type TempProject } from '../../../helpers/temp-project.js';
import {
  loadMetaGuid,
  loadModuleRecords,
  loadReferenceExtensions,
  indexModules,
  resolveReference,
} from '../../../../src/core/modules/declarations.js';
import { inferCategory, inferCategoryFromName } from '../../../../src/core/modules/category.js';
import type { ModuleRecord } from '../../../../src/core/modules/types.js';
import { OwnershipError, ErrorCodes } from '../../../../src/utils/errors.js';

const CORE_GUID = '0123456789abcdef0123456789abcdef';

function record(name: string, directory: string, guid: string | null = null): ModuleRecord {
  return {
    name,
    directory,
    declarationPath: `${directory}/${name}.asmdef`,
    guid,
    references: [],
    category: 'runtime',
    includePlatforms: [],
    excludePlatforms: [],
  };
}

describe('declaration loading', () => {
  let project: TempProject;
  let root: string;

  beforeEach(() => {
    project = createTempProject();
    root = realpathSync(project.root);
  });

  afterEach(() => {
    project.cleanup();
  });

  it('should read ownership fields and the meta identifier', async () => {
    project.write(
      'Assets/Core/Core.asmdef',
      JSON.stringify({
        name: 'Core',
        references: ['Utils', `GUID:${CORE_GUID}`],
        includePlatforms: ['iOS'],
        autoReferenced: true,
      })
    );
    project.write('Assets/Core/Core.asmdef.meta', `fileFormatVersion: 2\nguid: ${CORE_GUID.toUpperCase()}\n`);

    const [core] = await loadModuleRecords(root, ['Assets/Core/Core.asmdef']);

    expect(core).toEqual({
      name: 'Core',
      directory: 'Assets/Core',
      declarationPath: 'Assets/Core/Core.asmdef',
      guid: CORE_GUID,
      references: ['Utils', `GUID:${CORE_GUID}`],
      category: 'runtime',
      includePlatforms: ['iOS'],
      excludePlatforms: [],
    });
  });

  it('should accept a byte-order mark', async () => {
    project.write('Assets/Core/Core.asmdef', `\uFEFF${JSON.stringify({ name: 'Core' })}`);

    const records = await loadModuleRecords(root, ['Assets/Core/Core.asmdef']);

    expect(records.map((r) => r.name)).toEqual(['Core']);
  });

  it('should skip declarations without a name', async () => {
    project.write('Assets/Core/Core.asmdef', '{}');

    expect(await loadModuleRecords(root, ['Assets/Core/Core.asmdef'])).toEqual([]);
  });

  it('should fail on malformed JSON', async () => {
    project.write('Assets/Core/Core.asmdef', '{ name: ');

    await expect(loadModuleRecords(root, ['Assets/Core/Core.asmdef'])).rejects.toMatchObject({
      code: ErrorCodes.INVALID_DECLARATION,
    });
  });

  it('should fail on fields of the wrong type', async () => {
    project.write('Assets/Core/Core.asmdef', JSON.stringify({ name: 'Core', references: 'Utils' }));

    await expect(loadModuleRecords(root, ['Assets/Core/Core.asmdef'])).rejects.toBeInstanceOf(OwnershipError);
  });

  it('should return null without a meta file', async () => {
    expect(await loadMetaGuid(root, 'Assets/None.asmdef')).toBeNull();
  });

  it('should load reference extensions and skip empty ones', async () => {
    project.write('Assets/Extra/Link.asmref', JSON.stringify({ reference: 'Core' }));
    project.write('Assets/Other/Empty.asmref', '{}');

    const extensions = await loadReferenceExtensions(root, ['Assets/Extra/Link.asmref', 'Assets/Other/Empty.asmref']);

    expect(extensions).toEqual([{ directory: 'Assets/Extra', path: 'Assets/Extra/Link.asmref', reference: 'Core' }]);
  });
});

describe('indexModules', () => {
  it('should index by name and identifier', () => {
    const index = indexModules([record('Core', 'Assets/Core', CORE_GUID), record('Main', 'Assets/Game')]);

    expect([...index.byName.keys()]).toEqual(['Core', 'Main']);
    expect(index.byGuid.get(CORE_GUID)).toBe('Core');
    expect(index.byGuid.size).toBe(1);
  });

  it('should reject duplicate module names', () => {
    try {
      indexModules([record('Core', 'Assets/A'), record('Core', 'Assets/B')]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(OwnershipError);
      if (error instanceof OwnershipError) {
        expect(error.code).toBe(ErrorCodes.DUPLICATE_MODULE);
        expect(error.message).toBe("Duplicate module name 'Core' (Assets/A/Core.asmdef, Assets/B/Core.asmdef)");
      }
    }
  });
});

describe('resolveReference', () => {
  const index = indexModules([record('Core', 'Assets/Core', CORE_GUID)]);

  it('should resolve names first', () => {
    expect(resolveReference('Core', index)).toBe('Core');
  });

  it('should resolve prefixed identifiers case-insensitively', () => {
    expect(resolveReference(`GUID:${CORE_GUID.toUpperCase()}`, index)).toBe('Core');
  });

  it('should resolve bare identifiers', () => {
    expect(resolveReference(CORE_GUID, index)).toBe('Core');
  });

  it('should leave unknown tokens unresolved', () => {
    expect(resolveReference('Missing', index)).toBeNull();
    expect(resolveReference('GUID:ffffffffffffffffffffffffffffffff', index)).toBeNull();
    expect(resolveReference('f'.repeat(32), index)).toBeNull();
  });
});

describe('category inference', () => {
  it('should prefer test constraints', () => {
    expect(inferCategory(['Editor'], ['UNITY_INCLUDE_TESTS'])).toBe('test');
  });

  it('should treat editor-only platforms and editor constraints as editor', () => {
    expect(inferCategory(['Editor'], [])).toBe('editor');
    expect(inferCategory([], ['UNITY_EDITOR'])).toBe('editor');
  });

  it('should default to runtime', () => {
    expect(inferCategory(['Editor', 'iOS'], [])).toBe('runtime');
    expect(inferCategory([], [])).toBe('runtime');
  });

  it('should infer from names', () => {
    expect(inferCategoryFromName('Assembly-CSharp-Editor')).toBe('editor');
    expect(inferCategoryFromName('Game.Tests.Runtime')).toBe('test');
    expect(inferCategoryFromName('UnityEngine.TestRunner')).toBe('test');
    expect(inferCategoryFromName('Assembly-CSharp')).toBe('runtime');
  });
});
