import { describe, it, expect } from 'vitest';
import {
  flatPattern,
  recursivePattern,
  synthesizeFlatPatterns,
  synthesizeRecursivePatterns,
} from '../../../../src/core/patterns/synthesizer.js';
import { OwnershipResolver } from '../../../../src/core/ownership/resolver.js';

function recursive(moduleName: string, entries: Array<[string, string]>, ignoredDirectories: string[] = []) {
  const roots = new Map(entries);
  return synthesizeRecursivePatterns({
    moduleName,
    roots,
    resolver: new OwnershipResolver(roots),
    ignoredDirectories,
    extension: '.cs',
  });
}

describe('pattern helpers', () => {
  it('should build flat and recursive globs', () => {
    expect(flatPattern('Assets/Game', '.cs')).toBe('Assets/Game/*.cs');
    expect(flatPattern('', '.cs')).toBe('*.cs');
    expect(recursivePattern('Assets/Game', '.cs')).toBe('Assets/Game/**/*.cs');
    expect(recursivePattern('', '.cs')).toBe('**/*.cs');
  });
});

describe('synthesizeFlatPatterns', () => {
  it('should emit one sorted include per directory', () => {
    expect(synthesizeFlatPatterns(['Assets/B', 'Assets/A', 'Assets/B'], '.cs')).toEqual([
      { include: 'Assets/A/*.cs', exclude: [] },
      { include: 'Assets/B/*.cs', exclude: [] },
    ]);
  });

  it('should emit nothing for no directories', () => {
    expect(synthesizeFlatPatterns([], '.cs')).toEqual([]);
  });
});

describe('synthesizeRecursivePatterns', () => {
  const nested: Array<[string, string]> = [
    ['Assets/Game', 'Main'],
    ['Assets/Game/Core', 'Core'],
  ];

  it('should carve nested modules and pruned directories out of the parent', () => {
    expect(recursive('Main', nested, ['Assets/Game/src~'])).toEqual([
      { include: 'Assets/Game/**/*.cs', exclude: ['Assets/Game/Core/**/*.cs', 'Assets/Game/src~/**/*.cs'] },
    ]);
  });

  it('should leave the nested module whole', () => {
    expect(recursive('Core', nested, ['Assets/Game/src~'])).toEqual([
      { include: 'Assets/Game/Core/**/*.cs', exclude: [] },
    ]);
  });

  it('should collapse nested roots of the same module', () => {
    expect(recursive('Main', [...nested, ['Assets/Game/Extra', 'Main']])).toEqual([
      { include: 'Assets/Game/**/*.cs', exclude: ['Assets/Game/Core/**/*.cs'] },
    ]);
  });

  it('should keep a root that sits inside a foreign region', () => {
    const entries: Array<[string, string]> = [...nested, ['Assets/Game/Core/Back', 'Main']];

    expect(recursive('Main', entries)).toEqual([
      { include: 'Assets/Game/**/*.cs', exclude: ['Assets/Game/Core/**/*.cs'] },
      { include: 'Assets/Game/Core/Back/**/*.cs', exclude: [] },
    ]);
    expect(recursive('Core', entries)).toEqual([
      { include: 'Assets/Game/Core/**/*.cs', exclude: ['Assets/Game/Core/Back/**/*.cs'] },
    ]);
  });

  it('should ignore pruned directories outside the module', () => {
    expect(recursive('Core', nested, ['Assets/Other~'])).toEqual([
      { include: 'Assets/Game/Core/**/*.cs', exclude: [] },
    ]);
  });

  it('should cover the whole project from a root-level module', () => {
    expect(recursive('All', [['', 'All']], ['.git'])).toEqual([
      { include: '**/*.cs', exclude: ['.git/**/*.cs'] },
    ]);
  });

  it('should emit nothing for a module without roots', () => {
    expect(recursive('Ghost', nested)).toEqual([]);
  });
});
