import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, rmSync, mkdtempSync, utimesSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  readFile,
  readFileIfExists,
  writeFile,
  fileExists,
  getModifiedTime,
  globFiles,
} from '../../../src/utils/file-system.js';

describe('file-system utilities', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'csproj-forge-fs-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should read a file', async () => {
    writeFileSync(join(tempDir, 'a.txt'), 'hello');

    expect(await readFile(join(tempDir, 'a.txt'))).toBe('hello');
  });

  it('should return null for a missing file', async () => {
    expect(await readFileIfExists(join(tempDir, 'missing.txt'))).toBeNull();
  });

  it('should create parent directories when writing', async () => {
    const filePath = join(tempDir, 'deep', 'nested', 'out.txt');

    await writeFile(filePath, 'content');

    expect(readFileSync(filePath, 'utf-8')).toBe('content');
    expect(await fileExists(filePath)).toBe(true);
  });

  it('should report modification times', async () => {
    const filePath = join(tempDir, 'a.txt');
    writeFileSync(filePath, 'x');
    utimesSync(filePath, 1_000, 1_000);

    expect(await getModifiedTime(filePath)).toBe(1_000_000);
    expect(await getModifiedTime(join(tempDir, 'missing'))).toBeNull();
  });

  it('should glob sorted relative paths', async () => {
    mkdirSync(join(tempDir, 'sub'));
    writeFileSync(join(tempDir, 'b.template'), '');
    writeFileSync(join(tempDir, 'a.template'), '');
    writeFileSync(join(tempDir, 'sub', 'c.template'), '');

    expect(await globFiles('*.template', { cwd: tempDir })).toEqual(['a.template', 'b.template']);
    expect(await globFiles('**/*.template', { cwd: tempDir })).toEqual(['a.template', 'b.template', 'sub/c.template']);
  });
});
