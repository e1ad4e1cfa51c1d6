import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { scanSource } from '../src/backup/scanner.js';
import { createNameOnlySkipPredicate } from '../src/backup/skip-predicate.js';
import type { ScannedFile } from '../src/backup/types.js';

describe('scanSource', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'chunkstash-test-'));
    await fs.promises.mkdir(path.join(root, 'sub', 'deep'), { recursive: true });
    await fs.promises.mkdir(path.join(root, 'node_modules', 'pkg'), { recursive: true });
    await fs.promises.writeFile(path.join(root, 'b.txt'), 'bb');
    await fs.promises.writeFile(path.join(root, 'a.txt'), 'a');
    await fs.promises.writeFile(path.join(root, 'sub', 'c.txt'), 'ccc');
    await fs.promises.writeFile(path.join(root, 'sub', 'deep', 'node_modules'), 'a file, not a folder');
    await fs.promises.writeFile(path.join(root, 'node_modules', 'pkg', 'index.js'), '');
  });

  afterEach(async () => {
    await fs.promises.rm(root, { recursive: true, force: true });
  });

  it('should list regular files in sorted order with POSIX relative paths', async () => {
    const files = await scanSource(root);

    expect(files.map((f) => f.relativePath)).toEqual([
      'a.txt',
      'b.txt',
      'node_modules/pkg/index.js',
      'sub/c.txt',
      'sub/deep/node_modules',
    ]);
    expect(files[2]).toEqual({
      absolutePath: path.join(root, 'node_modules', 'pkg', 'index.js'),
      relativePath: 'node_modules/pkg/index.js',
      name: 'index.js',
      size: 0,
    });
  });

  it('should skip directories by name at any depth, but not files', async () => {
    const files = await scanSource(root, { skipFolders: ['node_modules', 'deep'] });
    expect(files.map((f) => f.relativePath)).toEqual(['a.txt', 'b.txt', 'sub/c.txt']);

    const onlyModules = await scanSource(root, { skipFolders: ['node_modules'] });
    expect(onlyModules.map((f) => f.relativePath)).toContain('sub/deep/node_modules');
  });
});

describe('NameOnlySkipPredicate', () => {
  const file = (name: string, size: number): ScannedFile => ({
    absolutePath: `/src/${name}`,
    relativePath: `nested/${name}`,
    name,
    size,
  });

  const predicate = createNameOnlySkipPredicate(new Set(['notes.txt', 'movie.mkv.part001', 'big.iso']), 100);

  it('should match small files by their own name', () => {
    expect(predicate.shouldSkip(file('notes.txt', 100))).toBe(true);
    expect(predicate.shouldSkip(file('other.txt', 10))).toBe(false);
  });

  it('should match large files by their first chunk name', () => {
    expect(predicate.shouldSkip(file('movie.mkv', 101))).toBe(true);
    expect(predicate.shouldSkip(file('big.iso', 500))).toBe(false);
  });
});
