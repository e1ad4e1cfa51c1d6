import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { ArchiveInvalidError } from '@chunkstash/core';
import { ZipArchiveService } from '../src/archive.js';
import { compareDirectories, sha256File } from '../src/checksum.js';

describe('ZipArchiveService', () => {
  let tempDir: string;
  const service = new ZipArchiveService();

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'chunkstash-test-'));
  });

  afterEach(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  async function makeSource(): Promise<string> {
    const sourceDir = path.join(tempDir, 'photos');
    await fs.promises.mkdir(path.join(sourceDir, 'subdir'), { recursive: true });
    await fs.promises.writeFile(path.join(sourceDir, 'test.txt'), 'hello world');
    await fs.promises.writeFile(path.join(sourceDir, '.hidden'), 'dot file');
    await fs.promises.writeFile(path.join(sourceDir, 'subdir', 'nested.txt'), 'nested content');
    return sourceDir;
  }

  it('should round-trip a folder under its own name', async () => {
    const sourceDir = await makeSource();
    const archivePath = path.join(tempDir, 'out', 'photos.zip');

    await service.createArchive(sourceDir, archivePath);
    const extracted = await service.extractArchive(archivePath, path.join(tempDir, 'extract'));

    expect(extracted).toBe(path.join(tempDir, 'extract', 'photos'));
    expect(await fs.promises.readFile(path.join(extracted, 'subdir', 'nested.txt'), 'utf-8')).toBe(
      'nested content',
    );

    const comparison = await compareDirectories(sourceDir, extracted);
    expect(comparison.ok).toBe(true);
    expect(comparison.matches).toBe(3);
  });

  it('should raise ArchiveInvalidError for a corrupt archive', async () => {
    const bogus = path.join(tempDir, 'bogus.zip');
    await fs.promises.writeFile(bogus, 'this is not a zip file');

    await expect(service.extractArchive(bogus, path.join(tempDir, 'extract'))).rejects.toBeInstanceOf(
      ArchiveInvalidError,
    );
  });

  it('should recognise archives by extension', () => {
    expect(service.isArchive('/tmp/backup.ZIP')).toBe(true);
    expect(service.isArchive('/tmp/movie.mp4')).toBe(false);
  });
});

describe('Checksum comparison', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'chunkstash-test-'));
  });

  afterEach(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  it('should hash a file with SHA-256', async () => {
    const file = path.join(tempDir, 'abc.txt');
    await fs.promises.writeFile(file, 'abc');
    expect(await sha256File(file)).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('should report mismatched and missing files', async () => {
    const original = path.join(tempDir, 'original');
    const restored = path.join(tempDir, 'restored');
    await fs.promises.mkdir(path.join(original, 'a'), { recursive: true });
    await fs.promises.mkdir(path.join(restored, 'a'), { recursive: true });

    await fs.promises.writeFile(path.join(original, 'same.txt'), 'same');
    await fs.promises.writeFile(path.join(restored, 'same.txt'), 'same');
    await fs.promises.writeFile(path.join(original, 'a', 'changed.txt'), 'one');
    await fs.promises.writeFile(path.join(restored, 'a', 'changed.txt'), 'two');
    await fs.promises.writeFile(path.join(original, 'gone.txt'), 'x');
    await fs.promises.writeFile(path.join(restored, 'extra.txt'), 'y');

    expect(await compareDirectories(original, restored)).toEqual({
      matches: 1,
      mismatches: ['a/changed.txt'],
      missingInOriginal: ['extra.txt'],
      missingInRestored: ['gone.txt'],
      ok: false,
    });
  });
});
