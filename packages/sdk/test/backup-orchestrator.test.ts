import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { randomBytes } from 'node:crypto';
import {
  AuthFailedError,
  DependencyMissingError,
  PushFailedError,
  SourceNotFoundError,
} from '@chunkstash/core';
import { ZipArchiveService, compareDirectories, sha256File } from '@chunkstash/chunker';
import type { PushEvent } from '@chunkstash/remote-git';
import { FakeGit } from '../../remote-git/test/support/fake-git.js';
import { BackupOrchestrator } from '../src/backup/orchestrator.js';
import type { BackupConfig } from '../src/backup/config.js';
import { RestoreOrchestrator } from '../src/restore/orchestrator.js';
import { FakeRemoteHost } from './support/fake-remote.js';

const KiB = 1024;
const CHUNK = 50 * KiB;

describe('BackupOrchestrator', () => {
  let tempDir: string;
  let home: string;
  let remoteDir: string;
  let scratch: string;
  let git: FakeGit;
  let remote: FakeRemoteHost;
  let pushes: PushEvent[];

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'chunkstash-test-'));
    home = path.join(tempDir, 'home');
    remoteDir = path.join(tempDir, 'remote');
    scratch = path.join(tempDir, 'scratch');
    git = new FakeGit(remoteDir);
    remote = new FakeRemoteHost(remoteDir);
    pushes = [];
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  function backupConfig(overrides: Partial<BackupConfig> = {}): BackupConfig {
    return {
      repoUrl: 'https://github.com/example/storage',
      chunkSizeBytes: CHUNK,
      push: { batchSize: 20, pollTimeoutMs: 5 },
      pathMapping: { homeDir: home },
      tempDir: scratch,
      hooks: { onPush: (event) => pushes.push(event) },
      ...overrides,
    };
  }

  function createBackup(overrides: Partial<BackupConfig> = {}): BackupOrchestrator {
    return new BackupOrchestrator({ config: backupConfig(overrides), remote, git: git.run });
  }

  function createRestore(): RestoreOrchestrator {
    return new RestoreOrchestrator({
      config: { repoUrl: 'https://github.com/example/storage', pathMapping: { homeDir: home }, tempDir: scratch },
      remote,
    });
  }

  async function writeRandom(file: string, size: number): Promise<void> {
    await fs.promises.mkdir(path.dirname(file), { recursive: true });
    await fs.promises.writeFile(file, randomBytes(size));
  }

  it('should split a large file into chunks and restore it byte for byte', async () => {
    const source = path.join(home, 'Downloads', 'Movies', 'movie.bin');
    await writeRandom(source, 120 * KiB);

    const report = await createBackup().backup(source);

    expect(report).toMatchObject({
      source,
      remoteFolderPath: 'Downloads/Movies/movie.bin',
      totalItems: 3,
      filesSplit: 1,
      itemsUploaded: 3,
      pushes: 1,
      skippedFiles: [],
      failedSplits: [],
    });
    expect(git.commits).toEqual([
      'Create folder structure: Downloads/Movies/movie.bin',
      'Add final 3 file(s) (3 total)',
    ]);

    const remoteFolder = path.join(remoteDir, 'Downloads', 'Movies', 'movie.bin');
    const chunkSizes = await Promise.all(
      ['movie.bin.part001', 'movie.bin.part002', 'movie.bin.part003'].map(
        async (name) => (await fs.promises.stat(path.join(remoteFolder, name))).size,
      ),
    );
    expect(chunkSizes).toEqual([CHUNK, CHUNK, 20 * KiB]);
    expect(fs.readdirSync(scratch)).toEqual([]);

    const restored = await createRestore().restore('Downloads/Movies/movie.bin', { suffix: '_restored' });

    expect(restored).toEqual({
      remoteFolderPath: 'Downloads/Movies/movie.bin',
      destination: path.join(home, 'Downloads', 'Movies', 'movie_restored.bin'),
      chunkCount: 3,
      restoredBytes: 120 * KiB,
      extracted: false,
    });
    expect(await sha256File(restored.destination)).toBe(await sha256File(source));
    expect(fs.readdirSync(scratch)).toEqual([]);
  });

  it('should upload a small single file without splitting it', async () => {
    const source = path.join(home, 'Downloads', 'notes.txt');
    await writeRandom(source, CHUNK);

    const report = await createBackup().backup(source);

    expect(report).toMatchObject({ totalItems: 1, filesSplit: 0, itemsUploaded: 1, pushes: 1 });
    expect(fs.existsSync(path.join(remoteDir, 'Downloads', 'notes.txt', 'notes.txt'))).toBe(true);
  });

  it('should back up a folder in batches while splitting large files', async () => {
    const source = path.join(home, 'Downloads', 'Games');
    for (const name of ['a.txt', 'b.txt', 'c.txt', 'sub/d.txt', 'sub/e.txt']) {
      await writeRandom(path.join(source, name), 2 * KiB);
    }
    await writeRandom(path.join(source, 'sub', 'big.bin'), 120 * KiB);
    await writeRandom(path.join(source, 'node_modules', 'dep.js'), KiB);

    const report = await createBackup({ push: { batchSize: 2, pollTimeoutMs: 5 }, skipFolders: ['node_modules'] })
      .backup(source);

    expect(report).toMatchObject({
      remoteFolderPath: 'Downloads/Games',
      totalItems: 8,
      filesSplit: 1,
      itemsUploaded: 8,
      skippedFiles: [],
      failedSplits: [],
    });
    expect(report.pushes).toBeGreaterThanOrEqual(4);
    expect(pushes).toHaveLength(report.pushes);
    expect(pushes.at(-1)?.uploaded).toBe(8);
    expect(remote.listed).toEqual(['Downloads/Games']);

    const remoteFolder = path.join(remoteDir, 'Downloads', 'Games');
    expect(fs.readdirSync(path.join(remoteFolder, 'sub')).sort()).toEqual([
      '.gitkeep',
      'big.bin.part001',
      'big.bin.part002',
      'big.bin.part003',
      'd.txt',
      'e.txt',
    ]);
    expect(fs.existsSync(path.join(remoteFolder, 'node_modules'))).toBe(false);
    expect(await sha256File(path.join(remoteFolder, 'a.txt'))).toBe(await sha256File(path.join(source, 'a.txt')));
  });

  it('should skip files already present on the remote', async () => {
    const source = path.join(home, 'Downloads', 'Games');
    for (const name of ['a.txt', 'b.txt', 'c.txt', 'sub/d.txt', 'sub/e.txt']) {
      await writeRandom(path.join(source, name), 2 * KiB);
    }
    await writeRandom(path.join(source, 'sub', 'big.bin'), 120 * KiB);
    remote.existing = new Set(['a.txt', 'big.bin.part001']);
    const onFileSkipped = vi.fn();

    const report = await createBackup({ hooks: { onFileSkipped } }).backup(source);

    expect(report).toMatchObject({
      totalItems: 4,
      filesSplit: 0,
      itemsUploaded: 4,
      skippedFiles: ['a.txt', 'sub/big.bin'],
    });
    expect(onFileSkipped.mock.calls).toEqual([['a.txt'], ['sub/big.bin']]);
    expect(fs.existsSync(path.join(remoteDir, 'Downloads', 'Games', 'a.txt'))).toBe(false);
    expect(fs.existsSync(path.join(remoteDir, 'Downloads', 'Games', 'b.txt'))).toBe(true);
  });

  it('should back up a folder as one archive and extract it on restore', async () => {
    const source = path.join(home, 'Downloads', 'Saves');
    await writeRandom(path.join(source, 'slot1.dat'), 3 * KiB);
    await writeRandom(path.join(source, 'profiles', 'main.cfg'), KiB);

    const report = await createBackup().backup(source, { archive: true });

    expect(report).toMatchObject({ remoteFolderPath: 'Downloads/Saves', filesSplit: 1, itemsUploaded: 1 });
    expect(fs.existsSync(path.join(remoteDir, 'Downloads', 'Saves', 'Saves.zip.part001'))).toBe(true);

    const restored = await createRestore().restore('Downloads/Saves');

    expect(restored.extracted).toBe(true);
    expect(restored.destination).toBe(path.join(home, 'Downloads', 'Saves_1'));
    const comparison = await compareDirectories(source, restored.destination);
    expect(comparison).toMatchObject({ ok: true, matches: 2 });
  });

  it('should restore a backed-up zip file as the file itself', async () => {
    const album = path.join(tempDir, 'album');
    await writeRandom(path.join(album, 'raw.dat'), 120 * KiB);
    const source = path.join(home, 'Downloads', 'photos.zip');
    await fs.promises.mkdir(path.dirname(source), { recursive: true });
    await new ZipArchiveService().createArchive(album, source);

    const report = await createBackup().backup(source);

    expect(report).toMatchObject({ remoteFolderPath: 'Downloads/photos.zip', filesSplit: 1, itemsUploaded: 3 });

    const restored = await createRestore().restore('Downloads/photos.zip');

    expect(restored.extracted).toBe(false);
    expect(restored.destination).toBe(path.join(home, 'Downloads', 'photos_1.zip'));
    expect((await fs.promises.stat(restored.destination)).isFile()).toBe(true);
    expect(await sha256File(restored.destination)).toBe(await sha256File(source));
  });

  it('should fail the run and stop the producers when pushes are rejected', async () => {
    git.rejectPlainPushes = 100;
    git.rejectForcePushes = 100;
    const source = path.join(home, 'Downloads', 'Big');
    for (const name of ['one.bin', 'two.bin', 'three.bin']) {
      await writeRandom(path.join(source, name), 120 * KiB);
    }
    const onError = vi.fn();

    const run = createBackup({ push: { batchSize: 2, pollTimeoutMs: 5 }, splitConcurrency: 1, hooks: { onError } })
      .backup(source);

    await expect(run).rejects.toBeInstanceOf(PushFailedError);
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0]?.[0]).toBeInstanceOf(PushFailedError);
    expect(git.pushes).toEqual([]);
    expect(fs.existsSync(remoteDir)).toBe(false);

    const [runDir] = fs.readdirSync(scratch);
    expect(runDir).toBeDefined();
    expect(fs.existsSync(path.join(scratch, runDir ?? '', 'chunks'))).toBe(true);
    expect(fs.existsSync(path.join(scratch, runDir ?? '', 'repo'))).toBe(false);
  });

  it('should refuse a missing source before touching the remote', async () => {
    remote.installed = false;
    await expect(createBackup().backup(path.join(home, 'nowhere'))).rejects.toBeInstanceOf(SourceNotFoundError);
  });

  it('should check the remote CLI before any work', async () => {
    const source = path.join(home, 'Downloads', 'file.txt');
    await writeRandom(source, 10);

    remote.installed = false;
    await expect(createBackup().backup(source)).rejects.toBeInstanceOf(DependencyMissingError);

    remote.installed = true;
    remote.authenticated = false;
    await expect(createBackup().backup(source)).rejects.toBeInstanceOf(AuthFailedError);

    expect(git.calls).toEqual([]);
    expect(fs.existsSync(scratch)).toBe(false);
  });
});
