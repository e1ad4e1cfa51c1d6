import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { WorkingTree } from '../src/working-tree.js';
import { FakeGit } from './support/fake-git.js';

describe('WorkingTree', () => {
  let tempDir: string;
  let git: FakeGit;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'chunkstash-test-'));
    git = new FakeGit();
  });

  afterEach(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  async function createTree(): Promise<WorkingTree> {
    return WorkingTree.create({
      baseDir: path.join(tempDir, 'repo'),
      repoUrl: 'https://github.com/example/storage',
      branch: 'main',
      identity: { name: 'test-bot', email: 'bot@example.test' },
      markerFileName: '.gitkeep',
      git: git.run,
    });
  }

  it('should initialise the repository with branch, identity and origin', async () => {
    await createTree();
    const repo = path.join(tempDir, 'repo');

    expect(git.calls).toEqual([
      { cwd: repo, args: ['init'] },
      { cwd: repo, args: ['symbolic-ref', 'HEAD', 'refs/heads/main'] },
      { cwd: repo, args: ['config', 'user.name', 'test-bot'] },
      { cwd: repo, args: ['config', 'user.email', 'bot@example.test'] },
      { cwd: repo, args: ['remote', 'add', 'origin', 'https://github.com/example/storage'] },
    ]);
  });

  it('should create the folder hierarchy with markers and commit it', async () => {
    const tree = await createTree();
    await tree.prepareFolder(['Downloads', 'Games']);

    const repo = path.join(tempDir, 'repo');
    expect(fs.existsSync(path.join(repo, 'Downloads', '.gitkeep'))).toBe(true);
    expect(fs.existsSync(path.join(repo, 'Downloads', 'Games', '.gitkeep'))).toBe(true);
    expect(tree.folderRoot).toBe(path.join(repo, 'Downloads', 'Games'));
    expect(git.commits).toEqual(['Create folder structure: Downloads/Games']);
  });

  it('should tolerate an empty folder commit', async () => {
    const tree = await createTree();
    await tree.prepareFolder(['Downloads']);
    await tree.prepareFolder(['Downloads']);
    expect(git.commits).toEqual(['Create folder structure: Downloads']);
  });

  it('should stage a file with markers in intermediate directories', async () => {
    const tree = await createTree();
    await tree.prepareFolder(['Backup']);

    const source = path.join(tempDir, 'song.mp3');
    await fs.promises.writeFile(source, 'la la la');

    const target = await tree.stage(source, 'music/2024/song.mp3');
    const folder = path.join(tempDir, 'repo', 'Backup');

    expect(target).toBe(path.join(folder, 'music', '2024', 'song.mp3'));
    expect(await fs.promises.readFile(target, 'utf-8')).toBe('la la la');
    expect(fs.existsSync(path.join(folder, 'music', '.gitkeep'))).toBe(true);
    expect(fs.existsSync(path.join(folder, 'music', '2024', '.gitkeep'))).toBe(true);
    expect(await tree.hasChanges()).toBe(true);
  });

  it('should push plainly and force with upstream', async () => {
    const tree = await createTree();
    await tree.push();
    await tree.forcePush();

    expect(git.calls.slice(-2).map((c) => c.args)).toEqual([
      ['push'],
      ['push', '--force', '-u', 'origin', 'main'],
    ]);
  });

  it('should remove its directory on destroy', async () => {
    const tree = await createTree();
    await tree.destroy();
    expect(fs.existsSync(path.join(tempDir, 'repo'))).toBe(false);
  });
});
