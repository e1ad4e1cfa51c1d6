/**
 * Working Tree
 *
 * Ephemeral local repository mirroring the destination folder hierarchy,
 * with a single remote named `origin`. Only the batch pusher writes to it
 * once the folder structure is prepared.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { GitIdentity, GitRunner } from '@chunkstash/core';
import { execGit } from './utils/index.js';

export interface WorkingTreeOptions {
  /** Directory to initialise; created when missing */
  baseDir: string;
  repoUrl: string;
  branch: string;
  identity: GitIdentity;
  markerFileName: string;
  git?: GitRunner;
}

export class WorkingTree {
  private folderParts: string[] = [];

  private constructor(
    readonly dir: string,
    readonly branch: string,
    private readonly markerFileName: string,
    private readonly git: GitRunner,
  ) {}

  static async create(options: WorkingTreeOptions): Promise<WorkingTree> {
    const git = options.git ?? execGit;
    await fs.promises.mkdir(options.baseDir, { recursive: true });

    await git(options.baseDir, ['init']);
    await git(options.baseDir, ['symbolic-ref', 'HEAD', `refs/heads/${options.branch}`]);
    await git(options.baseDir, ['config', 'user.name', options.identity.name]);
    await git(options.baseDir, ['config', 'user.email', options.identity.email]);
    await git(options.baseDir, ['remote', 'add', 'origin', options.repoUrl]);

    return new WorkingTree(options.baseDir, options.branch, options.markerFileName, git);
  }

  /** Absolute path of the remote folder root inside the tree */
  get folderRoot(): string {
    return path.join(this.dir, ...this.folderParts);
  }

  /**
   * Create the remote folder hierarchy with a marker file at each level and
   * commit it locally. The commit is allowed to fail when the structure is
   * already committed.
   */
  async prepareFolder(parts: readonly string[]): Promise<void> {
    this.folderParts = [...parts];

    let current = this.dir;
    for (const part of parts) {
      current = path.join(current, part);
      await fs.promises.mkdir(current, { recursive: true });
      await this.writeMarker(current);
    }

    const folderPath = parts.join('/');
    try {
      await this.git(this.dir, ['add', '-A']);
      await this.git(this.dir, ['commit', '-m', `Create folder structure: ${folderPath}`]);
    } catch (error) {
      console.warn(
        `[Chunkstash:WorkingTree] Folder structure not committed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  /**
   * Copy a file to `<folder root>/<relativePath>`, creating intermediate
   * directories with markers.
   */
  async stage(sourcePath: string, relativePath: string): Promise<string> {
    const segments = relativePath.split('/').filter((s) => s.length > 0);
    const fileName = segments.pop();
    if (fileName === undefined) {
      throw new Error(`Empty relative path for ${sourcePath}`);
    }

    let current = this.folderRoot;
    for (const segment of segments) {
      current = path.join(current, segment);
      await fs.promises.mkdir(current, { recursive: true });
      await this.writeMarker(current);
    }

    const target = path.join(current, fileName);
    await fs.promises.copyFile(sourcePath, target);
    return target;
  }

  async hasChanges(): Promise<boolean> {
    const status = await this.git(this.dir, ['status', '--porcelain']);
    return status.trim().length > 0;
  }

  async commitAll(message: string): Promise<void> {
    await this.git(this.dir, ['add', '-A']);
    await this.git(this.dir, ['commit', '-m', message]);
  }

  async push(): Promise<void> {
    await this.git(this.dir, ['push']);
  }

  /** Overwrites remote history and sets the upstream */
  async forcePush(): Promise<void> {
    await this.git(this.dir, ['push', '--force', '-u', 'origin', this.branch]);
  }

  async destroy(): Promise<void> {
    await fs.promises.rm(this.dir, { recursive: true, force: true });
  }

  private async writeMarker(dir: string): Promise<void> {
    const marker = path.join(dir, this.markerFileName);
    await fs.promises.writeFile(marker, '', { flag: 'a' });
  }
}
