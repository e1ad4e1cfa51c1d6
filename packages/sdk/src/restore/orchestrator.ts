/**
 * Restore Orchestrator
 *
 * Clones the repository, reassembles one chunk set from a remote folder and
 * moves the result (extracted when it is an archive) next to where it was
 * backed up from.
 */

import { readdir, stat } from 'node:fs/promises';
import * as path from 'node:path';
import {
  RemoteFolderNotFoundError,
  generateRunId,
  reconstructLocalPath,
  splitRemotePath,
  type ArchiveService,
  type RemoteHost,
} from '@chunkstash/core';
import {
  ZipArchiveService,
  groupChunkSets,
  reassembleChunks,
  selectChunkSet,
  validateChunkSet,
} from '@chunkstash/chunker';
import { ensureRemoteReady, movePath, removeRunDirectory } from '../utils/index.js';
import { type ResolvedRestoreConfig, type RestoreConfig, resolveRestoreConfig } from './config.js';
import { resolveRestoreDestination } from './destination.js';
import type { RestoreOptions, RestoreReport } from './types.js';

export interface RestoreOrchestratorOptions {
  config: RestoreConfig;
  remote: RemoteHost;
  /** Defaults to ZIP handling */
  archive?: ArchiveService;
}

export class RestoreOrchestrator {
  private config: ResolvedRestoreConfig;
  private remote: RemoteHost;
  private archive: ArchiveService;

  constructor(options: RestoreOrchestratorOptions) {
    this.config = resolveRestoreConfig(options.config);
    this.remote = options.remote;
    this.archive = options.archive ?? new ZipArchiveService();
  }

  async restore(remoteFolderPath: string, options: RestoreOptions = {}): Promise<RestoreReport> {
    const parts = splitRemotePath(remoteFolderPath);
    const normalized = parts.join('/');

    await ensureRemoteReady(this.remote);

    const runDir = path.join(this.config.tempDir, generateRunId());
    const cloneDir = path.join(runDir, 'repo');
    console.log(`[Chunkstash:Restore] Restoring ${normalized}`);

    try {
      await this.remote.cloneRepo(this.config.repoUrl, cloneDir);

      const folder = path.join(cloneDir, ...parts);
      const folderStat = await stat(folder).catch(() => null);
      if (!folderStat?.isDirectory()) {
        throw new RemoteFolderNotFoundError(normalized);
      }

      const entries = await readdir(folder, { withFileTypes: true });
      const sets = groupChunkSets(entries.filter((e) => e.isFile()).map((e) => e.name));
      const set = selectChunkSet(sets, options.fileName);
      const chunkPaths = await validateChunkSet(folder, set);
      console.log(`[Chunkstash:Restore] Reassembling ${set.baseName} from ${chunkPaths.length} chunk(s)`);

      const reassembled = await reassembleChunks(chunkPaths, path.join(runDir, 'assembled'), {
        bufferSize: this.config.bufferSize,
      });
      const { size: restoredBytes } = await stat(reassembled);

      const localPath = reconstructLocalPath(normalized, this.config.pathMapping);
      const leaf = parts[parts.length - 1] ?? set.baseName;
      let destination: string;
      let extracted = false;
      // A single-file backup keeps its chunks in a folder named after the file
      const singleFile = leaf === set.baseName;

      if (!singleFile && this.archive.isArchive(reassembled)) {
        destination = await resolveRestoreDestination(path.dirname(localPath), leaf, {
          suffix: options.suffix,
        });
        const extractedDir = await this.archive.extractArchive(reassembled, path.join(runDir, 'extract'));
        await movePath(extractedDir, destination);
        extracted = true;
      } else {
        const parentDir = singleFile ? path.dirname(localPath) : localPath;
        destination = await resolveRestoreDestination(parentDir, set.baseName, {
          suffix: options.suffix,
          isFile: true,
        });
        await movePath(reassembled, destination);
      }

      const report: RestoreReport = {
        remoteFolderPath: normalized,
        destination,
        chunkCount: chunkPaths.length,
        restoredBytes,
        extracted,
      };
      console.log(`[Chunkstash:Restore] Restored to ${destination}`);
      this.config.hooks.onComplete?.(report);
      return report;
    } catch (error) {
      this.config.hooks.onError?.(error instanceof Error ? error : new Error(String(error)));
      throw error;
    } finally {
      if (this.config.keepTemp) {
        console.log(`[Chunkstash:Restore] Temporary files kept in ${runDir}`);
      } else {
        await removeRunDirectory(runDir, 'Restore');
      }
    }
  }
}
