/**
 * Backup Orchestrator
 *
 * Runs one backup: pre-flight checks, working tree setup, then producers
 * (the enumeration here plus a pool of chunking workers) feeding the
 * transfer queue while the batch pusher drains it.
 */

import { mkdir, stat } from 'node:fs/promises';
import * as path from 'node:path';
import {
  DrainTimeoutError,
  SourceNotFoundError,
  SplitFailedError,
  TransferQueue,
  UploadStatistics,
  deriveRemoteFolderParts,
  generateRunId,
  type ArchiveService,
  type GitRunner,
  type PushOutcome,
  type RemoteHost,
} from '@chunkstash/core';
import { ZipArchiveService, splitFile } from '@chunkstash/chunker';
import { BatchPusher, WorkingTree } from '@chunkstash/remote-git';
import { ensureRemoteReady, removeRunDirectory, runPool } from '../utils/index.js';
import { type BackupConfig, type ResolvedBackupConfig, resolveBackupConfig } from './config.js';
import { scanSource } from './scanner.js';
import { createNameOnlySkipPredicate } from './skip-predicate.js';
import type { BackupOptions, BackupReport, ScannedFile, SplitFailure } from './types.js';

export interface BackupOrchestratorOptions {
  config: BackupConfig;
  remote: RemoteHost;
  /** Used when a folder is backed up as one archive; defaults to ZIP */
  archive?: ArchiveService;
  /** Defaults to the git binary */
  git?: GitRunner;
  /** Clock handed to the batch pusher */
  now?: () => number;
}

interface RunContext {
  /** The source, or the archive standing in for it */
  sourcePath: string;
  remoteFolderPath: string;
  chunkDir: string;
  queue: TransferQueue;
  stats: UploadStatistics;
  signal: AbortSignal;
  skippedFiles: string[];
  failedSplits: SplitFailure[];
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class BackupOrchestrator {
  private config: ResolvedBackupConfig;
  private remote: RemoteHost;
  private archive: ArchiveService;
  private git?: GitRunner;
  private now?: () => number;

  constructor(options: BackupOrchestratorOptions) {
    this.config = resolveBackupConfig(options.config);
    this.remote = options.remote;
    this.archive = options.archive ?? new ZipArchiveService();
    this.git = options.git;
    this.now = options.now;
  }

  async backup(source: string, options: BackupOptions = {}): Promise<BackupReport> {
    const sourcePath = path.resolve(source);
    const sourceStat = await stat(sourcePath).catch(() => null);
    if (!sourceStat) {
      throw new SourceNotFoundError(sourcePath);
    }

    await ensureRemoteReady(this.remote);

    const runId = generateRunId();
    const remoteParts = deriveRemoteFolderParts(sourcePath, this.config.pathMapping);
    const remoteFolderPath = remoteParts.join('/');
    const runDir = path.join(this.config.tempDir, runId);
    const chunkDir = path.join(runDir, 'chunks');
    const keepWorkingTree = options.keepWorkingTree ?? this.config.keepWorkingTree;

    console.log(`[Chunkstash:Backup] ${sourcePath} -> ${remoteFolderPath} (run ${runId})`);

    let tree: WorkingTree | undefined;
    let succeeded = false;
    try {
      await mkdir(chunkDir, { recursive: true });
      tree = await WorkingTree.create({
        baseDir: path.join(runDir, 'repo'),
        repoUrl: this.config.repoUrl,
        branch: this.config.branch,
        identity: this.config.identity,
        markerFileName: this.config.markerFileName,
        git: this.git,
      });
      await tree.prepareFolder(remoteParts);

      let uploadPath = sourcePath;
      const archiveFolder = options.archive === true && sourceStat.isDirectory();
      if (archiveFolder) {
        uploadPath = path.join(runDir, 'archive', `${path.basename(sourcePath)}.zip`);
        await this.archive.createArchive(sourcePath, uploadPath);
        console.log(`[Chunkstash:Backup] Archived ${sourcePath} into ${path.basename(uploadPath)}`);
      }

      const report = await this.transfer(tree, {
        runId,
        sourcePath,
        uploadPath,
        remoteFolderPath,
        chunkDir,
        isFile: archiveFolder || sourceStat.isFile(),
        alwaysSplit: archiveFolder,
        options,
      });

      succeeded = true;
      console.log(
        `[Chunkstash:Backup] Uploaded ${report.itemsUploaded}/${report.totalItems} item(s) in ${report.pushes} push(es)`,
      );
      this.config.hooks.onComplete?.(report);
      return report;
    } catch (error) {
      this.config.hooks.onError?.(toError(error));
      throw error;
    } finally {
      if (tree && !keepWorkingTree) {
        await tree.destroy();
      }
      if (succeeded) {
        await removeRunDirectory(keepWorkingTree ? chunkDir : runDir, 'Backup');
      } else {
        console.warn(`[Chunkstash:Backup] Chunk files kept in ${chunkDir}`);
      }
      if (tree && keepWorkingTree) {
        console.log(`[Chunkstash:Backup] Working tree kept at ${tree.dir}`);
      }
    }
  }

  private async transfer(
    tree: WorkingTree,
    run: {
      runId: string;
      sourcePath: string;
      uploadPath: string;
      remoteFolderPath: string;
      chunkDir: string;
      isFile: boolean;
      alwaysSplit: boolean;
      options: BackupOptions;
    },
  ): Promise<BackupReport> {
    const queue = new TransferQueue();
    const stats = new UploadStatistics();
    const controller = new AbortController();

    const pusher = new BatchPusher({
      queue,
      tree,
      stats,
      ...this.config.push,
      now: this.now,
      hooks: { onPush: this.config.hooks.onPush },
    });

    // A failed pusher stops the producers: no new splits, late chunks discarded
    const pushing: Promise<PushOutcome> = pusher.run().then((outcome) => {
      if (!outcome.ok) {
        controller.abort(outcome.error);
        const discarded = queue.abandon();
        if (discarded.length > 0) {
          console.warn(`[Chunkstash:Backup] Discarded ${discarded.length} queued item(s) after push failure`);
        }
      }
      return outcome;
    });

    const ctx: RunContext = {
      sourcePath: run.uploadPath,
      remoteFolderPath: run.remoteFolderPath,
      chunkDir: run.chunkDir,
      queue,
      stats,
      signal: controller.signal,
      skippedFiles: [],
      failedSplits: [],
    };

    try {
      if (run.isFile) {
        await this.produceFile(ctx, run.alwaysSplit);
      } else {
        await this.produceFolder(ctx, run.options);
      }
    } catch (error) {
      controller.abort(error);
      queue.abandon();
      const outcome = await pushing;
      throw outcome.ok ? error : outcome.error;
    }

    queue.markComplete();
    await Promise.race([queue.join(), pushing]);

    const outcome = await this.waitForPusher(pushing, pusher, queue);
    if (!outcome.ok) {
      throw outcome.error;
    }

    const snapshot = stats.snapshot();
    return {
      runId: run.runId,
      source: run.sourcePath,
      remoteFolderPath: run.remoteFolderPath,
      totalItems: snapshot.totalItems,
      filesSplit: snapshot.filesSplit,
      itemsUploaded: snapshot.itemsUploaded,
      pushes: snapshot.pushes,
      skippedFiles: ctx.skippedFiles,
      failedSplits: ctx.failedSplits,
    };
  }

  private async waitForPusher(
    pushing: Promise<PushOutcome>,
    pusher: BatchPusher,
    queue: TransferQueue,
  ): Promise<PushOutcome> {
    const { drainTimeoutMs } = this.config;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), drainTimeoutMs);
    });

    try {
      const result = await Promise.race([pushing, timeout]);
      if (result === 'timeout') {
        const pending = pusher.pendingBatch.length + queue.pending;
        queue.abandon();
        throw new DrainTimeoutError(drainTimeoutMs, pending);
      }
      return result;
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Split a file into `outDir`, enqueueing each chunk under `relativeParent`
   * as soon as it is written. Resolves with the chunk count.
   */
  private async splitAndEnqueue(
    ctx: RunContext,
    filePath: string,
    outDir: string,
    relativeParent: string,
  ): Promise<number> {
    const chunks = await splitFile(filePath, outDir, this.config.chunkSizeBytes, {
      signal: ctx.signal,
      onChunk: async (chunkPath) => {
        const name = path.basename(chunkPath);
        await ctx.queue.put({
          sourcePath: chunkPath,
          relativePath: relativeParent ? `${relativeParent}/${name}` : name,
          transient: true,
        });
      },
    });
    ctx.stats.recordSplit(chunks.length);
    return chunks.length;
  }

  /**
   * An archive is always split so restore finds it as a chunk set.
   */
  private async produceFile(ctx: RunContext, alwaysSplit: boolean): Promise<void> {
    const { size } = await stat(ctx.sourcePath);
    ctx.stats.setTotal(1);

    if (alwaysSplit || size > this.config.chunkThresholdBytes) {
      let count: number;
      try {
        count = await this.splitAndEnqueue(ctx, ctx.sourcePath, ctx.chunkDir, '');
      } catch (error) {
        if (ctx.signal.aborted) throw error;
        throw new SplitFailedError(ctx.sourcePath, toError(error).message);
      }
      console.log(`[Chunkstash:Backup] Split ${path.basename(ctx.sourcePath)} into ${count} chunk(s)`);
    } else {
      await ctx.queue.put({
        sourcePath: ctx.sourcePath,
        relativePath: path.basename(ctx.sourcePath),
        transient: false,
      });
    }
  }

  private async produceFolder(ctx: RunContext, options: BackupOptions): Promise<void> {
    const threshold = this.config.chunkThresholdBytes;
    const existing = await this.remote.listExistingFiles(this.config.repoUrl, ctx.remoteFolderPath);
    const files = await scanSource(ctx.sourcePath, {
      skipFolders: [...this.config.skipFolders, ...(options.skipFolders ?? [])],
    });
    const predicate = (options.skipPredicate ?? createNameOnlySkipPredicate)(existing, threshold);

    const pending: ScannedFile[] = [];
    for (const file of files) {
      if (predicate.shouldSkip(file)) {
        ctx.skippedFiles.push(file.relativePath);
        ctx.stats.recordSkipped();
        this.config.hooks.onFileSkipped?.(file.relativePath);
      } else {
        pending.push(file);
      }
    }
    if (ctx.skippedFiles.length > 0) {
      console.log(`[Chunkstash:Backup] Skipping ${ctx.skippedFiles.length} file(s) already on the remote`);
    }

    ctx.stats.setTotal(pending.length);
    const small = pending.filter((f) => f.size <= threshold);
    const large = pending.filter((f) => f.size > threshold);

    for (const file of small) {
      const accepted = await ctx.queue.put({
        sourcePath: file.absolutePath,
        relativePath: file.relativePath,
        transient: false,
      });
      if (!accepted) return;
    }

    if (large.length === 0) return;
    console.log(
      `[Chunkstash:Backup] Splitting ${large.length} large file(s) with ${this.config.splitConcurrency} worker(s)`,
    );

    const results = await runPool(
      large,
      this.config.splitConcurrency,
      (file) => {
        const relativeParent = path.posix.dirname(file.relativePath);
        const parent = relativeParent === '.' ? '' : relativeParent;
        const outDir = parent ? path.join(ctx.chunkDir, ...parent.split('/')) : ctx.chunkDir;
        return this.splitAndEnqueue(ctx, file.absolutePath, outDir, parent);
      },
      { signal: ctx.signal },
    );

    if (ctx.signal.aborted) return;

    for (const result of results) {
      if (result.ok || !('error' in result)) continue;
      const failure: SplitFailure = { relativePath: result.item.relativePath, error: result.error };
      ctx.failedSplits.push(failure);
      console.warn(`[Chunkstash:Backup] Failed to split ${failure.relativePath}: ${failure.error.message}`);
      this.config.hooks.onSplitFailed?.(failure.relativePath, failure.error);
    }
  }
}
