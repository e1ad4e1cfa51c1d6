/**
 * Upload Statistics
 *
 * Counters for one backup run. Chunking workers and the batch pusher all
 * mutate the same instance; every mutation is a single synchronous step on
 * the event loop, so no interleaving can tear a counter update.
 */

import type { UploadStatsSnapshot } from '../types/index.js';

export class UploadStatistics {
  private totalItems = 0;
  private filesSplit = 0;
  private itemsUploaded = 0;
  private pushes = 0;
  private skippedFiles = 0;

  setTotal(count: number): void {
    this.totalItems = count;
  }

  /**
   * A large file was split: it now stands for `chunkCount` items instead
   * of one.
   */
  recordSplit(chunkCount: number): void {
    this.filesSplit++;
    this.totalItems += chunkCount - 1;
  }

  /** Returns the running uploaded total */
  recordUploaded(): number {
    this.itemsUploaded++;
    return this.itemsUploaded;
  }

  recordPush(): number {
    this.pushes++;
    return this.pushes;
  }

  recordSkipped(count = 1): void {
    this.skippedFiles += count;
  }

  get uploaded(): number {
    return this.itemsUploaded;
  }

  snapshot(): UploadStatsSnapshot {
    return {
      totalItems: this.totalItems,
      filesSplit: this.filesSplit,
      itemsUploaded: this.itemsUploaded,
      pushes: this.pushes,
      skippedFiles: this.skippedFiles,
    };
  }
}
