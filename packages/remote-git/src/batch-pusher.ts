/**
 * Batch Pusher
 *
 * The single consumer of the transfer queue. Stages each item into the
 * working tree and pushes in batches: when the batch is full, when the push
 * interval has elapsed, and once the producers are done and the queue is
 * drained. A final flush pushes whatever is left.
 */

import * as fs from 'node:fs';
import {
  ChunkIoError,
  PushFailedError,
  PusherStateMachine,
  type PusherEvent,
  type PusherState,
  type PushKind,
  type PushOutcome,
  type PushResult,
  type TransferItem,
  type TransferQueue,
  type UploadStatistics,
} from '@chunkstash/core';
import type { WorkingTree } from './working-tree.js';
import { type BatchPusherConfig, type BatchPusherHooks, DEFAULT_PUSHER_CONFIG } from './types.js';

export interface BatchPusherOptions extends BatchPusherConfig {
  queue: TransferQueue;
  tree: WorkingTree;
  stats: UploadStatistics;
  hooks?: BatchPusherHooks;
  /** Clock in milliseconds; injectable for simulated time */
  now?: () => number;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class BatchPusher {
  private queue: TransferQueue;
  private tree: WorkingTree;
  private stats: UploadStatistics;
  private hooks: BatchPusherHooks;
  private now: () => number;
  private batchSize: number;
  private intervalMs: number;
  private pollTimeoutMs: number;

  private stateMachine = new PusherStateMachine();
  private batch: TransferItem[] = [];
  private lastPushAt = 0;
  private pushes = 0;

  constructor(options: BatchPusherOptions) {
    this.queue = options.queue;
    this.tree = options.tree;
    this.stats = options.stats;
    this.hooks = options.hooks ?? {};
    this.now = options.now ?? Date.now;
    this.batchSize = options.batchSize ?? DEFAULT_PUSHER_CONFIG.batchSize;
    this.intervalMs = options.intervalMs ?? DEFAULT_PUSHER_CONFIG.intervalMs;
    this.pollTimeoutMs = options.pollTimeoutMs ?? DEFAULT_PUSHER_CONFIG.pollTimeoutMs;

    if (!Number.isInteger(this.batchSize) || this.batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${this.batchSize}`);
    }
  }

  get state(): PusherState {
    return this.stateMachine.getState();
  }

  /** Items staged but not yet pushed */
  get pendingBatch(): readonly TransferItem[] {
    return this.batch;
  }

  /**
   * Drain the queue until the producers are done and it is empty, or the
   * stop sentinel arrives. Resolves with the outcome; never rejects.
   */
  async run(): Promise<PushOutcome> {
    try {
      return await this.drain();
    } catch (error) {
      return this.fail(toError(error));
    }
  }

  private async drain(): Promise<PushOutcome> {
    this.transition({ type: 'START' });
    this.lastPushAt = this.now();

    while (!this.queue.isComplete() || this.queue.size > 0) {
      const next = await this.queue.get(this.pollTimeoutMs);

      if (next.kind === 'stop') break;

      if (next.kind === 'timeout') {
        if (this.batch.length > 0 && this.intervalElapsed()) {
          await this.tryPush();
        }
        continue;
      }

      const { item } = next;
      try {
        await this.tree.stage(item.sourcePath, item.relativePath);
      } catch (error) {
        this.queue.taskDone();
        const failure = new ChunkIoError(item.sourcePath, `staging failed: ${toError(error).message}`);
        this.transition({ type: 'STAGE_FAILED', error: failure });
        return this.fail(failure);
      }

      this.stats.recordUploaded();
      this.queue.taskDone();
      this.batch.push(item);

      const trigger = this.pushTrigger();
      if (trigger) {
        const result = await this.mustPush(trigger);
        if (!result.ok) return this.fail(result.error);
      }
    }

    this.transition({ type: 'INPUT_EXHAUSTED' });
    const result = await this.mustPush('final');
    if (!result.ok) return this.fail(result.error);

    this.transition({ type: 'FINISH' });
    return { ok: true, pushes: this.pushes, uploaded: this.stats.uploaded };
  }

  /**
   * Push whose failure is logged and swallowed; the batch is kept for the
   * next trigger.
   */
  async tryPush(): Promise<PushResult> {
    return this.push('opportunistic', false);
  }

  /** Push whose failure the caller must treat as fatal */
  async mustPush(kind: PushKind = 'final'): Promise<PushResult> {
    return this.push(kind, true);
  }

  private pushTrigger(): PushKind | null {
    if (this.batch.length >= this.batchSize) return 'batch-full';
    if (this.intervalElapsed()) return 'interval';
    if (this.queue.isComplete() && this.queue.size === 0) return 'final';
    return null;
  }

  private intervalElapsed(): boolean {
    return this.now() - this.lastPushAt >= this.intervalMs;
  }

  private async push(kind: PushKind, mandatory: boolean): Promise<PushResult> {
    const count = this.batch.length;
    if (count === 0) {
      return { ok: true, pushed: 0, forced: false };
    }

    const begin = this.stateMachine.transition({ type: 'PUSH_BEGIN', mandatory });
    if (!begin.success) {
      return { ok: false, error: new Error(begin.error ?? `Cannot push in state ${begin.newState}`) };
    }

    const uploaded = this.stats.uploaded;
    let forced: boolean;
    try {
      if (await this.tree.hasChanges()) {
        const message = kind === 'final'
          ? `Add final ${count} file(s) (${uploaded} total)`
          : `Add ${count} file(s) (${uploaded} total)`;
        await this.tree.commitAll(message);
      }
      forced = await this.pushWithFallback();
    } catch (error) {
      const failure = toError(error);
      if (mandatory) {
        this.transition({ type: 'PUSH_FAILED', error: failure });
        console.error(`[Chunkstash:BatchPusher] ${kind} push failed: ${failure.message}`);
      } else {
        this.transition({ type: 'PUSH_SKIPPED' });
        console.warn(`[Chunkstash:BatchPusher] Push failed, will retry: ${failure.message}`);
      }
      return { ok: false, error: failure };
    }

    const pushed = this.batch;
    this.batch = [];
    this.lastPushAt = this.now();
    this.pushes = this.stats.recordPush();
    this.transition({ type: 'PUSH_SUCCEEDED' });

    console.log(`[Chunkstash:BatchPusher] Pushed ${count} file(s) (${uploaded} total)`);
    await this.removeTransient(pushed);
    this.hooks.onPush?.({ kind, pushed: count, uploaded, forced });

    return { ok: true, pushed: count, forced };
  }

  /** Resolves true when the forcing push was needed */
  private async pushWithFallback(): Promise<boolean> {
    try {
      await this.tree.push();
      return false;
    } catch (error) {
      console.warn(`[Chunkstash:BatchPusher] Push rejected, retrying with --force: ${toError(error).message}`);
    }

    try {
      await this.tree.forcePush();
      return true;
    } catch (error) {
      throw new PushFailedError(toError(error).message, error);
    }
  }

  private async removeTransient(items: readonly TransferItem[]): Promise<void> {
    for (const item of items) {
      if (!item.transient) continue;
      await fs.promises.rm(item.sourcePath, { force: true }).catch((error: unknown) => {
        console.warn(`[Chunkstash:BatchPusher] Could not remove ${item.sourcePath}: ${toError(error).message}`);
      });
    }
  }

  private transition(event: PusherEvent): void {
    const result = this.stateMachine.transition(event);
    if (!result.success) {
      console.warn(`[Chunkstash:BatchPusher] ${result.error}`);
    }
  }

  private fail(error: Error): PushOutcome {
    return { ok: false, error, pushes: this.pushes, uploaded: this.stats.uploaded };
  }
}
