/**
 * Transfer Queue
 *
 * FIFO of transfer items between the producers (orchestrator, chunking
 * workers) and the single batch pusher consumer.
 *
 * - `get` waits at most `timeoutMs`, so the consumer can poll for interval
 *   pushes while the queue is empty.
 * - `taskDone` / `join` let the producer side wait until every enqueued
 *   item has been processed.
 * - The completion flag is separate from the stop sentinel: the consumer
 *   keeps running while the queue is not complete OR still non-empty.
 * - `abandon` is the discard sink used once the consumer has failed.
 */

import type { QueueGetResult, TransferItem } from '../types/index.js';

const STOP = Symbol('transfer-queue-stop');

type QueueEntry = TransferItem | typeof STOP;

type GetWaiter = (result: QueueGetResult) => void;

export interface TransferQueueOptions {
  /** Maximum queued items before `put` waits; unbounded when omitted */
  capacity?: number;
}

export class TransferQueue {
  private entries: QueueEntry[] = [];
  private unfinished = 0;
  private complete = false;
  private abandoned = false;
  private readonly capacity: number;
  private getWaiters: GetWaiter[] = [];
  private putWaiters: Array<() => void> = [];
  private joinWaiters: Array<() => void> = [];

  constructor(options: TransferQueueOptions = {}) {
    const capacity = options.capacity ?? Infinity;
    if (!(capacity > 0)) {
      throw new RangeError(`Queue capacity must be positive, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /** Queued entries, including a pending stop sentinel */
  get size(): number {
    return this.entries.length;
  }

  /** Items enqueued but not yet marked done */
  get pending(): number {
    return this.unfinished;
  }

  /**
   * Enqueue an item, waiting while a bounded queue is full.
   * Resolves false when the queue has been abandoned.
   */
  async put(item: TransferItem): Promise<boolean> {
    while (!this.abandoned && this.entries.length >= this.capacity) {
      await new Promise<void>((resolve) => this.putWaiters.push(resolve));
    }
    if (this.abandoned) return false;

    this.unfinished++;
    this.deliver(item);
    return true;
  }

  async get(timeoutMs: number): Promise<QueueGetResult> {
    const entry = this.entries.shift();
    if (entry !== undefined) {
      this.putWaiters.shift()?.();
      return toResult(entry);
    }
    if (this.abandoned) {
      return { kind: 'stop' };
    }

    return new Promise<QueueGetResult>((resolve) => {
      const waiter: GetWaiter = (result) => {
        clearTimeout(timer);
        resolve(result);
      };
      const timer = setTimeout(() => {
        this.getWaiters = this.getWaiters.filter((w) => w !== waiter);
        resolve({ kind: 'timeout' });
      }, timeoutMs);
      this.getWaiters.push(waiter);
    });
  }

  taskDone(): void {
    if (this.abandoned) return;
    if (this.unfinished <= 0) {
      throw new Error('taskDone() called more times than there were items');
    }
    this.unfinished--;
    if (this.unfinished === 0) {
      this.releaseJoiners();
    }
  }

  /**
   * Wait until every enqueued item has been marked done.
   * Resolves false if `timeoutMs` elapses first.
   */
  async join(timeoutMs?: number): Promise<boolean> {
    if (this.unfinished === 0) return true;

    return new Promise<boolean>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const joiner = () => {
        if (timer) clearTimeout(timer);
        resolve(true);
      };
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.joinWaiters = this.joinWaiters.filter((j) => j !== joiner);
          resolve(false);
        }, timeoutMs);
      }
      this.joinWaiters.push(joiner);
    });
  }

  /** Ask the consumer to stop, even before the completion flag is observed */
  requestStop(): void {
    this.deliver(STOP);
  }

  markComplete(): void {
    this.complete = true;
  }

  isComplete(): boolean {
    return this.complete;
  }

  isAbandoned(): boolean {
    return this.abandoned;
  }

  /**
   * Drop every queued item, settle all waiters and refuse further items.
   * Returns the discarded items.
   */
  abandon(): TransferItem[] {
    this.abandoned = true;
    const discarded = this.entries.filter(isItem);
    this.entries = [];
    this.unfinished = 0;

    for (const waiter of this.getWaiters.splice(0)) waiter({ kind: 'stop' });
    for (const resolve of this.putWaiters.splice(0)) resolve();
    this.releaseJoiners();

    return discarded;
  }

  private deliver(entry: QueueEntry): void {
    const waiter = this.getWaiters.shift();
    if (waiter) {
      waiter(toResult(entry));
    } else {
      this.entries.push(entry);
    }
  }

  private releaseJoiners(): void {
    for (const joiner of this.joinWaiters.splice(0)) joiner();
  }
}

function isItem(entry: QueueEntry): entry is TransferItem {
  return entry !== STOP;
}

function toResult(entry: QueueEntry): QueueGetResult {
  return isItem(entry) ? { kind: 'item', item: entry } : { kind: 'stop' };
}
