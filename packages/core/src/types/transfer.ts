/**
 * Transfer Pipeline Types
 *
 * Items flowing from the backup orchestrator (and its chunking workers)
 * through the transfer queue into the batch pusher.
 */

/**
 * One file ready to be staged into the working tree.
 */
export interface TransferItem {
  /** Absolute path of the bytes to upload */
  sourcePath: string;
  /** POSIX-style path relative to the remote folder root */
  relativePath: string;
  /** True for chunk files created by this run; they are deleted once pushed */
  transient: boolean;
}

export type QueueGetResult =
  | { kind: 'item'; item: TransferItem }
  | { kind: 'stop' }
  | { kind: 'timeout' };

export interface UploadStatsSnapshot {
  totalItems: number;
  filesSplit: number;
  itemsUploaded: number;
  pushes: number;
  skippedFiles: number;
}

export type PushKind = 'batch-full' | 'interval' | 'final' | 'opportunistic';

export type PushResult =
  | { ok: true; pushed: number; forced: boolean }
  | { ok: false; error: Error };

/**
 * Terminal result of one batch pusher run. Never thrown; inspected by the
 * orchestrator.
 */
export type PushOutcome =
  | { ok: true; pushes: number; uploaded: number }
  | { ok: false; error: Error; pushes: number; uploaded: number };
