import type { PushKind } from '@chunkstash/core';

export interface PushEvent {
  kind: PushKind;
  /** Items in the pushed batch */
  pushed: number;
  /** Items uploaded so far in this run */
  uploaded: number;
  /** True when the normal push was rejected and the forcing push succeeded */
  forced: boolean;
}

export interface BatchPusherHooks {
  onPush?: (event: PushEvent) => void;
}

export interface BatchPusherConfig {
  /** Push once this many items are staged (default: 20) */
  batchSize?: number;
  /** Push once this long has passed since the last push (default: 30000) */
  intervalMs?: number;
  /** How long one queue poll waits for an item (default: 500) */
  pollTimeoutMs?: number;
}

export const DEFAULT_PUSHER_CONFIG = {
  batchSize: 20,
  intervalMs: 30_000,
  pollTimeoutMs: 500,
} as const;
