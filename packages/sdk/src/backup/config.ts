/**
 * Backup Configuration
 */

import * as os from 'node:os';
import * as path from 'node:path';
import type { GitIdentity, PathMappingOptions } from '@chunkstash/core';
import { DEFAULT_PUSHER_CONFIG, type BatchPusherConfig, type PushEvent } from '@chunkstash/remote-git';
import { DEFAULT_CHUNKER_CONFIG } from '@chunkstash/chunker';
import type { BackupReport } from './types.js';

// ========== Hooks ==========

export interface BackupHooks {
  onPush?: (event: PushEvent) => void;
  onFileSkipped?: (relativePath: string) => void;
  onSplitFailed?: (relativePath: string, error: Error) => void;
  onComplete?: (report: BackupReport) => void;
  onError?: (error: Error) => void;
}

// ========== Config ==========

export interface BackupConfig {
  repoUrl: string;
  branch?: string;
  chunkSizeBytes?: number;
  /** Files strictly larger than this are split (default: chunkSizeBytes) */
  chunkThresholdBytes?: number;
  splitConcurrency?: number;
  push?: BatchPusherConfig;
  /** Bound on waiting for the queue and pusher once producers are done */
  drainTimeoutMs?: number;
  skipFolders?: string[];
  pathMapping?: PathMappingOptions;
  tempDir?: string;
  keepWorkingTree?: boolean;
  identity?: Partial<GitIdentity>;
  markerFileName?: string;
  hooks?: BackupHooks;
}

// ========== Defaults ==========

export const DEFAULT_BACKUP = {
  branch: 'main',
  chunkSizeBytes: DEFAULT_CHUNKER_CONFIG.chunkSizeBytes,
  splitConcurrency: 4,
  drainTimeoutMs: 600_000,               // 10 minutes
  identity: {
    name: 'chunkstash-bot',
    email: 'backup@chunkstash.local',
  },
  markerFileName: '.gitkeep',
} as const;

export function defaultTempDir(): string {
  return path.join(os.tmpdir(), 'chunkstash');
}

// ========== Resolved ==========

export interface ResolvedBackupConfig {
  repoUrl: string;
  branch: string;
  chunkSizeBytes: number;
  chunkThresholdBytes: number;
  splitConcurrency: number;
  push: Required<BatchPusherConfig>;
  drainTimeoutMs: number;
  skipFolders: string[];
  pathMapping: PathMappingOptions;
  tempDir: string;
  keepWorkingTree: boolean;
  identity: GitIdentity;
  markerFileName: string;
  hooks: BackupHooks;
}

function requirePositiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

export function resolveBackupConfig(config: BackupConfig): ResolvedBackupConfig {
  if (!config.repoUrl) {
    throw new Error('repoUrl is required');
  }

  const chunkSizeBytes = requirePositiveInteger(
    'chunkSizeBytes',
    config.chunkSizeBytes ?? DEFAULT_BACKUP.chunkSizeBytes,
  );

  return {
    repoUrl: config.repoUrl,
    branch: config.branch ?? DEFAULT_BACKUP.branch,
    chunkSizeBytes,
    chunkThresholdBytes: config.chunkThresholdBytes ?? chunkSizeBytes,
    splitConcurrency: requirePositiveInteger(
      'splitConcurrency',
      config.splitConcurrency ?? DEFAULT_BACKUP.splitConcurrency,
    ),
    push: {
      batchSize: requirePositiveInteger('push.batchSize', config.push?.batchSize ?? DEFAULT_PUSHER_CONFIG.batchSize),
      intervalMs: config.push?.intervalMs ?? DEFAULT_PUSHER_CONFIG.intervalMs,
      pollTimeoutMs: config.push?.pollTimeoutMs ?? DEFAULT_PUSHER_CONFIG.pollTimeoutMs,
    },
    drainTimeoutMs: config.drainTimeoutMs ?? DEFAULT_BACKUP.drainTimeoutMs,
    skipFolders: config.skipFolders ?? [],
    pathMapping: config.pathMapping ?? {},
    tempDir: config.tempDir ?? defaultTempDir(),
    keepWorkingTree: config.keepWorkingTree ?? false,
    identity: {
      name: config.identity?.name ?? DEFAULT_BACKUP.identity.name,
      email: config.identity?.email ?? DEFAULT_BACKUP.identity.email,
    },
    markerFileName: config.markerFileName ?? DEFAULT_BACKUP.markerFileName,
    hooks: config.hooks ?? {},
  };
}
