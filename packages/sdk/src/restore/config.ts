/**
 * Restore Configuration
 */

import type { PathMappingOptions } from '@chunkstash/core';
import { DEFAULT_CHUNKER_CONFIG, MIN_REASSEMBLY_BUFFER } from '@chunkstash/chunker';
import { defaultTempDir } from '../backup/config.js';
import type { RestoreReport } from './types.js';

export interface RestoreHooks {
  onComplete?: (report: RestoreReport) => void;
  onError?: (error: Error) => void;
}

export interface RestoreConfig {
  repoUrl: string;
  pathMapping?: PathMappingOptions;
  tempDir?: string;
  /** Reassembly copy buffer in bytes, at least 1 MiB */
  bufferSize?: number;
  /** Keep the clone and reassembled file for inspection */
  keepTemp?: boolean;
  hooks?: RestoreHooks;
}

export const DEFAULT_RESTORE = {
  bufferSize: DEFAULT_CHUNKER_CONFIG.reassemblyBufferBytes,
  keepTemp: false,
} as const;

export interface ResolvedRestoreConfig {
  repoUrl: string;
  pathMapping: PathMappingOptions;
  tempDir: string;
  bufferSize: number;
  keepTemp: boolean;
  hooks: RestoreHooks;
}

export function resolveRestoreConfig(config: RestoreConfig): ResolvedRestoreConfig {
  if (!config.repoUrl) {
    throw new Error('repoUrl is required');
  }

  const bufferSize = config.bufferSize ?? DEFAULT_RESTORE.bufferSize;
  if (!Number.isInteger(bufferSize) || bufferSize < MIN_REASSEMBLY_BUFFER) {
    throw new RangeError(`bufferSize must be an integer of at least ${MIN_REASSEMBLY_BUFFER}, got ${bufferSize}`);
  }

  return {
    repoUrl: config.repoUrl,
    pathMapping: config.pathMapping ?? {},
    tempDir: config.tempDir ?? defaultTempDir(),
    bufferSize,
    keepTemp: config.keepTemp ?? DEFAULT_RESTORE.keepTemp,
    hooks: config.hooks ?? {},
  };
}
