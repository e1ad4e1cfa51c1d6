/**
 * Skip predicates for files that already exist on the remote.
 */

import { firstChunkName } from '@chunkstash/core';
import type { ScannedFile, SkipPredicate } from './types.js';

/**
 * Matches by bare file name against the remote folder listing: small files
 * by their own name, large files by their first chunk name. Files with the
 * same name in different subfolders are indistinguishable.
 */
export class NameOnlySkipPredicate implements SkipPredicate {
  constructor(
    private readonly existingNames: ReadonlySet<string>,
    private readonly chunkThresholdBytes: number,
  ) {}

  shouldSkip(file: ScannedFile): boolean {
    const remoteName = file.size > this.chunkThresholdBytes ? firstChunkName(file.name) : file.name;
    return this.existingNames.has(remoteName);
  }
}

export function createNameOnlySkipPredicate(
  existingNames: ReadonlySet<string>,
  chunkThresholdBytes: number,
): SkipPredicate {
  return new NameOnlySkipPredicate(existingNames, chunkThresholdBytes);
}
