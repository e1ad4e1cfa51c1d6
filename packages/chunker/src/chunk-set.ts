/**
 * Chunk set discovery for restore: groups `.partNNN` files by base name and
 * checks that a set is complete before it is reassembled.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  AmbiguousChunkSetError,
  ChunkIoError,
  ChunkSetError,
  parseChunkName,
} from '@chunkstash/core';
import type { ChunkSet } from './types.js';

/**
 * Group chunk file names by base name. Names that are not chunk names are
 * ignored. Each set's chunks are sorted by sequence.
 */
export function groupChunkSets(fileNames: Iterable<string>): ChunkSet[] {
  const sets = new Map<string, ChunkSet>();

  for (const fileName of fileNames) {
    const parsed = parseChunkName(fileName);
    if (!parsed) continue;

    let set = sets.get(parsed.baseName);
    if (!set) {
      set = { baseName: parsed.baseName, chunks: [] };
      sets.set(parsed.baseName, set);
    }
    set.chunks.push({ fileName, sequence: parsed.sequence });
  }

  const result = [...sets.values()];
  for (const set of result) {
    set.chunks.sort((a, b) => a.sequence - b.sequence);
  }
  return result.sort((a, b) => (a.baseName < b.baseName ? -1 : a.baseName > b.baseName ? 1 : 0));
}

/**
 * Pick the one chunk set to restore. `fileName` selects by base name when
 * the folder holds more than one.
 */
export function selectChunkSet(sets: readonly ChunkSet[], fileName?: string): ChunkSet {
  if (fileName !== undefined) {
    const match = sets.find((s) => s.baseName === fileName);
    if (!match) {
      throw new ChunkSetError(`No chunk files found for ${fileName}`);
    }
    return match;
  }

  const [only, ...rest] = sets;
  if (!only) {
    throw new ChunkSetError('No chunk files found');
  }
  if (rest.length > 0) {
    throw new AmbiguousChunkSetError(sets.map((s) => s.baseName));
  }
  return only;
}

/**
 * Require sequences 1..n with no gaps or duplicates, and no empty chunk
 * files under `folder`. Resolves with the chunk paths in sequence order.
 */
export async function validateChunkSet(folder: string, set: ChunkSet): Promise<string[]> {
  const paths: string[] = [];

  for (const [index, chunk] of set.chunks.entries()) {
    const expected = index + 1;
    if (chunk.sequence !== expected) {
      throw new ChunkSetError(
        `Chunk set ${set.baseName} is not contiguous: expected part ${expected}, found ${chunk.fileName}`,
      );
    }

    const chunkPath = path.join(folder, chunk.fileName);
    let size: number;
    try {
      size = (await fs.promises.stat(chunkPath)).size;
    } catch (error) {
      throw new ChunkIoError(chunkPath, error instanceof Error ? error.message : String(error));
    }
    if (size === 0) {
      throw new ChunkSetError(`Chunk ${chunk.fileName} is empty`);
    }
    paths.push(chunkPath);
  }

  return paths;
}
