/**
 * Chunker
 *
 * Splits a file into ordered fixed-size chunk files and concatenates chunk
 * files back into the original byte stream. Both directions stream through
 * a single reusable buffer.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { ChunkIoError, ChunkSetError, formatChunkName, parseChunkName } from '@chunkstash/core';
import {
  type SplitOptions,
  type ReassembleOptions,
  DEFAULT_CHUNKER_CONFIG,
  MIN_REASSEMBLY_BUFFER,
} from './types.js';

type FileHandle = fs.promises.FileHandle;

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Split `sourceFile` into `<name>.part001`, `<name>.part002`, ... under
 * `outputDir`. Every chunk except possibly the last is exactly
 * `maxChunkBytes` long; an empty source produces no chunks.
 *
 * Chunks already written stay on disk when the split fails.
 */
export async function splitFile(
  sourceFile: string,
  outputDir: string,
  maxChunkBytes: number,
  options: SplitOptions = {},
): Promise<string[]> {
  if (!Number.isInteger(maxChunkBytes) || maxChunkBytes <= 0) {
    throw new RangeError(`maxChunkBytes must be a positive integer, got ${maxChunkBytes}`);
  }

  options.signal?.throwIfAborted();

  const baseName = path.basename(sourceFile);
  let source: FileHandle;
  try {
    source = await fs.promises.open(sourceFile, 'r');
  } catch (error) {
    throw new ChunkIoError(sourceFile, describe(error));
  }

  const chunkPaths: string[] = [];
  try {
    await fs.promises.mkdir(outputDir, { recursive: true }).catch((error: unknown) => {
      throw new ChunkIoError(outputDir, describe(error));
    });

    const buffer = Buffer.allocUnsafe(maxChunkBytes);

    for (let sequence = 1; ; sequence++) {
      options.signal?.throwIfAborted();

      const bytesRead = await readFull(source, buffer, sourceFile);
      if (bytesRead === 0) break;

      const chunkPath = path.join(outputDir, formatChunkName(baseName, sequence));
      try {
        await fs.promises.writeFile(chunkPath, buffer.subarray(0, bytesRead));
      } catch (error) {
        throw new ChunkIoError(chunkPath, describe(error));
      }
      chunkPaths.push(chunkPath);

      await options.onChunk?.(chunkPath, sequence);

      if (bytesRead < maxChunkBytes) break;
    }
  } finally {
    await source.close();
  }

  return chunkPaths;
}

/**
 * Fill `buffer` from the handle's current position; short only at EOF.
 */
async function readFull(handle: FileHandle, buffer: Buffer, filePath: string): Promise<number> {
  let offset = 0;
  try {
    while (offset < buffer.length) {
      const { bytesRead } = await handle.read(buffer, offset, buffer.length - offset, null);
      if (bytesRead === 0) break;
      offset += bytesRead;
    }
  } catch (error) {
    throw new ChunkIoError(filePath, describe(error));
  }
  return offset;
}

/**
 * Concatenate chunk files, in the given order, into `outputDir/<base name>`
 * where the base name is the first chunk's name without `.partNNN`.
 * Ordering is the caller's responsibility; restore takes it from groupChunkSets.
 */
export async function reassembleChunks(
  orderedChunkPaths: readonly string[],
  outputDir: string,
  options: ReassembleOptions = {},
): Promise<string> {
  const [first] = orderedChunkPaths;
  if (first === undefined) {
    throw new ChunkSetError('No chunk files to reassemble');
  }

  const parsed = parseChunkName(path.basename(first));
  if (!parsed) {
    throw new ChunkSetError(`Not a chunk file: ${path.basename(first)}`);
  }

  const bufferSize = Math.max(
    options.bufferSize ?? DEFAULT_CHUNKER_CONFIG.reassemblyBufferBytes,
    MIN_REASSEMBLY_BUFFER,
  );
  const outputPath = path.join(outputDir, parsed.baseName);
  const buffer = Buffer.allocUnsafe(bufferSize);

  let output: FileHandle;
  try {
    await fs.promises.mkdir(outputDir, { recursive: true });
    output = await fs.promises.open(outputPath, 'w');
  } catch (error) {
    throw new ChunkIoError(outputPath, describe(error));
  }

  try {
    for (const chunkPath of orderedChunkPaths) {
      await appendFile(output, chunkPath, outputPath, buffer);
    }
  } finally {
    await output.close();
  }

  return outputPath;
}

async function appendFile(output: FileHandle, chunkPath: string, outputPath: string, buffer: Buffer): Promise<void> {
  let input: FileHandle;
  try {
    input = await fs.promises.open(chunkPath, 'r');
  } catch (error) {
    throw new ChunkIoError(chunkPath, describe(error));
  }

  try {
    for (;;) {
      const bytesRead = await readFull(input, buffer, chunkPath);
      if (bytesRead === 0) break;

      let written = 0;
      try {
        while (written < bytesRead) {
          const { bytesWritten } = await output.write(buffer, written, bytesRead - written);
          written += bytesWritten;
        }
      } catch (error) {
        throw new ChunkIoError(outputPath, describe(error));
      }

      if (bytesRead < buffer.length) break;
    }
  } finally {
    await input.close();
  }
}
