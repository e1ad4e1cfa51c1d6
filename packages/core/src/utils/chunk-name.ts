/**
 * Chunk File Naming
 *
 * Chunks are named `<original-name>.part<NNN>`, NNN being the 1-based
 * sequence number zero-padded to at least three digits. Lexicographic
 * order equals sequence order for sets of up to 999 chunks.
 */

const CHUNK_SUFFIX = /\.part(\d{3,})$/;

export interface ParsedChunkName {
  baseName: string;
  sequence: number;
}

export function formatChunkName(baseName: string, sequence: number): string {
  if (!Number.isInteger(sequence) || sequence < 1) {
    throw new RangeError(`Chunk sequence must be a positive integer, got ${sequence}`);
  }
  return `${baseName}.part${String(sequence).padStart(3, '0')}`;
}

export function parseChunkName(fileName: string): ParsedChunkName | null {
  const match = CHUNK_SUFFIX.exec(fileName);
  if (!match || match[1] === undefined) return null;

  const sequence = parseInt(match[1], 10);
  const baseName = fileName.slice(0, match.index);
  if (sequence < 1 || baseName.length === 0) return null;

  return { baseName, sequence };
}

export function isChunkName(fileName: string): boolean {
  return parseChunkName(fileName) !== null;
}

/**
 * Name of the first chunk of a file; its presence on the remote marks the
 * file as already split and uploaded.
 */
export function firstChunkName(baseName: string): string {
  return formatChunkName(baseName, 1);
}
