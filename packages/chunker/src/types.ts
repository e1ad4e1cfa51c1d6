/**
 * Chunker Configuration Types
 */

export interface SplitOptions {
  /**
   * Called after each chunk file is fully written, in sequence order.
   * Awaited before the next chunk is read.
   */
  onChunk?: (chunkPath: string, sequence: number) => void | Promise<void>;
  /** Stops the split at the next chunk boundary */
  signal?: AbortSignal;
}

export interface ReassembleOptions {
  /** Copy buffer size in bytes, raised to MIN_REASSEMBLY_BUFFER when smaller */
  bufferSize?: number;
}

/**
 * Default configuration values
 */
export const DEFAULT_CHUNKER_CONFIG = {
  chunkSizeBytes: 50 * 1024 * 1024,      // 50MB
  reassemblyBufferBytes: 8 * 1024 * 1024, // 8MB
} as const;

export const MIN_REASSEMBLY_BUFFER = 1024 * 1024;

export interface ChunkEntry {
  fileName: string;
  sequence: number;
}

export interface ChunkSet {
  baseName: string;
  /** Sorted by sequence */
  chunks: ChunkEntry[];
}

export interface DirectoryComparison {
  matches: number;
  mismatches: string[];
  missingInOriginal: string[];
  missingInRestored: string[];
  ok: boolean;
}
