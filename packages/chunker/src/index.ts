/**
 * @chunkstash/chunker
 *
 * Fixed-size file splitting and reassembly, chunk set validation, the ZIP
 * archive collaborator and SHA-256 tree comparison.
 */

export { splitFile, reassembleChunks } from './chunker.js';
export { groupChunkSets, selectChunkSet, validateChunkSet } from './chunk-set.js';
export { ZipArchiveService } from './archive.js';
export { sha256File, compareDirectories } from './checksum.js';

export type {
  SplitOptions,
  ReassembleOptions,
  ChunkEntry,
  ChunkSet,
  DirectoryComparison,
} from './types.js';

export { DEFAULT_CHUNKER_CONFIG, MIN_REASSEMBLY_BUFFER } from './types.js';
