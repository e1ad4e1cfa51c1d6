/**
 * @chunkstash/core
 *
 * Data model, collaborator contracts, transfer queue and error definitions
 * shared by the chunked backup pipeline.
 */

// Types
export * from './types/index.js';

// Utils
export {
  formatChunkName,
  parseChunkName,
  isChunkName,
  firstChunkName,
  type ParsedChunkName,
} from './utils/chunk-name.js';
export {
  DEFAULT_ANCHOR,
  deriveRemoteFolderParts,
  deriveRemoteFolderPath,
  reconstructLocalPath,
  splitRemotePath,
  type PathMappingEntry,
  type PathMappingOptions,
} from './utils/path-mapping.js';
export { generateRunId } from './utils/id.js';

// Pipeline state
export { TransferQueue, type TransferQueueOptions } from './queue/transfer-queue.js';
export { UploadStatistics } from './stats/upload-statistics.js';

// State Machine - Batch Pusher
export {
  PusherStateMachine,
  isTerminalPusherState,
  isValidPusherTransition,
  type PusherState,
  type PusherEvent,
  type PusherTransitionResult,
} from './state-machine/index.js';

// Errors
export * from './errors/index.js';
