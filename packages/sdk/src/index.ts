/**
 * @chunkstash/sdk
 *
 * Backup and restore orchestration over the chunker and the git remote
 */

// Backup
export {
  BackupOrchestrator,
  DEFAULT_BACKUP,
  NameOnlySkipPredicate,
  createNameOnlySkipPredicate,
  defaultTempDir,
  resolveBackupConfig,
  scanSource,
  type BackupOrchestratorOptions,
  type BackupConfig,
  type BackupHooks,
  type BackupOptions,
  type BackupReport,
  type ResolvedBackupConfig,
  type ScanOptions,
  type ScannedFile,
  type SkipPredicate,
  type SkipPredicateFactory,
  type SplitFailure,
} from './backup/index.js';

// Restore
export {
  RestoreOrchestrator,
  DEFAULT_RESTORE,
  resolveRestoreConfig,
  resolveRestoreDestination,
  type RestoreOrchestratorOptions,
  type RestoreConfig,
  type RestoreHooks,
  type ResolvedRestoreConfig,
  type RestoreOptions,
  type RestoreReport,
  type DestinationOptions,
} from './restore/index.js';

// Configuration
export {
  ENV_KEYS,
  loadEnvConfig,
  toBackupConfig,
  toRestoreConfig,
  type EnvConfig,
  type LoadEnvConfigOptions,
} from './config/index.js';

// Utilities
export { runPool, type PoolResult, type RunPoolOptions } from './utils/index.js';

export { VERSION } from './version.js';

// Re-export core types for convenience
export * from '@chunkstash/core';
