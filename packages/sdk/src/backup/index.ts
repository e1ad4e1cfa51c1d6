export { BackupOrchestrator, type BackupOrchestratorOptions } from './orchestrator.js';
export {
  DEFAULT_BACKUP,
  defaultTempDir,
  resolveBackupConfig,
  type BackupConfig,
  type BackupHooks,
  type ResolvedBackupConfig,
} from './config.js';
export { scanSource, type ScanOptions } from './scanner.js';
export { NameOnlySkipPredicate, createNameOnlySkipPredicate } from './skip-predicate.js';
export type {
  BackupOptions,
  BackupReport,
  ScannedFile,
  SkipPredicate,
  SkipPredicateFactory,
  SplitFailure,
} from './types.js';
