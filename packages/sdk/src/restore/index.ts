export { RestoreOrchestrator, type RestoreOrchestratorOptions } from './orchestrator.js';
export {
  DEFAULT_RESTORE,
  resolveRestoreConfig,
  type RestoreConfig,
  type RestoreHooks,
  type ResolvedRestoreConfig,
} from './config.js';
export { resolveRestoreDestination, type DestinationOptions } from './destination.js';
export type { RestoreOptions, RestoreReport } from './types.js';
