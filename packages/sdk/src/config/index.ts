export {
  ENV_KEYS,
  loadEnvConfig,
  toBackupConfig,
  toRestoreConfig,
  type EnvConfig,
  type LoadEnvConfigOptions,
} from './env.js';
