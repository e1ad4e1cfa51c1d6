/**
 * Environment configuration for the CLI.
 *
 * Values come from the process environment, falling back to an optional
 * `.env` file in the working directory.
 */

import { existsSync, readFileSync } from 'node:fs';
import * as path from 'node:path';
import { parse as parseDotenv } from 'dotenv';
import type { BackupConfig, BackupHooks } from '../backup/config.js';
import type { RestoreConfig } from '../restore/config.js';

export const ENV_KEYS = {
  repoUrl: 'CHUNKSTASH_REPO_URL',
  branch: 'CHUNKSTASH_BRANCH',
  chunkSizeMb: 'CHUNKSTASH_CHUNK_SIZE_MB',
  batchSize: 'CHUNKSTASH_BATCH_SIZE',
  pushIntervalSeconds: 'CHUNKSTASH_PUSH_INTERVAL_SECONDS',
  splitConcurrency: 'CHUNKSTASH_SPLIT_CONCURRENCY',
  anchor: 'CHUNKSTASH_ANCHOR',
  tempDir: 'CHUNKSTASH_TEMP_DIR',
} as const;

export interface EnvConfig {
  repoUrl: string;
  branch?: string;
  chunkSizeBytes?: number;
  batchSize?: number;
  pushIntervalMs?: number;
  splitConcurrency?: number;
  anchor?: string;
  tempDir?: string;
}

export interface LoadEnvConfigOptions {
  /** Defaults to `.env` in the current directory; skipped when absent */
  envFile?: string;
  /** Defaults to process.env */
  env?: Record<string, string | undefined>;
}

function positiveInteger(key: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw) || Number(raw) < 1) {
    throw new Error(`${key} must be a positive integer, got "${raw}"`);
  }
  return Number(raw);
}

export function loadEnvConfig(options: LoadEnvConfigOptions = {}): EnvConfig {
  const envFile = path.resolve(options.envFile ?? '.env');
  let fileValues: Record<string, string> = {};
  if (existsSync(envFile)) {
    fileValues = parseDotenv(readFileSync(envFile));
    console.log(`[Chunkstash:Config] Loaded from ${envFile}`);
  }

  const env = options.env ?? process.env;
  const read = (key: string): string | undefined => {
    const value = (env[key] ?? fileValues[key])?.trim();
    return value ? value : undefined;
  };

  const repoUrl = read(ENV_KEYS.repoUrl);
  if (!repoUrl) {
    throw new Error(`${ENV_KEYS.repoUrl} is not set (environment or .env file)`);
  }

  const chunkSizeMb = positiveInteger(ENV_KEYS.chunkSizeMb, read(ENV_KEYS.chunkSizeMb));
  const pushIntervalSeconds = positiveInteger(ENV_KEYS.pushIntervalSeconds, read(ENV_KEYS.pushIntervalSeconds));

  return {
    repoUrl,
    branch: read(ENV_KEYS.branch),
    chunkSizeBytes: chunkSizeMb === undefined ? undefined : chunkSizeMb * 1024 * 1024,
    batchSize: positiveInteger(ENV_KEYS.batchSize, read(ENV_KEYS.batchSize)),
    pushIntervalMs: pushIntervalSeconds === undefined ? undefined : pushIntervalSeconds * 1000,
    splitConcurrency: positiveInteger(ENV_KEYS.splitConcurrency, read(ENV_KEYS.splitConcurrency)),
    anchor: read(ENV_KEYS.anchor),
    tempDir: read(ENV_KEYS.tempDir),
  };
}

export function toBackupConfig(env: EnvConfig, hooks?: BackupHooks): BackupConfig {
  return {
    repoUrl: env.repoUrl,
    branch: env.branch,
    chunkSizeBytes: env.chunkSizeBytes,
    splitConcurrency: env.splitConcurrency,
    push: { batchSize: env.batchSize, intervalMs: env.pushIntervalMs },
    pathMapping: { anchor: env.anchor },
    tempDir: env.tempDir,
    hooks,
  };
}

export function toRestoreConfig(env: EnvConfig): RestoreConfig {
  return {
    repoUrl: env.repoUrl,
    pathMapping: { anchor: env.anchor },
    tempDir: env.tempDir,
  };
}
