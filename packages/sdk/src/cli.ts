/**
 * Command-line front end: argument parsing and command dispatch.
 */

import { ChunkstashError, type RemoteHost } from '@chunkstash/core';
import { compareDirectories } from '@chunkstash/chunker';
import { GitHubCli } from '@chunkstash/remote-git';
import { BackupOrchestrator } from './backup/index.js';
import { RestoreOrchestrator } from './restore/index.js';
import { loadEnvConfig, toBackupConfig, toRestoreConfig } from './config/index.js';
import { VERSION } from './version.js';

export type ParsedCommand =
  | { command: 'help' }
  | { command: 'version' }
  | {
      command: 'backup';
      source: string;
      skipFolders: string[];
      keepWorkingTree: boolean;
      archive: boolean;
      envFile?: string;
    }
  | {
      command: 'restore';
      remoteFolderPath: string;
      suffix?: string;
      fileName?: string;
      keepTemp: boolean;
      envFile?: string;
    }
  | { command: 'verify'; originalDir: string; restoredDir: string };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function takeValue(args: string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

export function parseArgs(args: string[]): ParsedCommand {
  const [command, ...rest] = args;

  switch (command) {
    case undefined:
    case 'help':
    case '--help':
    case '-h':
      return { command: 'help' };
    case '--version':
    case '-v':
      return { command: 'version' };
    case 'backup':
      return parseBackup(rest);
    case 'restore':
      return parseRestore(rest);
    case 'verify': {
      const [originalDir, restoredDir, extra] = rest;
      if (originalDir === undefined || restoredDir === undefined || extra !== undefined) {
        throw new UsageError('verify takes exactly two directories');
      }
      return { command: 'verify', originalDir, restoredDir };
    }
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

function parseBackup(args: string[]): ParsedCommand {
  const positional: string[] = [];
  const skipFolders: string[] = [];
  let keepWorkingTree = false;
  let archive = false;
  let envFile: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    switch (arg) {
      case '--skip-folders':
        // Takes every following argument up to the next flag
        while (args[i + 1] !== undefined && !args[i + 1]?.startsWith('-')) {
          skipFolders.push(args[++i] ?? '');
        }
        if (skipFolders.length === 0) {
          throw new UsageError('--skip-folders requires at least one folder name');
        }
        break;
      case '--keep-working-tree':
        keepWorkingTree = true;
        break;
      case '--archive':
        archive = true;
        break;
      case '--env-file':
        envFile = takeValue(args, i, arg);
        i++;
        break;
      default:
        if (arg.startsWith('-')) throw new UsageError(`Unknown option for backup: ${arg}`);
        positional.push(arg);
    }
  }

  const [source, extra] = positional;
  if (source === undefined || extra !== undefined) {
    throw new UsageError('backup takes exactly one source path');
  }
  return { command: 'backup', source, skipFolders, keepWorkingTree, archive, envFile };
}

function parseRestore(args: string[]): ParsedCommand {
  const positional: string[] = [];
  let suffix: string | undefined;
  let fileName: string | undefined;
  let keepTemp = false;
  let envFile: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    switch (arg) {
      case '--suffix':
      case '-s':
        suffix = takeValue(args, i, arg);
        i++;
        break;
      case '--file':
        fileName = takeValue(args, i, arg);
        i++;
        break;
      case '--keep-temp':
        keepTemp = true;
        break;
      case '--env-file':
        envFile = takeValue(args, i, arg);
        i++;
        break;
      default:
        if (arg.startsWith('-')) throw new UsageError(`Unknown option for restore: ${arg}`);
        positional.push(arg);
    }
  }

  const [remoteFolderPath, extra] = positional;
  if (remoteFolderPath === undefined || extra !== undefined) {
    throw new UsageError('restore takes exactly one remote folder path');
  }
  return {
    command: 'restore',
    remoteFolderPath: remoteFolderPath.replace(/\\/g, '/'),
    suffix,
    fileName,
    keepTemp,
    envFile,
  };
}

export interface RunCliOptions {
  /** Defaults to the GitHub CLI */
  remote?: RemoteHost;
  env?: Record<string, string | undefined>;
}

/**
 * Execute a parsed command and resolve with the process exit status.
 */
export async function runCli(parsed: ParsedCommand, options: RunCliOptions = {}): Promise<number> {
  const remote = options.remote ?? new GitHubCli();

  switch (parsed.command) {
    case 'help':
      printHelp();
      return 0;

    case 'version':
      console.log(VERSION);
      return 0;

    case 'backup': {
      const env = loadEnvConfig({ envFile: parsed.envFile, env: options.env });
      const orchestrator = new BackupOrchestrator({
        config: toBackupConfig(env, {
          onPush: (event) =>
            console.log(`[Chunkstash:CLI] ${event.kind} push: ${event.pushed} file(s), ${event.uploaded} uploaded`),
        }),
        remote,
      });
      const report = await orchestrator.backup(parsed.source, {
        skipFolders: parsed.skipFolders,
        keepWorkingTree: parsed.keepWorkingTree,
        archive: parsed.archive,
      });
      console.log(`[Chunkstash:CLI] Backup of ${report.source} to ${report.remoteFolderPath} complete`);
      if (report.failedSplits.length > 0) {
        console.warn(`[Chunkstash:CLI] ${report.failedSplits.length} file(s) could not be split and were not uploaded`);
      }
      return 0;
    }

    case 'restore': {
      const env = loadEnvConfig({ envFile: parsed.envFile, env: options.env });
      const orchestrator = new RestoreOrchestrator({
        config: { ...toRestoreConfig(env), keepTemp: parsed.keepTemp },
        remote,
      });
      const report = await orchestrator.restore(parsed.remoteFolderPath, {
        suffix: parsed.suffix,
        fileName: parsed.fileName,
      });
      console.log(`[Chunkstash:CLI] Restored ${report.restoredBytes} byte(s) to ${report.destination}`);
      return 0;
    }

    case 'verify': {
      const comparison = await compareDirectories(parsed.originalDir, parsed.restoredDir);
      console.log(`[Chunkstash:Verify] ${comparison.matches} file(s) match`);
      for (const file of comparison.mismatches) console.warn(`[Chunkstash:Verify] Content differs: ${file}`);
      for (const file of comparison.missingInRestored) console.warn(`[Chunkstash:Verify] Missing in restored: ${file}`);
      for (const file of comparison.missingInOriginal) console.warn(`[Chunkstash:Verify] Only in restored: ${file}`);
      return comparison.ok ? 0 : 1;
    }
  }
}

/**
 * Print a fatal error the way the CLI reports it: message, then hint.
 */
export function reportFatal(error: unknown): void {
  if (error instanceof ChunkstashError) {
    console.error(`Error: ${error.message}`);
    if (error.hint) console.error(`Hint: ${error.hint}`);
  } else if (error instanceof UsageError) {
    console.error(`Error: ${error.message}`);
    console.error('Run "chunkstash --help" for usage');
  } else {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export function printHelp(): void {
  console.log(`chunkstash ${VERSION} - Chunked backup of large files to a git repository

Usage:
  chunkstash backup <source> [options]
  chunkstash restore <remoteFolderPath> [options]
  chunkstash verify <originalDir> <restoredDir>

Backup Options:
  --skip-folders NAME...     Folder names to leave out, anywhere in the tree
  --keep-working-tree        Keep the local working tree after the run
  --archive                  Upload a folder as one ZIP archive
  --env-file PATH            Configuration file (default: ./.env)

Restore Options:
  --suffix, -s TEXT          Append TEXT to the restored name
  --file NAME                Chunk set to restore when the folder holds several
  --keep-temp                Keep the clone and reassembled file
  --env-file PATH            Configuration file (default: ./.env)

Other:
  --help, -h                 Show this help message
  --version, -v              Print the version

Environment:
  CHUNKSTASH_REPO_URL               Repository to back up to (required)
  CHUNKSTASH_BRANCH                 Branch (default: main)
  CHUNKSTASH_CHUNK_SIZE_MB          Chunk size and split threshold (default: 50)
  CHUNKSTASH_BATCH_SIZE             Files per push (default: 20)
  CHUNKSTASH_PUSH_INTERVAL_SECONDS  Push at least this often (default: 30)
  CHUNKSTASH_SPLIT_CONCURRENCY      Files split in parallel (default: 4)
  CHUNKSTASH_ANCHOR                 Folder name anchoring remote paths (default: Downloads)
  CHUNKSTASH_TEMP_DIR               Scratch space for chunks and clones

Examples:
  chunkstash backup ~/Downloads/Games --skip-folders node_modules .cache
  chunkstash restore Downloads/Games/Archive --suffix _restored
  chunkstash verify ~/Downloads/Games ~/Downloads/Games_restored
`);
}
