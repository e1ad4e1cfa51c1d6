/**
 * Chunkstash Error Codes
 */
export const ErrorCodes = {
  DEP_MISSING: 'DEP_MISSING',
  AUTH_FAILED: 'AUTH_FAILED',
  SOURCE_NOT_FOUND: 'SOURCE_NOT_FOUND',
  CHUNK_IO_FAILED: 'CHUNK_IO_FAILED',
  SPLIT_FAILED: 'SPLIT_FAILED',
  COMMAND_FAILED: 'COMMAND_FAILED',
  PUSH_FAILED: 'PUSH_FAILED',
  DRAIN_TIMEOUT: 'DRAIN_TIMEOUT',
  REMOTE_FOLDER_NOT_FOUND: 'REMOTE_FOLDER_NOT_FOUND',
  INVALID_REMOTE_PATH: 'INVALID_REMOTE_PATH',
  CHUNK_SET_INVALID: 'CHUNK_SET_INVALID',
  CHUNK_SET_AMBIGUOUS: 'CHUNK_SET_AMBIGUOUS',
  ARCHIVE_INVALID: 'ARCHIVE_INVALID',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

export type ErrorKind = 'environment' | 'io' | 'version-control' | 'data';

const ERROR_KINDS: Record<ErrorCode, ErrorKind> = {
  DEP_MISSING: 'environment',
  AUTH_FAILED: 'environment',
  SOURCE_NOT_FOUND: 'io',
  CHUNK_IO_FAILED: 'io',
  SPLIT_FAILED: 'io',
  COMMAND_FAILED: 'version-control',
  PUSH_FAILED: 'version-control',
  DRAIN_TIMEOUT: 'version-control',
  REMOTE_FOLDER_NOT_FOUND: 'data',
  INVALID_REMOTE_PATH: 'data',
  CHUNK_SET_INVALID: 'data',
  CHUNK_SET_AMBIGUOUS: 'data',
  ARCHIVE_INVALID: 'data',
};

export function errorKindOf(code: ErrorCode): ErrorKind {
  return ERROR_KINDS[code];
}

/**
 * Base class for chunkstash errors
 */
export class ChunkstashError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = 'ChunkstashError';
  }

  get kind(): ErrorKind {
    return errorKindOf(this.code);
  }

  toErrorMessage() {
    return {
      code: this.code,
      kind: this.kind,
      message: this.message,
      hint: this.hint,
    };
  }
}

/**
 * Error: Required command-line tool is missing
 */
export class DependencyMissingError extends ChunkstashError {
  constructor(
    public readonly dependency: string,
    hint?: string,
  ) {
    super(
      ErrorCodes.DEP_MISSING,
      `Missing required dependency: ${dependency}`,
      hint ?? `Please install ${dependency} and try again`,
    );
    this.name = 'DependencyMissingError';
  }
}

/**
 * Error: Remote host CLI is not authenticated
 */
export class AuthFailedError extends ChunkstashError {
  constructor(reason: string = 'Not authenticated with the remote host', hint?: string) {
    super(ErrorCodes.AUTH_FAILED, reason, hint ?? 'Run: gh auth login');
    this.name = 'AuthFailedError';
  }
}

export class SourceNotFoundError extends ChunkstashError {
  constructor(public readonly sourcePath: string) {
    super(
      ErrorCodes.SOURCE_NOT_FOUND,
      `Source path does not exist: ${sourcePath}`,
      'Verify the source path is correct',
    );
    this.name = 'SourceNotFoundError';
  }
}

/**
 * Error: A chunk or its source could not be read or written
 */
export class ChunkIoError extends ChunkstashError {
  constructor(
    public readonly filePath: string,
    reason: string,
  ) {
    super(ErrorCodes.CHUNK_IO_FAILED, `I/O failure on ${filePath}: ${reason}`);
    this.name = 'ChunkIoError';
  }
}

export class SplitFailedError extends ChunkstashError {
  constructor(
    public readonly filePath: string,
    reason: string,
  ) {
    super(ErrorCodes.SPLIT_FAILED, `Failed to split ${filePath}: ${reason}`);
    this.name = 'SplitFailedError';
  }
}

/**
 * Error: An out-of-process command exited with a non-zero status
 */
export class CommandFailedError extends ChunkstashError {
  constructor(
    public readonly command: string,
    public readonly args: readonly string[],
    public readonly exitCode: number | null,
    public readonly stderr: string,
  ) {
    super(
      ErrorCodes.COMMAND_FAILED,
      `${command} ${args[0] ?? ''} failed (exit ${exitCode ?? 'signal'}): ${stderr.trim()}`.trim(),
    );
    this.name = 'CommandFailedError';
  }
}

/**
 * Error: Both the normal and the forcing push were rejected
 */
export class PushFailedError extends ChunkstashError {
  constructor(
    reason: string,
    public readonly lastError?: unknown,
  ) {
    super(
      ErrorCodes.PUSH_FAILED,
      `Git push failed: ${reason}`,
      'Check network access and push permissions for the repository',
    );
    this.name = 'PushFailedError';
  }
}

export class DrainTimeoutError extends ChunkstashError {
  constructor(
    public readonly timeoutMs: number,
    public readonly pendingItems: number,
  ) {
    super(
      ErrorCodes.DRAIN_TIMEOUT,
      `Upload did not finish within ${timeoutMs}ms (${pendingItems} item(s) pending)`,
    );
    this.name = 'DrainTimeoutError';
  }
}

export class RemoteFolderNotFoundError extends ChunkstashError {
  constructor(public readonly remoteFolderPath: string) {
    super(
      ErrorCodes.REMOTE_FOLDER_NOT_FOUND,
      `Folder not found in repository: ${remoteFolderPath}`,
    );
    this.name = 'RemoteFolderNotFoundError';
  }
}

export class InvalidRemotePathError extends ChunkstashError {
  constructor(public readonly remoteFolderPath: string, reason: string) {
    super(
      ErrorCodes.INVALID_REMOTE_PATH,
      `Invalid remote folder path "${remoteFolderPath}": ${reason}`,
      'Use a forward-slash separated path such as Downloads/Games/Archive',
    );
    this.name = 'InvalidRemotePathError';
  }
}

/**
 * Error: Chunk files on restore are missing, empty or out of sequence
 */
export class ChunkSetError extends ChunkstashError {
  constructor(reason: string) {
    super(ErrorCodes.CHUNK_SET_INVALID, reason);
    this.name = 'ChunkSetError';
  }
}

export class AmbiguousChunkSetError extends ChunkstashError {
  constructor(public readonly baseNames: readonly string[]) {
    super(
      ErrorCodes.CHUNK_SET_AMBIGUOUS,
      `Folder contains ${baseNames.length} chunk sets: ${baseNames.join(', ')}`,
      'Pass --file <name> to choose one',
    );
    this.name = 'AmbiguousChunkSetError';
  }
}

export class ArchiveInvalidError extends ChunkstashError {
  constructor(public readonly archivePath: string, reason: string) {
    super(ErrorCodes.ARCHIVE_INVALID, `Invalid or corrupted archive ${archivePath}: ${reason}`);
    this.name = 'ArchiveInvalidError';
  }
}
