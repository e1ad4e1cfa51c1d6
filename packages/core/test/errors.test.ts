import { describe, it, expect } from 'vitest';
import {
  ChunkstashError,
  CommandFailedError,
  DependencyMissingError,
  AuthFailedError,
  PushFailedError,
  ChunkSetError,
  AmbiguousChunkSetError,
  ErrorCodes,
  errorKindOf,
} from '../src/errors/index.js';
import { UploadStatistics } from '../src/stats/upload-statistics.js';

describe('error hierarchy', () => {
  it('should classify pre-flight failures as environment errors', () => {
    const missing = new DependencyMissingError('gh');
    expect(missing).toBeInstanceOf(ChunkstashError);
    expect(missing.kind).toBe('environment');
    expect(missing.message).toBe('Missing required dependency: gh');
    expect(missing.hint).toBe('Please install gh and try again');
    expect(new AuthFailedError().kind).toBe('environment');
  });

  it('should carry exit code and stderr of failed commands', () => {
    const error = new CommandFailedError('git', ['push', 'origin'], 128, 'fatal: no upstream\n');
    expect(error.message).toBe('git push failed (exit 128): fatal: no upstream');
    expect(error.exitCode).toBe(128);
    expect(error.stderr).toBe('fatal: no upstream\n');
    expect(error.kind).toBe('version-control');
  });

  it('should describe a command killed by a signal', () => {
    const error = new CommandFailedError('gh', ['api'], null, '');
    expect(error.message).toBe('gh api failed (exit signal):');
  });

  it('should serialise to an error message', () => {
    expect(new PushFailedError('rejected').toErrorMessage()).toEqual({
      code: 'PUSH_FAILED',
      kind: 'version-control',
      message: 'Git push failed: rejected',
      hint: 'Check network access and push permissions for the repository',
    });
  });

  it('should classify restore problems as data errors', () => {
    expect(new ChunkSetError('gap').kind).toBe('data');
    expect(new AmbiguousChunkSetError(['a.zip', 'b.zip']).message).toBe('Folder contains 2 chunk sets: a.zip, b.zip');
  });

  it('should map every code to a kind', () => {
    for (const code of Object.values(ErrorCodes)) {
      expect(['environment', 'io', 'version-control', 'data']).toContain(errorKindOf(code));
    }
  });
});

describe('UploadStatistics', () => {
  it('should count a split file as its chunks', () => {
    const stats = new UploadStatistics();
    stats.setTotal(6);
    stats.recordSplit(2);
    expect(stats.snapshot().totalItems).toBe(7);
    expect(stats.snapshot().filesSplit).toBe(1);
  });

  it('should return running totals', () => {
    const stats = new UploadStatistics();
    expect(stats.recordUploaded()).toBe(1);
    expect(stats.recordUploaded()).toBe(2);
    expect(stats.recordPush()).toBe(1);
    stats.recordSkipped(3);
    expect(stats.snapshot()).toEqual({
      totalItems: 0,
      filesSplit: 0,
      itemsUploaded: 2,
      pushes: 1,
      skippedFiles: 3,
    });
  });
});
