/**
 * Backup Types
 */

export interface ScannedFile {
  absolutePath: string;
  /** POSIX-style, relative to the scanned root */
  relativePath: string;
  name: string;
  size: number;
}

export interface SplitFailure {
  relativePath: string;
  error: Error;
}

export interface BackupReport {
  runId: string;
  source: string;
  remoteFolderPath: string;
  totalItems: number;
  filesSplit: number;
  itemsUploaded: number;
  pushes: number;
  skippedFiles: string[];
  failedSplits: SplitFailure[];
}

/**
 * Decides whether a scanned file already exists on the remote.
 */
export interface SkipPredicate {
  shouldSkip(file: ScannedFile): boolean;
}

export type SkipPredicateFactory = (
  existingNames: ReadonlySet<string>,
  chunkThresholdBytes: number,
) => SkipPredicate;

export interface BackupOptions {
  /** Folder names excluded anywhere in the tree; added to the configured list */
  skipFolders?: string[];
  keepWorkingTree?: boolean;
  /** Back a folder up as a single ZIP archive, extracted again on restore */
  archive?: boolean;
  skipPredicate?: SkipPredicateFactory;
}
