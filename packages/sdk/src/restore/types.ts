/**
 * Restore Types
 */

export interface RestoreOptions {
  /** Appended to the restored name, before the extension for plain files */
  suffix?: string;
  /** Reassembled file name to pick when the folder holds several chunk sets */
  fileName?: string;
}

export interface RestoreReport {
  remoteFolderPath: string;
  destination: string;
  chunkCount: number;
  restoredBytes: number;
  /** True when the reassembled file was an archive and got extracted */
  extracted: boolean;
}
