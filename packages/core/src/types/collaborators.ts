/**
 * External Collaborator Interfaces
 *
 * The remote hosting service, version control and archive handling are
 * reached only through these contracts, so the pipeline can run against
 * in-process stand-ins.
 */

/**
 * Remote hosting service (GitHub via the gh CLI by default).
 */
export interface RemoteHost {
  /** Check that the host CLI is installed and on PATH */
  checkInstalled(): Promise<boolean>;

  /** Check that the host CLI holds valid credentials */
  checkAuthenticated(): Promise<boolean>;

  /**
   * File names directly inside a remote folder. A folder that does not
   * exist yet yields an empty set.
   */
  listExistingFiles(repoUrl: string, remoteFolderPath: string): Promise<Set<string>>;

  /** Clone the full repository into destPath */
  cloneRepo(repoUrl: string, destPath: string): Promise<void>;
}

/**
 * Runs one git command in a working directory and resolves with stdout.
 * Rejects when git exits non-zero.
 */
export type GitRunner = (cwd: string | null, args: string[]) => Promise<string>;

export interface ArchiveService {
  createArchive(sourceFolder: string, outputPath: string): Promise<void>;

  /** Extract and resolve with the top-level extracted folder */
  extractArchive(archivePath: string, destDir: string): Promise<string>;

  isArchive(filePath: string): boolean;
}

export interface GitIdentity {
  name: string;
  email: string;
}
