/**
 * Remote Folder Path Mapping
 *
 * Backup derives the remote folder path from a local source path; restore
 * reconstructs the local path from the remote folder path. Both directions
 * live here so they stay inverse to each other.
 *
 * Resolution order (both directions):
 * 1. Explicit mapping table ({ localRoot, remoteRoot })
 * 2. Anchor segment (default "Downloads", matched case-insensitively)
 * 3. Fallback: leaf name on backup, home-relative on restore
 */

import * as path from 'node:path';
import * as os from 'node:os';
import { InvalidRemotePathError } from '../errors/index.js';

export const DEFAULT_ANCHOR = 'Downloads';

export interface PathMappingEntry {
  /** Absolute local directory */
  localRoot: string;
  /** Forward-slash separated remote folder path */
  remoteRoot: string;
}

export interface PathMappingOptions {
  anchor?: string;
  /** Local directory the anchor segment stands for (default: <homeDir>/<anchor>) */
  anchorDir?: string;
  homeDir?: string;
  mappings?: PathMappingEntry[];
}

function splitLocal(p: string): string[] {
  return p.split(/[\\/]+/).filter((segment) => segment.length > 0);
}

/**
 * Split and validate a remote folder path. Backslashes are accepted as
 * separators.
 */
export function splitRemotePath(remoteFolderPath: string): string[] {
  const parts = remoteFolderPath.replace(/\\/g, '/').split('/').filter((s) => s.length > 0);
  if (parts.length === 0) {
    throw new InvalidRemotePathError(remoteFolderPath, 'path is empty');
  }
  for (const part of parts) {
    if (part === '.' || part === '..') {
      throw new InvalidRemotePathError(remoteFolderPath, `segment "${part}" is not allowed`);
    }
  }
  return parts;
}

function isInside(parent: string, child: string): string | null {
  const rel = path.relative(path.resolve(parent), path.resolve(child));
  if (rel === '') return '';
  if (rel.startsWith('..') || path.isAbsolute(rel)) return null;
  return rel;
}

export function deriveRemoteFolderParts(sourcePath: string, options: PathMappingOptions = {}): string[] {
  for (const mapping of options.mappings ?? []) {
    const rel = isInside(mapping.localRoot, sourcePath);
    if (rel !== null) {
      return [...splitRemotePath(mapping.remoteRoot), ...splitLocal(rel)];
    }
  }

  const anchor = (options.anchor ?? DEFAULT_ANCHOR).toLowerCase();
  const parts = splitLocal(path.resolve(sourcePath));
  const anchorIndex = parts.findIndex((p) => p.toLowerCase() === anchor);
  if (anchorIndex >= 0) {
    return parts.slice(anchorIndex);
  }

  return [path.basename(path.resolve(sourcePath))];
}

export function deriveRemoteFolderPath(sourcePath: string, options: PathMappingOptions = {}): string {
  return deriveRemoteFolderParts(sourcePath, options).join('/');
}

export function reconstructLocalPath(remoteFolderPath: string, options: PathMappingOptions = {}): string {
  const parts = splitRemotePath(remoteFolderPath);
  const homeDir = options.homeDir ?? os.homedir();

  for (const mapping of options.mappings ?? []) {
    const rootParts = splitRemotePath(mapping.remoteRoot);
    const matches = rootParts.length <= parts.length && rootParts.every((p, i) => parts[i] === p);
    if (matches) {
      return path.join(mapping.localRoot, ...parts.slice(rootParts.length));
    }
  }

  const anchor = options.anchor ?? DEFAULT_ANCHOR;
  const [first, ...rest] = parts;
  if (first !== undefined && first.toLowerCase() === anchor.toLowerCase()) {
    const anchorDir = options.anchorDir ?? path.join(homeDir, first);
    return path.join(anchorDir, ...rest);
  }

  return path.join(homeDir, ...parts);
}
