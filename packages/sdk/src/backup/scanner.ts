/**
 * Source tree scanner
 */

import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { ScannedFile } from './types.js';

export interface ScanOptions {
  /** Directory names skipped at any depth */
  skipFolders?: readonly string[];
}

/**
 * Regular files under `root`, in sorted walk order. Symlinks and other
 * non-regular entries are ignored.
 */
export async function scanSource(root: string, options: ScanOptions = {}): Promise<ScannedFile[]> {
  const skip = new Set(options.skipFolders ?? []);
  const files: ScannedFile[] = [];

  const walk = async (dir: string, prefix: string): Promise<void> => {
    const entries = await readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const absolutePath = join(dir, entry.name);
      const relativePath = prefix ? `${prefix}/${entry.name}` : entry.name;

      if (entry.isDirectory()) {
        if (skip.has(entry.name)) continue;
        await walk(absolutePath, relativePath);
      } else if (entry.isFile()) {
        const { size } = await stat(absolutePath);
        files.push({ absolutePath, relativePath, name: entry.name, size });
      }
    }
  };

  await walk(root, '');
  return files;
}
