/**
 * SHA-256 comparison of an original tree against a restored one.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as crypto from 'node:crypto';
import type { DirectoryComparison } from './types.js';

export async function sha256File(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    const stream = fs.createReadStream(filePath);
    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('end', () => resolve(hash.digest('hex')));
    stream.on('error', reject);
  });
}

/** Regular files under `root`, as POSIX relative paths */
async function listFiles(root: string, prefix = ''): Promise<string[]> {
  const entries = await fs.promises.readdir(path.join(root, prefix), { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...(await listFiles(root, relative)));
    } else if (entry.isFile()) {
      files.push(relative);
    }
  }
  return files;
}

export async function compareDirectories(originalDir: string, restoredDir: string): Promise<DirectoryComparison> {
  const original = new Set(await listFiles(originalDir));
  const restored = new Set(await listFiles(restoredDir));

  const result: DirectoryComparison = {
    matches: 0,
    mismatches: [],
    missingInOriginal: [],
    missingInRestored: [],
    ok: false,
  };

  for (const relative of [...original].sort()) {
    if (!restored.has(relative)) {
      result.missingInRestored.push(relative);
      continue;
    }
    const [a, b] = await Promise.all([
      sha256File(path.join(originalDir, relative)),
      sha256File(path.join(restoredDir, relative)),
    ]);
    if (a === b) {
      result.matches++;
    } else {
      result.mismatches.push(relative);
    }
  }

  for (const relative of [...restored].sort()) {
    if (!original.has(relative)) result.missingInOriginal.push(relative);
  }

  result.ok =
    result.mismatches.length === 0 &&
    result.missingInOriginal.length === 0 &&
    result.missingInRestored.length === 0;
  return result;
}
