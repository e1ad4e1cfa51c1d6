/**
 * Restore destination naming.
 */

import { mkdir } from 'node:fs/promises';
import * as path from 'node:path';
import { pathExists } from '../utils/index.js';

export interface DestinationOptions {
  suffix?: string;
  /** Plain files keep their extension last: `movie_restored_1.mkv` */
  isFile?: boolean;
}

function splitExtension(name: string): [string, string] {
  const ext = path.extname(name);
  if (!ext || ext === name) return [name, ''];
  return [name.slice(0, -ext.length), ext];
}

/**
 * First free path under `parentDir` for `name` plus the optional suffix,
 * appending `_1`, `_2`, ... when taken. Creates `parentDir` if missing.
 *
 * @example
 * // with "Games" and "Games_restored" already present
 * await resolveRestoreDestination('/home/u/Downloads', 'Games', { suffix: '_restored' })
 * // => "/home/u/Downloads/Games_restored_1"
 */
export async function resolveRestoreDestination(
  parentDir: string,
  name: string,
  options: DestinationOptions = {},
): Promise<string> {
  await mkdir(parentDir, { recursive: true });

  const suffix = options.suffix ?? '';
  const [stem, ext] = options.isFile ? splitExtension(name) : [name, ''];

  let candidate = path.join(parentDir, `${stem}${suffix}${ext}`);
  for (let counter = 1; await pathExists(candidate); counter++) {
    candidate = path.join(parentDir, `${stem}${suffix}_${counter}${ext}`);
  }
  return candidate;
}
