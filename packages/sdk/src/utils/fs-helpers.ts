/**
 * Filesystem Helpers
 */

import { cp, rename, rm, stat } from 'node:fs/promises';

export async function pathExists(p: string): Promise<boolean> {
  return stat(p).then(() => true, () => false);
}

/**
 * Move a file or directory, copying across filesystems when a rename is
 * not possible.
 */
export async function movePath(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'EXDEV')) throw error;
    await cp(from, to, { recursive: true });
    await rm(from, { recursive: true, force: true });
  }
}

/**
 * Remove a run directory, logging instead of failing when it cannot be
 * removed.
 */
export async function removeRunDirectory(dir: string, component: string): Promise<void> {
  await rm(dir, { recursive: true, force: true }).catch((error: unknown) => {
    console.warn(
      `[Chunkstash:${component}] Could not remove ${dir}: ${error instanceof Error ? error.message : String(error)}`,
    );
  });
}
