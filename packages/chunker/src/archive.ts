/**
 * ZIP archive collaborator.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { pipeline } from 'node:stream/promises';
import archiver from 'archiver';
import * as yauzl from 'yauzl-promise';
import { ArchiveInvalidError, type ArchiveService } from '@chunkstash/core';

export class ZipArchiveService implements ArchiveService {
  /**
   * Zip `sourceFolder` into `outputPath`, entries stored under the folder's
   * own name so extraction recreates it.
   */
  async createArchive(sourceFolder: string, outputPath: string): Promise<void> {
    await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });

    const output = fs.createWriteStream(outputPath);
    const archive = archiver('zip', { zlib: { level: 6 } });

    const written = new Promise<void>((resolve, reject) => {
      output.on('close', resolve);
      output.on('error', reject);
      archive.on('error', reject);
    });

    archive.pipe(output);
    archive.glob('**/*', {
      cwd: sourceFolder,
      dot: true,
      follow: true,
    }, { prefix: path.basename(sourceFolder) });
    await archive.finalize();
    await written;
  }

  /**
   * Extract into `destDir` and resolve with the single top-level folder the
   * archive holds, or `destDir` itself when it holds several entries.
   */
  async extractArchive(archivePath: string, destDir: string): Promise<string> {
    const targetDir = path.resolve(destDir);
    await fs.promises.mkdir(targetDir, { recursive: true });

    const zip = await yauzl.open(archivePath).catch((error: unknown) => {
      throw new ArchiveInvalidError(archivePath, error instanceof Error ? error.message : String(error));
    });

    const topLevel = new Set<string>();
    try {
      for await (const entry of zip) {
        const entryPath = path.resolve(targetDir, entry.filename);

        if (!entryPath.startsWith(targetDir + path.sep)) {
          throw new ArchiveInvalidError(archivePath, `entry escapes the target directory: ${entry.filename}`);
        }

        const [head] = entry.filename.split('/');
        if (head) topLevel.add(head);

        if (entry.filename.endsWith('/')) {
          await fs.promises.mkdir(entryPath, { recursive: true });
        } else {
          await fs.promises.mkdir(path.dirname(entryPath), { recursive: true });
          const readStream = await entry.openReadStream();
          await pipeline(readStream, fs.createWriteStream(entryPath));
        }
      }
    } finally {
      await zip.close();
    }

    const [only, ...rest] = topLevel;
    if (only !== undefined && rest.length === 0) {
      const candidate = path.join(targetDir, only);
      const stat = await fs.promises.stat(candidate);
      if (stat.isDirectory()) return candidate;
    }
    return targetDir;
  }

  isArchive(filePath: string): boolean {
    return path.extname(filePath).toLowerCase() === '.zip';
  }
}
