/**
 * Atomic file replacement
 *
 * Contents go to a temp file in the destination directory and are renamed
 * over the target, so readers see either the old file or the new one.
 */

import { randomBytes } from 'node:crypto';
import { promises as fs } from 'node:fs';
import { dirname, join } from 'node:path';

export interface AtomicWriteOptions {
  /** Temp file name prefix; the temp file is `{prefix}{random}.tmp` */
  tempPrefix?: string;
}

export async function writeFileAtomic(
  targetPath: string,
  contents: string,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const directory = dirname(targetPath);
  await fs.mkdir(directory, { recursive: true });

  const tempPath = join(
    directory,
    `${options.tempPrefix ?? '.tmp_'}${randomBytes(6).toString('hex')}.tmp`
  );
  try {
    await fs.writeFile(tempPath, contents, 'utf8');
    await fs.rename(tempPath, targetPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
