import { randomUUID } from 'crypto';
import { chmod, mkdir, rename, rm, stat, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { errnoCode } from './errors.js';

export const TEMP_SUFFIX = '.tmp';

/**
 * Temp file name used for `target`. It sits in the same directory so the
 * final rename never crosses a filesystem boundary.
 */
export function tempPathFor(target: string): string {
  return join(dirname(target), `.${basename(target)}.${process.pid}.${randomUUID()}${TEMP_SUFFIX}`);
}

async function existingMode(target: string): Promise<number | undefined> {
  try {
    return (await stat(target)).mode;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

/**
 * Write `content` to `target` through a temp file and a rename.
 *
 * Readers see either the old file or the complete new one. The temp file is
 * removed whenever the write does not complete, and the original is left as
 * it was. Missing parent directories are created.
 */
export async function writeFileAtomic(target: string, content: string): Promise<void> {
  await mkdir(dirname(target), { recursive: true });

  const mode = await existingMode(target);
  const tempPath = tempPathFor(target);

  try {
    await writeFile(tempPath, content, { encoding: 'utf-8', flag: 'wx' });
    if (mode !== undefined) {
      await chmod(tempPath, mode);
    }
    await rename(tempPath, target);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}
