/**
 * Durable per-commit summary cache.
 *
 * One UTF-8 file per commit id under the cache directory, holding the raw
 * summary. A real commit's id never changes, so an entry stays valid until
 * the cache is cleared; nothing records which prompt template produced it.
 * Read and write failures are logged and degrade to a miss.
 */

import { readFile, readdir, rm } from 'fs/promises';
import { join, resolve } from 'path';
import { writeFileAtomic, TEMP_SUFFIX } from './atomic-write.js';
import { CacheError, errnoCode } from './errors.js';
import { getLogger, type Logger } from './logger.js';
import { STAGED, WORKING_TREE } from './revision.js';

const ENTRY_EXTENSION = '.md';
const SYNTHETIC_IDS = new Set([WORKING_TREE, STAGED]);

export function isSyntheticCommitId(commitId: string): boolean {
  return SYNTHETIC_IDS.has(commitId);
}

/**
 * File name for a commit id. Anything outside [A-Za-z0-9._-] becomes `_`, so
 * an id can never name a path outside the cache directory.
 */
export function entryFileName(commitId: string): string {
  const safe = commitId.replace(/[^A-Za-z0-9._-]/g, '_').replace(/^\.+/, '_');
  return `${safe}${ENTRY_EXTENSION}`;
}

export class CommitCache {
  readonly dir: string;
  private readonly logger: Logger;

  constructor(dir: string, logger: Logger = getLogger()) {
    this.dir = resolve(dir);
    this.logger = logger.child({ component: 'cache' });
  }

  entryPath(commitId: string): string {
    return join(this.dir, entryFileName(commitId));
  }

  async get(commitId: string): Promise<string | undefined> {
    if (isSyntheticCommitId(commitId)) {
      return undefined;
    }

    try {
      const summary = await this.read(commitId);
      if (summary === undefined) {
        this.logger.cacheMiss(commitId);
      } else {
        this.logger.cacheHit(commitId);
      }
      return summary;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`${message}; regenerating`, { commit: commitId });
      return undefined;
    }
  }

  /**
   * Store a summary. Returns false (after logging) when the entry could not
   * be written; the caller still has the summary in hand.
   */
  async put(commitId: string, summary: string): Promise<boolean> {
    if (isSyntheticCommitId(commitId)) {
      return false;
    }

    const path = this.entryPath(commitId);
    try {
      await writeFileAtomic(path, summary);
      this.logger.debug(`Stored summary at ${path}`, { commit: commitId });
      return true;
    } catch (error) {
      const failure = new CacheError(path, 'could not be written', { cause: error });
      this.logger.warn(failure.message, { commit: commitId }, errnoCode(error));
      return false;
    }
  }

  /**
   * Remove every entry and any temp file left by an interrupted write.
   * Returns the number of summaries removed.
   */
  async clear(): Promise<number> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') return 0;
      throw new CacheError(this.dir, 'could not be listed', { cause: error });
    }

    let removed = 0;
    for (const name of names) {
      const isEntry = name.endsWith(ENTRY_EXTENSION) && !name.startsWith('.');
      const isTemp = name.startsWith('.') && name.endsWith(TEMP_SUFFIX);
      if (!isEntry && !isTemp) continue;
      await rm(join(this.dir, name), { force: true });
      if (isEntry) removed++;
    }
    this.logger.info(`Cleared ${removed} cached summar${removed === 1 ? 'y' : 'ies'}`);
    return removed;
  }

  private async read(commitId: string): Promise<string | undefined> {
    const path = this.entryPath(commitId);
    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return undefined;
      }
      throw new CacheError(path, `is unreadable (${errnoCode(error) ?? 'unknown error'})`, {
        cause: error,
      });
    }
  }
}
