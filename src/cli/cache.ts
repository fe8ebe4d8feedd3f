import { resolve } from 'path';
import chalk from 'chalk';
import { CommitCache } from '../lib/commit-cache.js';
import { loadConfig } from '../lib/config.js';

/**
 * Remove every cached commit summary. Needed after editing the per-commit
 * prompt template, since entries do not record which template made them.
 */
export async function clearCache(projectPath: string): Promise<number> {
  const config = loadConfig(projectPath);
  const cache = new CommitCache(resolve(projectPath, config.cache.dir));
  const removed = await cache.clear();
  console.log(
    chalk.green('✓'),
    `Removed ${removed} entr${removed === 1 ? 'y' : 'ies'} from`,
    chalk.cyan(cache.dir)
  );
  return removed;
}
