/**
 * Git access for the pipeline.
 *
 * `Repository` is the seam the resolver depends on; `GitRepository` backs it
 * with simple-git. Every git failure while resolving surfaces as a
 * `RevisionError` naming the revision that caused it.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import simpleGit, { type SimpleGit } from 'simple-git';
import { RevisionError, errnoCode } from './errors.js';
import { getLogger } from './logger.js';
import type { RevisionSpec } from './revision.js';

export interface CommitRef {
  id: string;
  diff: string;
}

export interface CommitMetadata {
  id: string;
  shortId: string;
  author: string;
  /** YYYY-MM-DD */
  date: string;
  message: string;
}

export interface Commit extends CommitMetadata {
  diff: string;
  /** Working tree or staged pseudo-commit; never cached */
  synthetic: boolean;
}

export interface Repository {
  /** Commit ids with diffs, oldest first. */
  resolveCommits(spec: RevisionSpec, pathFilters: string[]): Promise<CommitRef[]>;
  getMetadata(commitId: string): Promise<CommitMetadata>;
  currentBranch(): Promise<string>;
  latestTag(): Promise<string | undefined>;
}

const DIFF_FLAGS = ['--no-color', '--no-prefix', '--unified=3'];
const METADATA_FORMAT = '--format=%H%x00%h%x00%an%x00%aI%x00%B';
const SHA_PATTERN = /^[0-9a-f]{7,64}$/;

function pathArgs(pathFilters: string[]): string[] {
  return pathFilters.length > 0 ? ['--', ...pathFilters] : [];
}

/**
 * Render an untracked file as a new-file diff, matching `--no-prefix` output.
 */
export function newFileDiff(path: string, content: string): string {
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  const header = [
    `diff --git ${path} ${path}`,
    'new file mode 100644',
    '--- /dev/null',
    `+++ ${path}`,
  ];
  if (lines.length === 0) {
    return header.join('\n');
  }
  return [...header, `@@ -0,0 +1,${lines.length} @@`, ...lines.map((line) => `+${line}`)].join(
    '\n'
  );
}

export function parseMetadata(raw: string): CommitMetadata {
  const [id = '', shortId = '', author = '', isoDate = '', ...messageParts] = raw.split('\0');
  return {
    id: id.trim(),
    shortId: shortId.trim(),
    author: author.trim(),
    date: isoDate.trim().slice(0, 10),
    message: messageParts.join('\0').trim(),
  };
}

export class GitRepository implements Repository {
  private readonly git: SimpleGit;
  private readonly logger = getLogger().child({ component: 'git' });

  constructor(private readonly baseDir: string = process.cwd()) {
    this.git = simpleGit({ baseDir });
  }

  async resolveCommits(spec: RevisionSpec, pathFilters: string[]): Promise<CommitRef[]> {
    const isRepo = await this.git.checkIsRepo();
    if (!isRepo) {
      throw new RevisionError(spec.raw, `${this.baseDir} is not inside a git repository`);
    }

    switch (spec.kind) {
      case 'working-tree':
        return [{ id: 'working-tree', diff: await this.workingTreeDiff(pathFilters) }];
      case 'staged':
        return [
          {
            id: 'staged',
            diff: await this.run(spec.raw, ['diff', '--cached', ...DIFF_FLAGS, ...pathArgs(pathFilters)]),
          },
        ];
      case 'single': {
        const id = await this.verifyCommit(spec.raw, spec.ref);
        return [{ id, diff: await this.commitDiff(spec.raw, id, pathFilters) }];
      }
      case 'range': {
        await this.verifyCommit(spec.raw, spec.from);
        await this.verifyCommit(spec.raw, spec.to);
        const separator = spec.symmetric ? '...' : '..';
        // --reverse: oldest first, so summaries read as a chronological narrative
        const listing = await this.run(spec.raw, [
          'rev-list',
          '--reverse',
          `${spec.from}${separator}${spec.to}`,
          '--',
          ...pathFilters,
        ]);
        const ids = listing
          .split('\n')
          .map((line) => line.trim())
          .filter((line) => line.length > 0);
        this.logger.debug(`Range ${spec.raw} resolved to ${ids.length} commit(s)`);

        const refs: CommitRef[] = [];
        for (const id of ids) {
          refs.push({ id, diff: await this.commitDiff(spec.raw, id, pathFilters) });
        }
        return refs;
      }
    }
  }

  async getMetadata(commitId: string): Promise<CommitMetadata> {
    const raw = await this.run(commitId, ['show', '-s', METADATA_FORMAT, commitId]);
    return parseMetadata(raw);
  }

  async currentBranch(): Promise<string> {
    try {
      return (await this.git.raw(['branch', '--show-current'])).trim();
    } catch (error) {
      this.logger.debug('Could not read current branch', {}, String(error));
      return '';
    }
  }

  async latestTag(): Promise<string | undefined> {
    try {
      const tag = (await this.git.raw(['describe', '--tags', '--abbrev=0'])).trim();
      return tag || undefined;
    } catch {
      // no tags yet
      return undefined;
    }
  }

  private async verifyCommit(revision: string, ref: string): Promise<string> {
    const output = await this.run(revision, ['rev-parse', '--verify', `${ref}^{commit}`]);
    const sha = output.trim();
    if (!SHA_PATTERN.test(sha)) {
      throw new RevisionError(revision, `"${ref}" does not name a commit`);
    }
    return sha;
  }

  private async commitDiff(revision: string, id: string, pathFilters: string[]): Promise<string> {
    const diff = await this.run(revision, ['show', '--format=', ...DIFF_FLAGS, id, '--', ...pathFilters]);
    return diff.replace(/^\n+/, '');
  }

  private async workingTreeDiff(pathFilters: string[]): Promise<string> {
    const tracked = await this.run('working-tree', ['diff', ...DIFF_FLAGS, ...pathArgs(pathFilters)]);
    const listing = await this.run('working-tree', [
      'ls-files',
      '--others',
      '--exclude-standard',
      ...pathArgs(pathFilters),
    ]);

    const untracked: string[] = [];
    for (const file of listing.split('\n').map((line) => line.trim())) {
      if (!file) continue;
      const diff = await this.untrackedDiff(file);
      if (diff) untracked.push(diff);
    }

    return [tracked.trimEnd(), ...untracked].filter((part) => part.length > 0).join('\n');
  }

  private async untrackedDiff(file: string): Promise<string | undefined> {
    let content: string;
    try {
      content = await readFile(join(this.baseDir, file), 'utf-8');
    } catch (error) {
      // directories and vanished files are skipped
      this.logger.debug(`Skipping untracked ${file} (${errnoCode(error) ?? 'unreadable'})`);
      return undefined;
    }
    if (content.includes('\0')) {
      return `Binary file ${file} added`;
    }
    return newFileDiff(file, content);
  }

  private async run(revision: string, args: string[]): Promise<string> {
    try {
      return await this.git.raw(args);
    } catch (error) {
      const detail = error instanceof Error ? error.message.trim() : String(error);
      throw new RevisionError(revision, detail, { cause: error });
    }
  }
}
