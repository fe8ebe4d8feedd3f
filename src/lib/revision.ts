/**
 * Revision expressions and their resolution into ordered commits.
 *
 * Commits are always returned oldest-first (chronological), whatever order
 * git happens to list them in; the summaries then read as a narrative.
 */

import { RevisionError } from './errors.js';
import { getLogger } from './logger.js';
import type { Commit, CommitMetadata, CommitRef, Repository } from './repository.js';

export type RevisionSpec =
  | { kind: 'working-tree'; raw: string }
  | { kind: 'staged'; raw: string }
  | { kind: 'single'; raw: string; ref: string }
  | { kind: 'range'; raw: string; from: string; to: string; symmetric: boolean };

export const WORKING_TREE = 'working-tree';
export const STAGED = 'staged';

const WORKING_TREE_ALIASES = new Set(['', WORKING_TREE, '--current', 'current']);
const STAGED_ALIASES = new Set([STAGED, '--cached', 'cached']);

function checkRef(raw: string, ref: string): string {
  if (ref.startsWith('-')) {
    throw new RevisionError(raw, `"${ref}" looks like an option, not a revision`);
  }
  if (ref.includes('..')) {
    throw new RevisionError(raw, 'a range may only contain one ".." or "..."');
  }
  return ref;
}

function parseRange(raw: string, separator: '..' | '...'): RevisionSpec {
  const index = raw.indexOf(separator);
  const left = raw.slice(0, index);
  const right = raw.slice(index + separator.length);
  if (!left && !right) {
    throw new RevisionError(raw, 'a range needs at least one endpoint');
  }
  return {
    kind: 'range',
    raw,
    from: checkRef(raw, left || 'HEAD'),
    to: checkRef(raw, right || 'HEAD'),
    symmetric: separator === '...',
  };
}

/**
 * Parse a revision expression: `A..B`, `A...B`, a single ref, or one of the
 * `working-tree` / `staged` sentinels. An omitted range endpoint means HEAD.
 */
export function parseRevisionSpec(input: string): RevisionSpec {
  const raw = input.trim();

  if (WORKING_TREE_ALIASES.has(raw)) {
    return { kind: 'working-tree', raw: raw || WORKING_TREE };
  }
  if (STAGED_ALIASES.has(raw)) {
    return { kind: 'staged', raw };
  }
  if (/\s/.test(raw)) {
    throw new RevisionError(raw, 'revisions cannot contain whitespace');
  }
  if (raw.includes('...')) {
    return parseRange(raw, '...');
  }
  if (raw.includes('..')) {
    return parseRange(raw, '..');
  }
  return { kind: 'single', raw, ref: checkRef(raw, raw) };
}

export function isSynthetic(spec: RevisionSpec): boolean {
  return spec.kind === 'working-tree' || spec.kind === 'staged';
}

function today(now: Date): string {
  return now.toISOString().slice(0, 10);
}

export interface RevisionResolverOptions {
  /** Clock for synthetic commit dates */
  now?: () => Date;
}

export class RevisionResolver {
  private readonly now: () => Date;
  private readonly logger = getLogger().child({ component: 'resolver' });

  constructor(
    private readonly repository: Repository,
    options: RevisionResolverOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async resolve(spec: RevisionSpec | string, pathFilters: string[] = []): Promise<Commit[]> {
    const parsed = typeof spec === 'string' ? parseRevisionSpec(spec) : spec;

    let refs: CommitRef[];
    try {
      refs = await this.repository.resolveCommits(parsed, pathFilters);
    } catch (error) {
      if (error instanceof RevisionError) throw error;
      throw new RevisionError(parsed.raw, error instanceof Error ? error.message : String(error), {
        cause: error,
      });
    }

    if (parsed.kind === 'working-tree' || parsed.kind === 'staged') {
      const date = today(this.now());
      // A clean tree or empty index has nothing to describe
      const changed = refs.filter((ref) => ref.diff.trimEnd().length > 0);
      if (changed.length === 0) {
        this.logger.debug(`No ${parsed.kind} changes`);
      }
      return changed.map((ref) => ({
        id: parsed.kind,
        shortId: parsed.kind,
        author: parsed.kind === 'staged' ? 'Staged Changes' : 'Working Tree',
        date,
        message: parsed.kind === 'staged' ? 'Staged changes' : 'Uncommitted changes',
        diff: ref.diff,
        synthetic: true,
      }));
    }

    const commits: Commit[] = [];
    for (const ref of refs) {
      let metadata: CommitMetadata;
      try {
        metadata = await this.repository.getMetadata(ref.id);
      } catch (error) {
        if (error instanceof RevisionError) throw error;
        throw new RevisionError(ref.id, 'could not read commit metadata', { cause: error });
      }
      commits.push({ ...metadata, id: metadata.id || ref.id, diff: ref.diff, synthetic: false });
    }

    this.logger.debug(`Resolved ${parsed.raw} to ${commits.length} commit(s)`);
    return commits;
  }
}
