import type { CommitCache } from './commit-cache.js';
import type { SummarizationClient } from './llm-client.js';
import { getLogger, type Logger } from './logger.js';
import type { Commit } from './repository.js';
import { SUMMARIZATION_RETRY, withRetry, type RetryOptions } from './retry.js';
import type { TemplateContext, TemplateRenderer } from './templates.js';

export const COMMIT_SUMMARY_TEMPLATE = 'commit_summary_prompt.md';

export interface CommitSummary {
  commit: Commit;
  summary: string;
  /** Served from the cache without a model call */
  cached: boolean;
}

export interface CommitSummarizerOptions {
  cache: CommitCache;
  client: SummarizationClient;
  templates: TemplateRenderer;
  /** Skip the model; the rendered prompt stands in as the summary */
  dryRun?: boolean;
  template?: string;
  projectTitle?: string;
  retry?: RetryOptions;
  logger?: Logger;
}

/**
 * Markdown block describing one commit, fed to the per-commit prompt.
 */
export function formatCommitHistory(commit: Commit): string {
  const lines = [
    `### Commit ID ${commit.id}`,
    `**Date:** ${commit.date}`,
    `**Author:** ${commit.author}`,
    `**Message:** ${commit.message || 'No commit message'}`,
  ];
  const diff = commit.diff.trimEnd();
  lines.push(diff ? `\`\`\`diff\n${diff}\n\`\`\`` : '_No changes in the selected paths._');
  return lines.join('\n');
}

export function commitTemplateContext(commit: Commit, projectTitle = ''): TemplateContext {
  return {
    HISTORY: formatCommitHistory(commit),
    COMMIT_ID: commit.id,
    SHORT_COMMIT_ID: commit.shortId,
    AUTHOR: commit.author,
    DATE: commit.date,
    MESSAGE: commit.message,
    DIFF: commit.diff,
    PROJECT_TITLE: projectTitle,
  };
}

/**
 * Produces one summary per commit, consulting the cache first and calling
 * the model only on a miss. Commits are handled one at a time, in order.
 */
export class CommitSummarizer {
  private readonly logger: Logger;
  private readonly template: string;
  private readonly retry: RetryOptions;

  constructor(private readonly options: CommitSummarizerOptions) {
    this.logger = (options.logger ?? getLogger()).child({ component: 'summarizer' });
    this.template = options.template ?? COMMIT_SUMMARY_TEMPLATE;
    this.retry = options.retry ?? SUMMARIZATION_RETRY;
  }

  async summarize(commit: Commit): Promise<string> {
    return (await this.summarizeOne(commit)).summary;
  }

  /**
   * Summaries for every commit, in the order given. The first commit whose
   * summarization fails aborts the whole run with a SummarizationError.
   */
  async summarizeAll(commits: Commit[]): Promise<CommitSummary[]> {
    const results: CommitSummary[] = [];
    for (const [index, commit] of commits.entries()) {
      this.logger.info(`Summarizing ${index + 1}/${commits.length}`, { commit: commit.shortId });
      results.push(await this.summarizeOne(commit));
    }
    const hits = results.filter((result) => result.cached).length;
    if (results.length > 0) {
      this.logger.debug(`${hits}/${results.length} summaries served from cache`);
    }
    return results;
  }

  private async summarizeOne(commit: Commit): Promise<CommitSummary> {
    const { cache, client, templates } = this.options;

    if (!commit.synthetic) {
      const cached = await cache.get(commit.id);
      if (cached !== undefined && cached.trim().length > 0) {
        return { commit, summary: cached, cached: true };
      }
    }

    const prompt = templates.render(
      this.template,
      commitTemplateContext(commit, this.options.projectTitle)
    );

    if (this.options.dryRun) {
      return { commit, summary: prompt, cached: false };
    }

    const summary = await withRetry(
      `commit ${commit.id}`,
      async () => {
        const text = (await client.summarize(prompt)).trim();
        if (!text) {
          throw new Error('empty summary');
        }
        return text;
      },
      this.retry,
      this.logger
    );

    if (!commit.synthetic) {
      await cache.put(commit.id, summary);
    }
    return { commit, summary, cached: false };
  }
}
