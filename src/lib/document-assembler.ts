import type { CommitSummary } from './commit-summarizer.js';
import { DOCUMENT_PROFILES, type DocumentType } from './document-types.js';
import { ConfigError } from './errors.js';
import type { SummarizationClient } from './llm-client.js';
import { getLogger, type Logger } from './logger.js';
import type { ProjectMetadata } from './project-metadata.js';
import { SUMMARIZATION_RETRY, withRetry, type RetryOptions } from './retry.js';
import type { TemplateContext, TemplateRenderer } from './templates.js';

export interface GeneratedPayload {
  text: string;
  /** Version label the payload is filed under */
  version: string;
  documentType: DocumentType;
  /** Produced by the no-changes policy rather than a model */
  empty: boolean;
  /** Final prompt, absent for empty payloads */
  prompt?: string;
}

export interface DocumentAssemblerOptions {
  client: SummarizationClient;
  templates: TemplateRenderer;
  dryRun?: boolean;
  /** User template; required for `document`, overrides the built-in otherwise */
  customTemplate?: string;
  retry?: RetryOptions;
  logger?: Logger;
}

function subject(message: string): string {
  return message.split('\n')[0]?.trim() ?? '';
}

/**
 * Ordered per-commit summaries as one Markdown block.
 */
export function formatSummaries(summaries: CommitSummary[]): string {
  return summaries
    .map(({ commit, summary }) => {
      const heading = [commit.shortId, subject(commit.message)].filter(Boolean).join(' ');
      return `### ${heading}\n\n${summary.trim()}`;
    })
    .join('\n\n');
}

export function documentTemplateContext(
  summaries: CommitSummary[],
  metadata: ProjectMetadata
): TemplateContext {
  const summaryText = formatSummaries(summaries);
  const last = summaries[summaries.length - 1]?.commit;
  const authors = [...new Set(summaries.map(({ commit }) => commit.author).filter(Boolean))];

  return {
    SUMMARY: summaryText,
    HISTORY: summaryText,
    PROJECT_TITLE: metadata.title,
    VERSION: metadata.version,
    REVISION: metadata.revision,
    BRANCH: metadata.branch,
    COMMIT_COUNT: summaries.length,
    COMMIT_ID: last?.id,
    SHORT_COMMIT_ID: last?.shortId,
    AUTHOR: authors.join(', '),
    DATE: last?.date ?? new Date().toISOString().slice(0, 10),
    MESSAGE: last ? subject(last.message) : '',
    RULES: metadata.rules ?? '',
    EXAMPLE: metadata.example ?? '',
  };
}

/**
 * Combines ordered commit summaries and project metadata into the final
 * document text.
 */
export class DocumentAssembler {
  private readonly logger: Logger;

  constructor(private readonly options: DocumentAssemblerOptions) {
    this.logger = (options.logger ?? getLogger()).child({ component: 'assembler' });
  }

  templateFor(documentType: DocumentType): string {
    const template = this.options.customTemplate ?? DOCUMENT_PROFILES[documentType].template;
    if (!template) {
      throw new ConfigError(`A prompt template (--prompt-file) is required for "${documentType}"`);
    }
    return template;
  }

  async assemble(
    documentType: DocumentType,
    orderedSummaries: CommitSummary[],
    metadata: ProjectMetadata
  ): Promise<GeneratedPayload> {
    const template = this.templateFor(documentType);

    if (orderedSummaries.length === 0) {
      this.logger.info(`No commits in ${metadata.revision}; using the empty ${documentType} payload`, {
        documentType,
      });
      return {
        text: DOCUMENT_PROFILES[documentType].emptyPayload,
        version: metadata.version,
        documentType,
        empty: true,
      };
    }

    const prompt = this.options.templates.render(
      template,
      documentTemplateContext(orderedSummaries, metadata)
    );

    if (this.options.dryRun) {
      return { text: prompt, version: metadata.version, documentType, empty: false, prompt };
    }

    this.logger.info(`Writing ${documentType} from ${orderedSummaries.length} summaries`, {
      documentType,
    });
    const text = await withRetry(
      `${documentType} document`,
      async () => {
        const content = (await this.options.client.summarize(prompt)).trim();
        if (!content) {
          throw new Error('empty response');
        }
        return content;
      },
      this.options.retry ?? SUMMARIZATION_RETRY,
      this.logger
    );

    return { text, version: metadata.version, documentType, empty: false, prompt };
  }
}
