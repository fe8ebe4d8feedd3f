/**
 * End-to-end document generation:
 *
 *   resolve revision -> summarize each commit (cache first) -> assemble the
 *   document -> merge into the target file
 *
 * Nothing touches the target until every summary and the final document
 * exist, so a failure anywhere leaves it exactly as it was.
 */

import { resolve } from 'path';
import { CommitSummarizer } from './commit-summarizer.js';
import type { CommitCache } from './commit-cache.js';
import type { RevdocConfig } from './config.js';
import { DocumentAssembler, type GeneratedPayload } from './document-assembler.js';
import type { DocumentType, OutputMode } from './document-types.js';
import type { SummarizationClient } from './llm-client.js';
import { getLogger, type Logger } from './logger.js';
import { resolveOutputTarget } from './output-paths.js';
import { resolveProjectMetadata } from './project-metadata.js';
import type { Repository } from './repository.js';
import type { RetryOptions } from './retry.js';
import { RevisionResolver, parseRevisionSpec } from './revision.js';
import { SectionMerger, normalizePayload, type WriteOutcome } from './section-merger.js';
import type { TemplateRenderer } from './templates.js';

export interface PipelineDeps {
  repository: Repository;
  cache: CommitCache;
  client: SummarizationClient;
  templates: TemplateRenderer;
  config: RevdocConfig;
  projectDir: string;
  retry?: RetryOptions;
  now?: () => Date;
  logger?: Logger;
}

export interface GenerateRequest {
  revision: string;
  pathFilters?: string[];
  documentType: DocumentType;
  outputFile?: string;
  outputMode?: OutputMode;
  outputVersion?: string;
  /** Render prompts instead of calling the model; never writes */
  dryRun?: boolean;
  /** Prompt template for the document stage */
  promptFile?: string;
}

export interface GenerateResult {
  payload: GeneratedPayload;
  outcome: WriteOutcome;
  commitCount: number;
}

export async function generateDocument(
  deps: PipelineDeps,
  request: GenerateRequest
): Promise<GenerateResult> {
  const logger = (deps.logger ?? getLogger()).child({ documentType: request.documentType });
  const spec = parseRevisionSpec(request.revision);

  const assembler = new DocumentAssembler({
    client: deps.client,
    templates: deps.templates,
    dryRun: request.dryRun,
    customTemplate: request.promptFile,
    retry: deps.retry,
    logger,
  });
  // Fail on a missing --prompt-file before spending any model calls
  assembler.templateFor(request.documentType);

  const resolver = new RevisionResolver(deps.repository, { now: deps.now });
  const commits = await resolver.resolve(spec, request.pathFilters ?? []);

  const metadata = await resolveProjectMetadata({
    projectDir: deps.projectDir,
    revision: spec.raw,
    repository: deps.repository,
    title: deps.config.project.title,
    version: request.outputVersion ?? deps.config.project.version,
    rules: deps.config.project.rules,
    example: deps.config.project.example,
  });

  const summarizer = new CommitSummarizer({
    cache: deps.cache,
    client: deps.client,
    templates: deps.templates,
    dryRun: request.dryRun,
    projectTitle: metadata.title,
    retry: deps.retry,
    logger,
  });
  const summaries = await summarizer.summarizeAll(commits);

  const payload = await assembler.assemble(request.documentType, summaries, metadata);

  const target = resolveOutputTarget(
    request.documentType,
    metadata.version,
    deps.config,
    request.outputFile
  );
  const mode = request.outputMode ?? deps.config.output.modes[request.documentType] ?? 'auto';

  if (request.dryRun) {
    logger.debug('Dry run: nothing written');
    return {
      payload,
      outcome: { written: false, mode: 'none', content: normalizePayload(payload.text) },
      commitCount: commits.length,
    };
  }

  const merger = new SectionMerger(logger);
  const path = target.path === undefined ? undefined : resolve(deps.projectDir, target.path);
  const outcome = await merger.merge(path, payload, mode, { explicitFile: target.explicit });
  if (outcome.written) {
    logger.info(`${outcome.created ? 'Created' : 'Updated'} ${outcome.path} (${outcome.mode})`);
  }

  return { payload, outcome, commitCount: commits.length };
}
