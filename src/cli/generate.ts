import { existsSync } from 'fs';
import { resolve } from 'path';
import chalk from 'chalk';
import { CommitCache } from '../lib/commit-cache.js';
import { loadConfig, temperatureFor, type RevdocConfig } from '../lib/config.js';
import { DOCUMENT_PROFILES, type DocumentType, type OutputMode } from '../lib/document-types.js';
import {
  ChatCompletionClient,
  type ChatClientOptions,
  type SummarizationClient,
} from '../lib/llm-client.js';
import { getLogger } from '../lib/logger.js';
import { generateDocument, type GenerateResult } from '../lib/pipeline.js';
import { GitRepository, type Repository } from '../lib/repository.js';
import { TemplateEngine } from '../lib/templates.js';

export interface GenerateOptions {
  outputFile?: string;
  outputMode?: OutputMode;
  outputVersion?: string;
  dryRun?: boolean;
  promptFile?: string;
  apiUrl?: string;
  apiKey?: string;
  model?: string;
}

/** Seams for tests; production uses git, the HTTP client and stdout. */
export interface GenerateEnvironment {
  cwd?: string;
  config?: RevdocConfig;
  repository?: Repository;
  createClient?: (options: ChatClientOptions) => SummarizationClient;
  write?: (text: string) => void;
}

/**
 * A --prompt-file that exists relative to the working directory is used as
 * a path; anything else is looked up by name among the templates.
 */
function promptPath(cwd: string, promptFile: string): string {
  const candidate = resolve(cwd, promptFile);
  return existsSync(candidate) ? candidate : promptFile;
}

export async function generate(
  documentType: DocumentType,
  revision: string | undefined,
  pathFilters: string[],
  options: GenerateOptions,
  env: GenerateEnvironment = {}
): Promise<GenerateResult> {
  const cwd = env.cwd ?? process.cwd();
  const config =
    env.config ??
    loadConfig(cwd, {
      api: { url: options.apiUrl, key: options.apiKey, model: options.model },
    });
  const logger = getLogger();

  const clientOptions: ChatClientOptions = {
    apiUrl: config.api.url,
    apiKey: config.api.key || undefined,
    model: config.api.model,
    temperature: temperatureFor(config, DOCUMENT_PROFILES[documentType].temperature),
    maxTokens: config.api.maxTokens,
    timeoutMs: config.api.timeoutMs,
  };
  if (!clientOptions.apiKey && !options.dryRun) {
    logger.warn('No API key configured; set REVDOC_API_KEY or api.key if the endpoint needs one');
  }
  logger.debug(`Model ${clientOptions.model} at ${clientOptions.apiUrl}`, { documentType });

  const createClient = env.createClient ?? ((opts) => new ChatCompletionClient(opts));

  const result = await generateDocument(
    {
      repository: env.repository ?? new GitRepository(cwd),
      cache: new CommitCache(resolve(cwd, config.cache.dir), logger),
      client: createClient(clientOptions),
      templates: new TemplateEngine({ projectDir: cwd }),
      config,
      projectDir: cwd,
      logger,
    },
    {
      revision: revision ?? '',
      pathFilters,
      documentType,
      outputFile: options.outputFile,
      outputMode: options.outputMode,
      outputVersion: options.outputVersion,
      dryRun: options.dryRun,
      promptFile: options.promptFile && promptPath(cwd, options.promptFile),
    }
  );

  const write = env.write ?? ((text: string) => process.stdout.write(text));
  if (result.outcome.written) {
    console.error(chalk.green('✓'), `Wrote ${chalk.cyan(result.outcome.path)}`);
  } else {
    write(result.outcome.content);
  }
  return result;
}
