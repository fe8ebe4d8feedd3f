import { describe, expect, it } from 'vitest';
import type { CommitSummary } from './commit-summarizer.js';
import {
  DocumentAssembler,
  documentTemplateContext,
  formatSummaries,
} from './document-assembler.js';
import { ConfigError } from './errors.js';
import type { SummarizationClient } from './llm-client.js';
import { createLogger } from './logger.js';
import type { ProjectMetadata } from './project-metadata.js';
import { renderTemplateString, type TemplateContext, type TemplateRenderer } from './templates.js';

const logger = createLogger({ level: 'error' });
const noWait = { attempts: 3, baseDelayMs: 0, sleep: async () => {} };

const metadata: ProjectMetadata = {
  title: 'demo',
  version: '1.2.0',
  branch: 'main',
  revision: 'v1.1.0..v1.2.0',
  rules: 'Be brief.',
};

const templates: Record<string, string> = {
  'changelog_prompt.md': 'Changelog {{VERSION}} for {{PROJECT_TITLE}} ({{COMMIT_COUNT}}):\n{{SUMMARY}}',
  'message_prompt.md': 'Message:\n{{SUMMARY}}\n{{RULES}}',
  './custom.md': 'Custom {{BRANCH}} {{REVISION}}',
};

const renderer: TemplateRenderer = {
  render: (name: string, context: TemplateContext) =>
    renderTemplateString(templates[name] ?? `missing ${name}`, context),
};

class RecordingClient implements SummarizationClient {
  readonly prompts: string[] = [];
  constructor(private readonly reply: () => string) {}
  async summarize(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.reply();
  }
}

function summary(id: string, text: string, author = 'Ada'): CommitSummary {
  return {
    commit: {
      id: `${id}000`,
      shortId: id,
      author,
      date: '2024-04-01',
      message: `Subject ${id}\n\nBody`,
      diff: '',
      synthetic: false,
    },
    summary: text,
    cached: false,
  };
}

describe('formatSummaries', () => {
  it('joins per-commit summaries in order under their subjects', () => {
    expect(formatSummaries([summary('aaa', '- one'), summary('bbb', '- two\n')])).toBe(
      '### aaa Subject aaa\n\n- one\n\n### bbb Subject bbb\n\n- two'
    );
  });
});

describe('documentTemplateContext', () => {
  it('exposes project metadata and the last commit', () => {
    const context = documentTemplateContext(
      [summary('aaa', 'x', 'Ada'), summary('bbb', 'y', 'Lin'), summary('ccc', 'z', 'Ada')],
      metadata
    );

    expect(context).toMatchObject({
      VERSION: '1.2.0',
      PROJECT_TITLE: 'demo',
      BRANCH: 'main',
      REVISION: 'v1.1.0..v1.2.0',
      COMMIT_COUNT: 3,
      SHORT_COMMIT_ID: 'ccc',
      AUTHOR: 'Ada, Lin',
      MESSAGE: 'Subject ccc',
      RULES: 'Be brief.',
      EXAMPLE: '',
    });
  });
});

describe('DocumentAssembler', () => {
  it('renders the type template and returns the model output', async () => {
    const client = new RecordingClient(() => '### Added\n- Parser\n');
    const assembler = new DocumentAssembler({ client, templates: renderer, retry: noWait, logger });

    const payload = await assembler.assemble('changelog', [summary('aaa', '- one')], metadata);

    expect(client.prompts).toEqual(['Changelog 1.2.0 for demo (1):\n### aaa Subject aaa\n\n- one']);
    expect(payload).toEqual({
      text: '### Added\n- Parser',
      version: '1.2.0',
      documentType: 'changelog',
      empty: false,
      prompt: client.prompts[0],
    });
  });

  it('uses the per-type empty payload without calling the client', async () => {
    const client = new RecordingClient(() => 'unused');
    const assembler = new DocumentAssembler({ client, templates: renderer, logger });

    await expect(assembler.assemble('changelog', [], metadata)).resolves.toEqual({
      text: '- No notable changes.',
      version: '1.2.0',
      documentType: 'changelog',
      empty: true,
    });
    await expect(assembler.assemble('message', [], metadata)).resolves.toMatchObject({
      text: 'No changes detected.',
      empty: true,
    });
    expect(client.prompts).toEqual([]);
  });

  it('returns the rendered prompt in dry run', async () => {
    const client = new RecordingClient(() => 'unused');
    const assembler = new DocumentAssembler({ client, templates: renderer, dryRun: true, logger });

    const payload = await assembler.assemble('message', [summary('aaa', '- one')], metadata);

    expect(payload.text).toBe('Message:\n### aaa Subject aaa\n\n- one\nBe brief.');
    expect(client.prompts).toEqual([]);
  });

  it('requires a prompt template for the document type', async () => {
    const client = new RecordingClient(() => 'unused');
    const bare = new DocumentAssembler({ client, templates: renderer, logger });

    await expect(bare.assemble('document', [summary('aaa', 'x')], metadata)).rejects.toBeInstanceOf(
      ConfigError
    );

    const custom = new DocumentAssembler({
      client: new RecordingClient(() => 'custom doc'),
      templates: renderer,
      customTemplate: './custom.md',
      logger,
    });
    const payload = await custom.assemble('document', [summary('aaa', 'x')], metadata);
    expect(payload.prompt).toBe('Custom main v1.1.0..v1.2.0');
    expect(payload.text).toBe('custom doc');
  });

  it('fails with SummarizationError when the model keeps returning nothing', async () => {
    const client = new RecordingClient(() => '');
    const assembler = new DocumentAssembler({ client, templates: renderer, retry: noWait, logger });

    await expect(assembler.assemble('summary', [summary('aaa', 'x')], metadata)).rejects.toThrow(
      'Summarization failed for summary document after 3 attempt(s): empty response'
    );
    expect(client.prompts).toHaveLength(3);
  });
});
