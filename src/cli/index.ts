#!/usr/bin/env node

import { Argument, Command, Option } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { config as loadDotenv } from 'dotenv';
import { clearCache } from './cache.js';
import { CONFIG_ACTIONS, runConfigCommand, type ConfigAction } from './config.js';
import { generate, type GenerateOptions } from './generate.js';
import { initProject } from './init.js';
import { listTemplates } from './templates.js';
import { OUTPUT_MODES, type DocumentType } from '../lib/document-types.js';
import { failWith } from '../lib/exit.js';
import { configureLogger, type LogFormat } from '../lib/logger.js';

// Load environment variables from .env in current working directory (if present)
loadDotenv();

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function readVersion(): string {
  const packageJsonPath = join(__dirname, '..', '..', 'package.json');
  const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (packageJson && typeof packageJson === 'object' && 'version' in packageJson) {
    return String(packageJson.version);
  }
  return '0.0.0';
}

const version = readVersion();

interface GlobalOptions {
  verbose?: boolean;
  logFormat?: LogFormat;
}

interface GenerateCommandOptions extends GenerateOptions, GlobalOptions {
  cached?: boolean;
  current?: boolean;
}

function setupLogging(options: GlobalOptions): void {
  const format = options.logFormat ?? 'human';
  configureLogger({
    level: options.verbose ? 'debug' : 'info',
    format,
    timestamps: format === 'json',
  });
}

function withLoggingOptions(command: Command): Command {
  return command
    .option('-v, --verbose', 'Debug logging, including stack traces on failure')
    .addOption(
      new Option('--log-format <format>', 'Log output format')
        .choices(['human', 'json'])
        .default('human')
    );
}

const program = new Command();

program
  .name('revdoc')
  .description('Generate commit messages, changelogs and release notes from git history')
  .version(version);

function documentCommand(
  name: string,
  documentType: DocumentType,
  description: string
): Command {
  const command = program
    .command(name)
    .description(description)
    .argument('[revision]', 'Revision: A..B, A...B, a ref, current or cached', '')
    .argument('[pathspec...]', 'Limit the history to these paths')
    .option('--cached', 'Use staged changes')
    .option('--current', 'Use uncommitted working tree changes (default)')
    .option('--output-file <path>', 'Write to this file')
    .addOption(
      new Option('--output-mode <mode>', 'How to write into the output file').choices(OUTPUT_MODES)
    )
    .option('--output-version <version>', 'Version label for the document section')
    .option('--dry-run', 'Print the prompts instead of calling the model; write nothing')
    .option('--api-url <url>', 'Chat completions endpoint')
    .option('--api-key <key>', 'API key (prefer REVDOC_API_KEY)')
    .option('--model <model>', 'Model name');

  withLoggingOptions(command).action(
    async (revision: string, pathFilters: string[], options: GenerateCommandOptions) => {
      try {
        setupLogging(options);
        const target = options.cached ? 'staged' : options.current ? 'working-tree' : revision;
        await generate(documentType, target, pathFilters, options);
      } catch (error) {
        failWith(error);
      }
    }
  );
  return command;
}

documentCommand('message', 'message', 'Write a commit message for the changes').alias('msg');
documentCommand('summary', 'summary', 'Summarize the changes');
documentCommand('changelog', 'changelog', 'Update the changelog section for a version');
documentCommand('release-notes', 'release-notes', 'Write release notes');
documentCommand('announcement', 'announcement', 'Write a release announcement');
documentCommand('document', 'document', 'Generate a document from your own prompt template')
  .requiredOption('--prompt-file <path>', 'Prompt template to render');

const cache = program.command('cache').description('Manage cached commit summaries');

withLoggingOptions(
  cache.command('clear').description('Delete every cached commit summary')
).action(async (options: GlobalOptions) => {
  try {
    setupLogging(options);
    await clearCache(process.cwd());
  } catch (error) {
    failWith(error);
  }
});

program
  .command('config')
  .description('Read or edit .revdoc/config.yaml (keys are dotted, e.g. api.model)')
  .addArgument(new Argument('[action]', 'What to do').choices(CONFIG_ACTIONS).default('list'))
  .argument('[key]', 'Configuration key')
  .argument('[value]', 'New value, for set')
  .option('--global', 'Use ~/.revdoc/config.yaml instead of the project file')
  .action(
    async (
      action: ConfigAction,
      key: string | undefined,
      value: string | undefined,
      options: { global?: boolean }
    ) => {
      try {
        await runConfigCommand(process.cwd(), action, key, value, { global: options.global });
      } catch (error) {
        failWith(error);
      }
    }
  );

program
  .command('templates')
  .description('List available prompt templates')
  .action(() => {
    try {
      listTemplates(process.cwd());
    } catch (error) {
      failWith(error);
    }
  });

program
  .command('init')
  .description('Initialize revdoc configuration in current project')
  .action(async () => {
    try {
      await initProject(process.cwd());
    } catch (error) {
      failWith(error);
    }
  });

// Show help if no command provided
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  await program.parseAsync(process.argv);
}
