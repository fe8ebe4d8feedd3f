import { appendFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import chalk from 'chalk';
import { CONFIG_DIR, CONFIG_FILE } from '../lib/config.js';

const DEFAULT_CONFIG = `# revdoc configuration
# Values here are overridden by REVDOC_* environment variables and CLI flags.

api:
  # Any OpenAI-compatible chat completions endpoint
  url: https://api.openai.com/v1/chat/completions
  model: gpt-4o-mini
  # Prefer REVDOC_API_KEY in the environment or .env over a key in this file
  # key: ...
  # temperature: 0.7
  maxTokens: 8192
  timeoutMs: 60000

cache:
  dir: .revdoc/cache

output:
  # auto | prepend | append | update | overwrite | none
  modes:
    changelog: auto
  # Target files; {VERSION} expands to the version label
  files:
    changelog: CHANGELOG.md
    release-notes: RELEASE_NOTES.md
    announcement: ANNOUNCEMENT.md

project:
  # title: My Project
  # version: 1.0.0
  # Extra instructions passed to every document prompt as {{RULES}}
  # rules: Keep entries short.
`;

const TEMPLATES_README = `# Custom templates

Templates here shadow the bundled ones with the same name
(see \`revdoc templates\`). Tokens use the form {{TOKEN}}:

- SUMMARY: per-commit summaries, oldest first
- PROJECT_TITLE, VERSION, REVISION, BRANCH, COMMIT_COUNT, DATE
- RULES, EXAMPLE from the project section of config.yaml

The per-commit template (commit_summary_prompt.md) receives HISTORY, DIFF,
COMMIT_ID, AUTHOR and MESSAGE. Run \`revdoc cache clear\` after editing it.
`;

const CACHE_IGNORE = `${CONFIG_DIR}/cache/`;

/**
 * Initialize revdoc configuration in a project
 */
export async function initProject(projectPath: string): Promise<void> {
  console.log(chalk.bold.cyan('\n📋 revdoc | Configuration Setup\n'));

  const configDir = join(projectPath, CONFIG_DIR);
  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true });
    console.log(chalk.green('✓'), 'Created', chalk.cyan(`${CONFIG_DIR}/`), 'directory');
  } else {
    console.log(chalk.yellow('⚠'), chalk.cyan(`${CONFIG_DIR}/`), 'directory already exists');
  }

  const configPath = join(configDir, CONFIG_FILE);
  if (!existsSync(configPath)) {
    writeFileSync(configPath, DEFAULT_CONFIG, 'utf-8');
    console.log(chalk.green('✓'), 'Created', chalk.cyan(`${CONFIG_DIR}/${CONFIG_FILE}`));
  } else {
    console.log(chalk.yellow('⚠'), chalk.cyan(`${CONFIG_DIR}/${CONFIG_FILE}`), 'already exists');
  }

  const templatesDir = join(configDir, 'templates');
  if (!existsSync(templatesDir)) {
    mkdirSync(templatesDir, { recursive: true });
    writeFileSync(join(templatesDir, 'README.txt'), TEMPLATES_README, 'utf-8');
    console.log(chalk.green('✓'), 'Created', chalk.cyan(`${CONFIG_DIR}/templates/`));
  }

  // Keep cached summaries out of version control
  const gitignorePath = join(projectPath, '.gitignore');
  const gitignore = existsSync(gitignorePath) ? readFileSync(gitignorePath, 'utf-8') : '';
  if (!gitignore.split('\n').some((line) => line.trim() === CACHE_IGNORE)) {
    const separator = gitignore && !gitignore.endsWith('\n') ? '\n' : '';
    appendFileSync(gitignorePath, `${separator}${CACHE_IGNORE}\n`, 'utf-8');
    console.log(chalk.green('✓'), 'Added', chalk.cyan(CACHE_IGNORE), 'to', chalk.cyan('.gitignore'));
  }

  console.log(chalk.bold.green('\n✓ revdoc initialization complete!\n'));

  console.log(chalk.bold('Next steps:\n'));
  console.log('  1. Set', chalk.cyan('REVDOC_API_KEY'), 'in your environment or', chalk.cyan('.env'));
  console.log('  2. Adjust', chalk.cyan(`${CONFIG_DIR}/${CONFIG_FILE}`));
  console.log('  3. Run', chalk.cyan('revdoc message'), 'to describe your working tree\n');
}
