import { relative } from 'path';
import chalk from 'chalk';
import { TemplateEngine } from '../lib/templates.js';

export function listTemplates(
  projectPath: string,
  engine = new TemplateEngine({ projectDir: projectPath })
): Map<string, string> {
  const templates = engine.list();

  console.log(chalk.bold('\nAvailable templates:\n'));
  for (const [name, path] of templates) {
    const shown = path.startsWith(projectPath) ? relative(projectPath, path) : path;
    console.log(chalk.cyan(`  • ${name}`), chalk.gray(shown));
  }
  console.log('');

  return templates;
}
