/**
 * Prompt templates: discovery and token substitution.
 *
 * Lookup order for a template name:
 *   1. an explicit path (absolute, or starting with `.`)
 *   2. `<project>/.revdoc/templates/`
 *   3. `~/.revdoc/templates/`
 *   4. the templates bundled with revdoc
 *
 * Rendering replaces `{{TOKEN}}` and the legacy `[TOKEN]` form. Unknown
 * tokens are left as they are.
 */

import { existsSync, readFileSync, readdirSync } from 'fs';
import { homedir } from 'os';
import { dirname, isAbsolute, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { TemplateError } from './errors.js';

export type TemplateContext = Record<string, string | number | undefined>;

export interface TemplateRenderer {
  render(templateNameOrPath: string, context: TemplateContext): string;
}

export const BUNDLED_TEMPLATES_DIR = resolve(
  dirname(fileURLToPath(import.meta.url)),
  '..',
  '..',
  'templates'
);

export interface TemplateEngineOptions {
  projectDir?: string;
  userDir?: string;
  bundledDir?: string;
}

function isExplicitPath(name: string): boolean {
  return isAbsolute(name) || name.startsWith('./') || name.startsWith('../') || name.startsWith('.\\');
}

const TOKEN = /\{\{(\w+)\}\}|\[(\w+)\]/g;

/**
 * Single-pass substitution: inserted values are never scanned for tokens
 * again. Tokens missing from the context are left as written.
 */
export function renderTemplateString(template: string, context: TemplateContext): string {
  return template.replace(TOKEN, (token: string, braced?: string, bracketed?: string) => {
    const key = braced ?? bracketed ?? '';
    if (!Object.hasOwn(context, key)) {
      return token;
    }
    const value = context[key];
    return value === undefined ? '' : String(value);
  });
}

export class TemplateEngine implements TemplateRenderer {
  private readonly searchDirs: string[];

  constructor(private readonly options: TemplateEngineOptions = {}) {
    const projectDir = options.projectDir ?? process.cwd();
    this.searchDirs = [
      join(projectDir, '.revdoc', 'templates'),
      options.userDir ?? join(homedir(), '.revdoc', 'templates'),
      options.bundledDir ?? BUNDLED_TEMPLATES_DIR,
    ];
  }

  find(templateNameOrPath: string): string {
    if (isExplicitPath(templateNameOrPath)) {
      const explicit = resolve(this.options.projectDir ?? process.cwd(), templateNameOrPath);
      if (existsSync(explicit)) {
        return explicit;
      }
      throw new TemplateError(templateNameOrPath, `file not found at ${explicit}`);
    }

    for (const dir of this.searchDirs) {
      const candidate = join(dir, templateNameOrPath);
      if (existsSync(candidate)) {
        return candidate;
      }
    }
    throw new TemplateError(
      templateNameOrPath,
      `not found in ${this.searchDirs.join(', ')}`
    );
  }

  load(templateNameOrPath: string): string {
    const path = this.find(templateNameOrPath);
    try {
      return readFileSync(path, 'utf-8');
    } catch (error) {
      throw new TemplateError(templateNameOrPath, `could not be read from ${path}`, {
        cause: error,
      });
    }
  }

  render(templateNameOrPath: string, context: TemplateContext): string {
    return renderTemplateString(this.load(templateNameOrPath), context);
  }

  /**
   * Every visible template by name; earlier search directories shadow later ones.
   */
  list(): Map<string, string> {
    const templates = new Map<string, string>();
    for (const dir of [...this.searchDirs].reverse()) {
      if (!existsSync(dir)) continue;
      for (const name of readdirSync(dir)) {
        if (name.endsWith('.md')) {
          templates.set(name, join(dir, name));
        }
      }
    }
    return new Map([...templates.entries()].sort(([a], [b]) => a.localeCompare(b)));
  }
}
