import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import chalk from 'chalk';
import * as yaml from 'yaml';
import { writeFileAtomic } from '../lib/atomic-write.js';
import { CONFIG_DIR, CONFIG_FILE, assertValidConfig } from '../lib/config.js';
import { configFileSchema } from '../lib/config-schema.js';
import { ConfigError } from '../lib/errors.js';

export const CONFIG_ACTIONS = ['list', 'get', 'set', 'unset'] as const;

export type ConfigAction = (typeof CONFIG_ACTIONS)[number];

function field(value: unknown, key: string): unknown {
  return value !== null && typeof value === 'object' && key in value
    ? Reflect.get(value, key)
    : undefined;
}

/**
 * Schema node for a dotted key such as `api.model` or
 * `output.files.changelog`; undefined when the key is not allowed.
 */
export function schemaFor(key: string): unknown {
  let node: unknown = configFileSchema;
  for (const part of key.split('.')) {
    const next = field(field(node, 'properties'), part) ?? field(node, 'additionalProperties');
    if (next === undefined || typeof next === 'boolean') {
      return undefined;
    }
    node = next;
  }
  return node;
}

function keyPath(key: string | undefined): string[] {
  if (!key) {
    throw new ConfigError('A configuration key is required, e.g. api.model');
  }
  if (schemaFor(key) === undefined) {
    throw new ConfigError(`Unknown configuration key "${key}"`);
  }
  return key.split('.');
}

/**
 * Turn a command-line string into the type the schema expects for `key`.
 */
export function coerceValue(key: string, raw: string): string | number {
  const type = field(schemaFor(key), 'type');
  if (type === 'object') {
    throw new ConfigError(`"${key}" is a section; set one of its keys instead`);
  }
  if (type === 'number' || type === 'integer') {
    const value = Number(raw);
    if (raw.trim() === '' || Number.isNaN(value)) {
      throw new ConfigError(`"${key}" must be a number, got "${raw}"`);
    }
    return value;
  }
  return raw;
}

/**
 * Flatten nested config into `dotted.key=value` lines, in file order.
 */
export function flattenConfig(data: unknown, prefix = ''): string[] {
  if (data === null || typeof data !== 'object' || Array.isArray(data)) {
    return prefix ? [`${prefix}=${String(data)}`] : [];
  }
  return Object.entries(data).flatMap(([key, value]) =>
    flattenConfig(value, prefix ? `${prefix}.${key}` : key)
  );
}

/**
 * Edits one config.yaml in place. Comments and key order survive edits;
 * every change is validated against the schema before it is written.
 */
export class ConfigFileEditor {
  private readonly doc: yaml.Document.Parsed;

  constructor(readonly path: string) {
    const text = existsSync(path) ? readFileSync(path, 'utf-8') : '';
    this.doc = yaml.parseDocument(text);
    if (this.doc.errors.length > 0) {
      const reasons = this.doc.errors.map((error) => error.message).join('; ');
      throw new ConfigError(`Could not parse ${path}: ${reasons}`);
    }
  }

  data(): unknown {
    const data: unknown = this.doc.toJS();
    return data ?? {};
  }

  list(): string[] {
    return flattenConfig(this.data());
  }

  get(key: string | undefined): string | undefined {
    let node = this.data();
    for (const part of keyPath(key)) {
      node = field(node, part);
    }
    if (node === undefined || node === null) {
      return undefined;
    }
    return typeof node === 'object' ? yaml.stringify(node).trimEnd() : String(node);
  }

  set(key: string | undefined, raw: string | undefined): void {
    const path = keyPath(key);
    if (raw === undefined) {
      throw new ConfigError(`A value is required to set "${path.join('.')}"`);
    }
    this.doc.setIn(path, coerceValue(path.join('.'), raw));
    assertValidConfig(this.data(), this.path);
  }

  /** Returns false when the key was not set. */
  unset(key: string | undefined): boolean {
    const path = keyPath(key);
    return this.doc.hasIn(path) && this.doc.deleteIn(path);
  }

  async save(): Promise<void> {
    await writeFileAtomic(this.path, this.doc.toString());
  }
}

export function configFilePath(projectPath: string, global = false): string {
  return global
    ? join(homedir(), CONFIG_DIR, CONFIG_FILE)
    : join(projectPath, CONFIG_DIR, CONFIG_FILE);
}

export interface ConfigCommandOptions {
  global?: boolean;
  /** Overrides the file chosen from projectPath and --global */
  path?: string;
}

/**
 * `revdoc config list|get|set|unset [key] [value]`. Values go to stdout;
 * confirmations go to stderr.
 */
export async function runConfigCommand(
  projectPath: string,
  action: ConfigAction,
  key: string | undefined,
  value: string | undefined,
  options: ConfigCommandOptions = {}
): Promise<void> {
  const editor = new ConfigFileEditor(options.path ?? configFilePath(projectPath, options.global));

  switch (action) {
    case 'list':
      for (const line of editor.list()) {
        console.log(line);
      }
      return;
    case 'get': {
      const current = editor.get(key);
      if (current === undefined) {
        throw new ConfigError(`"${key}" is not set in ${editor.path}`);
      }
      console.log(current);
      return;
    }
    case 'set':
      editor.set(key, value);
      await editor.save();
      console.error(chalk.green('✓'), `Set ${chalk.cyan(key)} in ${chalk.cyan(editor.path)}`);
      return;
    case 'unset':
      if (!editor.unset(key)) {
        console.error(chalk.yellow('⚠'), `${chalk.cyan(key)} was not set`);
        return;
      }
      await editor.save();
      console.error(chalk.green('✓'), `Removed ${chalk.cyan(key)} from ${chalk.cyan(editor.path)}`);
      return;
  }
}
