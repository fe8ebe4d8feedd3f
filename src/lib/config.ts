import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { Ajv } from 'ajv';
import * as yaml from 'yaml';
import { configFileSchema } from './config-schema.js';
import type { DocumentType, OutputMode } from './document-types.js';
import { ConfigError } from './errors.js';

export interface ApiConfig {
  /** Chat completions endpoint */
  url: string;
  key: string;
  model: string;
  /** Falls back to the document type's default when unset */
  temperature?: number;
  maxTokens: number;
  timeoutMs: number;
}

export interface RevdocConfig {
  api: ApiConfig;
  cache: {
    dir: string;
  };
  output: {
    modes: Partial<Record<DocumentType, OutputMode>>;
    /** Default target per document type; may contain {VERSION} */
    files: Partial<Record<DocumentType, string>>;
  };
  project: {
    title?: string;
    version?: string;
    rules?: string;
    example?: string;
  };
}

export interface ConfigOverrides {
  api?: Partial<ApiConfig>;
  cache?: Partial<RevdocConfig['cache']>;
  output?: Partial<RevdocConfig['output']>;
  project?: Partial<RevdocConfig['project']>;
}

export const CONFIG_DIR = '.revdoc';
export const CONFIG_FILE = 'config.yaml';
export const DEFAULT_API_TIMEOUT_MS = 60_000;

const DEFAULT_CONFIG: RevdocConfig = {
  api: {
    url: 'https://api.openai.com/v1/chat/completions',
    key: '',
    model: 'gpt-4o-mini',
    maxTokens: 8192,
    timeoutMs: DEFAULT_API_TIMEOUT_MS,
  },
  cache: {
    dir: join(CONFIG_DIR, 'cache'),
  },
  output: {
    modes: {},
    files: {},
  },
  project: {},
};

const ajv = new Ajv({ allErrors: true });
const validateConfigFile = ajv.compile<ConfigOverrides>(configFileSchema);

export interface LoadConfigOptions {
  /** Defaults to ~/.revdoc/config.yaml */
  userConfigPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration with precedence (highest first):
 * 1. CLI arguments (passed as overrides)
 * 2. Environment variables (REVDOC_*)
 * 3. <project>/.revdoc/config.yaml
 * 4. ~/.revdoc/config.yaml
 * 5. Default values
 */
export function loadConfig(
  projectPath?: string,
  overrides?: ConfigOverrides,
  options: LoadConfigOptions = {}
): RevdocConfig {
  const basePath = resolve(projectPath || process.cwd());
  const env = options.env ?? process.env;
  let config = mergeConfig(DEFAULT_CONFIG, {});

  const userPath = options.userConfigPath ?? join(homedir(), CONFIG_DIR, CONFIG_FILE);
  const projectConfigPath = join(basePath, CONFIG_DIR, CONFIG_FILE);
  for (const path of [userPath, projectConfigPath]) {
    if (existsSync(path)) {
      config = mergeConfig(config, readConfigFile(path));
    }
  }

  config = mergeConfig(config, envOverrides(env));

  if (overrides) {
    config = mergeConfig(config, overrides);
  }

  assertValidConfig(config, 'merged configuration');
  return config;
}

/**
 * Throws a ConfigError listing every schema violation in `data`.
 */
export function assertValidConfig(
  data: unknown,
  source: string
): asserts data is ConfigOverrides {
  if (!validateConfigFile(data)) {
    const errorText = ajv.errorsText(validateConfigFile.errors, {
      separator: '\n  ',
      dataVar: 'config',
    });
    throw new ConfigError(`Invalid configuration in ${source}:\n  ${errorText}`);
  }
}

export function readConfigFile(path: string): ConfigOverrides {
  let parsed: unknown;
  try {
    parsed = yaml.parse(readFileSync(path, 'utf-8')) ?? {};
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not parse ${path}: ${detail}`, { cause: error });
  }

  assertValidConfig(parsed, path);
  return parsed;
}

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function envOverrides(env: NodeJS.ProcessEnv): ConfigOverrides {
  return {
    api: {
      url: env.REVDOC_API_URL || undefined,
      key: env.REVDOC_API_KEY || env.OPENAI_API_KEY || undefined,
      model: env.REVDOC_MODEL || undefined,
      temperature: envNumber(env, 'REVDOC_TEMPERATURE'),
      maxTokens: envNumber(env, 'REVDOC_MAX_TOKENS'),
      timeoutMs: envNumber(env, 'REVDOC_TIMEOUT_MS'),
    },
    cache: {
      dir: env.REVDOC_CACHE_DIR || undefined,
    },
    project: {
      version: env.REVDOC_OUTPUT_VERSION || undefined,
    },
  };
}

/**
 * Deep merge, skipping undefined values
 */
function mergeConfig(base: RevdocConfig, override: ConfigOverrides): RevdocConfig {
  const api = override.api ?? {};
  const project = override.project ?? {};
  return {
    api: {
      url: api.url ?? base.api.url,
      key: api.key ?? base.api.key,
      model: api.model ?? base.api.model,
      temperature: api.temperature ?? base.api.temperature,
      maxTokens: api.maxTokens ?? base.api.maxTokens,
      timeoutMs: api.timeoutMs ?? base.api.timeoutMs,
    },
    cache: {
      dir: override.cache?.dir ?? base.cache.dir,
    },
    output: {
      modes: { ...base.output.modes, ...override.output?.modes },
      files: { ...base.output.files, ...override.output?.files },
    },
    project: {
      title: project.title ?? base.project.title,
      version: project.version ?? base.project.version,
      rules: project.rules ?? base.project.rules,
      example: project.example ?? base.project.example,
    },
  };
}

/**
 * Temperature for a document type: configured value, else the type's default.
 */
export function temperatureFor(config: RevdocConfig, fallback: number): number {
  return config.api.temperature ?? fallback;
}
