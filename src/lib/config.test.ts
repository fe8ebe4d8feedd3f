import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig, readConfigFile, temperatureFor } from './config.js';
import { ConfigError } from './errors.js';

describe('Config', () => {
  let dir: string;
  let userConfigPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'revdoc-config-'));
    userConfigPath = join(dir, 'home', 'config.yaml');
    await mkdir(join(dir, 'home'));
    await mkdir(join(dir, 'project', '.revdoc'), { recursive: true });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const projectPath = () => join(dir, 'project');
  const writeProjectConfig = (yaml: string) =>
    writeFile(join(dir, 'project', '.revdoc', 'config.yaml'), yaml, 'utf-8');

  it('uses defaults when nothing is configured', () => {
    const config = loadConfig(projectPath(), undefined, { userConfigPath, env: {} });

    expect(config.api).toEqual({
      url: 'https://api.openai.com/v1/chat/completions',
      key: '',
      model: 'gpt-4o-mini',
      temperature: undefined,
      maxTokens: 8192,
      timeoutMs: 60_000,
    });
    expect(config.cache.dir).toBe(join('.revdoc', 'cache'));
    expect(config.output).toEqual({ modes: {}, files: {} });
  });

  it('layers user file, project file, environment and overrides', async () => {
    await writeFile(
      userConfigPath,
      'api:\n  model: user-model\n  url: http://user.test\ncache:\n  dir: user-cache\n',
      'utf-8'
    );
    await writeProjectConfig('api:\n  model: project-model\noutput:\n  files:\n    changelog: docs/CHANGES.md\n');

    const config = loadConfig(
      projectPath(),
      { api: { url: 'http://cli.test', model: undefined } },
      {
        userConfigPath,
        env: { REVDOC_MODEL: 'env-model', REVDOC_TEMPERATURE: '0.2', REVDOC_OUTPUT_VERSION: '5.0.0' },
      }
    );

    expect(config.api.url).toBe('http://cli.test');
    expect(config.api.model).toBe('env-model');
    expect(config.api.temperature).toBe(0.2);
    expect(config.cache.dir).toBe('user-cache');
    expect(config.output.files.changelog).toBe('docs/CHANGES.md');
    expect(config.project.version).toBe('5.0.0');
  });

  it('falls back to OPENAI_API_KEY', () => {
    const config = loadConfig(projectPath(), undefined, {
      userConfigPath,
      env: { OPENAI_API_KEY: 'test-secret' },
    });
    expect(config.api.key).toBe('test-secret');
  });

  it('rejects unknown keys and bad values with every violation listed', async () => {
    await writeProjectConfig('api:\n  temperature: 5\nreview:\n  agents: []\n');

    expect(() => loadConfig(projectPath(), undefined, { userConfigPath, env: {} })).toThrow(
      ConfigError
    );
    const path = join(dir, 'project', '.revdoc', 'config.yaml');
    expect(() => readConfigFile(path)).toThrow('config must NOT have additional properties');
    expect(() => readConfigFile(path)).toThrow('config/api/temperature must be <= 2');
  });

  it('rejects an unknown output mode', async () => {
    await writeProjectConfig('output:\n  modes:\n    changelog: merge\n');

    expect(() => loadConfig(projectPath(), undefined, { userConfigPath, env: {} })).toThrow(
      'Invalid configuration'
    );
  });

  it('rejects malformed YAML', async () => {
    await writeProjectConfig('api: [unclosed\n');

    expect(() => loadConfig(projectPath(), undefined, { userConfigPath, env: {} })).toThrow(
      /Could not parse/
    );
  });

  it('rejects non-numeric and out-of-range environment values', () => {
    expect(() =>
      loadConfig(projectPath(), undefined, { userConfigPath, env: { REVDOC_MAX_TOKENS: 'lots' } })
    ).toThrow('REVDOC_MAX_TOKENS must be a number, got "lots"');
    expect(() =>
      loadConfig(projectPath(), undefined, { userConfigPath, env: { REVDOC_TEMPERATURE: '3' } })
    ).toThrow(ConfigError);
  });

  it('treats an empty file as no configuration', async () => {
    await writeProjectConfig('');

    expect(loadConfig(projectPath(), undefined, { userConfigPath, env: {} }).api.model).toBe(
      'gpt-4o-mini'
    );
  });

  it('temperatureFor prefers the configured value', () => {
    const config = loadConfig(projectPath(), undefined, { userConfigPath, env: {} });
    expect(temperatureFor(config, 0.7)).toBe(0.7);
    config.api.temperature = 0.1;
    expect(temperatureFor(config, 0.7)).toBe(0.1);
  });
});
