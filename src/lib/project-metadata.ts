/**
 * Project title and version detection from the usual manifest files.
 *
 * Precedence: package.json, pyproject.toml, Cargo.toml, then VERSION or
 * version.txt for the version. The title falls back to the directory name,
 * the version to the latest git tag and finally to "Unreleased".
 */

import { existsSync, readFileSync } from 'fs';
import { basename, join, resolve } from 'path';
import { getLogger } from './logger.js';
import type { Repository } from './repository.js';

export const UNRELEASED = 'Unreleased';

export interface ProjectMetadata {
  title: string;
  version: string;
  branch: string;
  /** Revision expression the document covers */
  revision: string;
  rules?: string;
  example?: string;
}

interface ManifestInfo {
  title?: string;
  version?: string;
}

function readText(path: string): string | undefined {
  return existsSync(path) ? readFileSync(path, 'utf-8') : undefined;
}

function tomlString(content: string, key: string): string | undefined {
  const match = content.match(new RegExp(`^\\s*${key}\\s*=\\s*["']([^"']+)["']`, 'm'));
  return match?.[1];
}

function fromPackageJson(root: string): ManifestInfo {
  const content = readText(join(root, 'package.json'));
  if (!content) return {};
  try {
    const parsed: unknown = JSON.parse(content);
    if (!parsed || typeof parsed !== 'object') return {};
    const name = 'name' in parsed && typeof parsed.name === 'string' ? parsed.name : undefined;
    const version =
      'version' in parsed && typeof parsed.version === 'string' ? parsed.version : undefined;
    return { title: name, version };
  } catch {
    getLogger().debug(`Ignoring malformed ${join(root, 'package.json')}`);
    return {};
  }
}

function fromToml(root: string, file: string): ManifestInfo {
  const content = readText(join(root, file));
  if (!content) return {};
  return { title: tomlString(content, 'name'), version: tomlString(content, 'version') };
}

function fromVersionFile(root: string): ManifestInfo {
  for (const file of ['VERSION', 'version.txt']) {
    const content = readText(join(root, file))?.split('\n')[0]?.trim();
    if (content) return { version: content };
  }
  return {};
}

export function detectManifestInfo(projectDir: string): ManifestInfo {
  const root = resolve(projectDir);
  const sources = [
    fromPackageJson(root),
    fromToml(root, 'pyproject.toml'),
    fromToml(root, 'Cargo.toml'),
    fromVersionFile(root),
  ];
  return {
    title: sources.find((source) => source.title)?.title,
    version: sources.find((source) => source.version)?.version,
  };
}

export function stripTagPrefix(tag: string): string {
  return /^v\d/.test(tag) ? tag.slice(1) : tag;
}

export interface ResolveMetadataOptions {
  projectDir: string;
  revision: string;
  repository: Repository;
  title?: string;
  version?: string;
  rules?: string;
  example?: string;
}

/**
 * Metadata for the prompt templates. Explicit values win over detection.
 */
export async function resolveProjectMetadata(
  options: ResolveMetadataOptions
): Promise<ProjectMetadata> {
  const manifest = detectManifestInfo(options.projectDir);

  let version = options.version ?? manifest.version;
  if (!version) {
    const tag = await options.repository.latestTag();
    version = tag ? stripTagPrefix(tag) : UNRELEASED;
  }

  return {
    title: options.title ?? manifest.title ?? basename(resolve(options.projectDir)),
    version,
    branch: await options.repository.currentBranch(),
    revision: options.revision,
    rules: options.rules,
    example: options.example,
  };
}
