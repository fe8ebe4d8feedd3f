/**
 * Writes generated payloads into target documents.
 *
 * Modes:
 *   none       nothing is written; the payload comes back for display
 *   overwrite  the file becomes the payload
 *   append     original content, then the payload
 *   prepend    the payload, then the original content
 *   update     replace the body of the `## <version>` section, or prepend a
 *              new section when there is none
 *   auto       one of the above, from the document-type table
 *
 * Sections are delimited by H1/H2 headings outside fenced code blocks. In
 * update mode everything outside the replaced body is kept byte for byte,
 * and repeating an update with the same payload changes nothing.
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { writeFileAtomic } from './atomic-write.js';
import type { GeneratedPayload } from './document-assembler.js';
import {
  DOCUMENT_PROFILES,
  resolveOutputMode,
  type ConcreteOutputMode,
  type OutputMode,
} from './document-types.js';
import { OutputError, errnoCode } from './errors.js';
import { getLogger, type Logger } from './logger.js';

export type FileOutputMode = Exclude<ConcreteOutputMode, 'none'>;

export type SectionAction = 'replaced' | 'inserted';

export type WriteOutcome =
  | { written: false; mode: 'none'; content: string }
  | {
      written: true;
      mode: FileOutputMode;
      path: string;
      created: boolean;
      content: string;
      section?: SectionAction;
    };

export interface MergeResult {
  content: string;
  section?: SectionAction;
}

interface ScannedLine {
  text: string;
  start: number;
  /** Offset just past the line's newline, or the end of the document */
  end: number;
  terminated: boolean;
  inFence: boolean;
}

const FENCE = /^\s*(```|~~~)/;
const SECTION_BOUNDARY = /^#{1,2}\s/;
const TITLE = /^#\s/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function versionHeaderPattern(version: string, levels = '##'): RegExp {
  return new RegExp(`^${levels}\\s+\\[?${escapeRegExp(version)}\\]?(?=\\s|$)`);
}

/**
 * Split into lines with offsets, marking lines inside fenced code blocks
 * (fence lines themselves count as inside).
 */
export function scanLines(content: string): ScannedLine[] {
  const lines: ScannedLine[] = [];
  let inFence = false;
  let start = 0;

  while (start < content.length) {
    const newline = content.indexOf('\n', start);
    const terminated = newline !== -1;
    const end = terminated ? newline + 1 : content.length;
    const text = content.slice(start, terminated ? newline : end).replace(/\r$/, '');

    const isFence = FENCE.test(text);
    lines.push({ text, start, end, terminated, inFence: inFence || isFence });
    if (isFence) inFence = !inFence;
    start = end;
  }
  return lines;
}

/**
 * Turn a payload into a section body: drop a leading heading that repeats
 * the version and demote H1/H2 headings to H3 so the body can never end its
 * own section early.
 */
export function formatSectionBody(text: string, version: string): string {
  const lines = text.trim().split('\n');
  if (lines.length > 0 && versionHeaderPattern(version, '#{1,2}').test(lines[0] ?? '')) {
    lines.shift();
  }

  let inFence = false;
  const body = lines.map((line) => {
    if (FENCE.test(line)) {
      inFence = !inFence;
      return line;
    }
    return !inFence && SECTION_BOUNDARY.test(line) ? line.replace(/^#{1,2}/, '###') : line;
  });
  return body.join('\n').trim();
}

export function normalizePayload(text: string): string {
  return `${text.trim()}\n`;
}

export function appendContent(existing: string | undefined, payload: string): string {
  const text = normalizePayload(payload);
  if (!existing) return text;
  return existing.endsWith('\n') ? existing + text : `${existing}\n${text}`;
}

export function prependContent(existing: string | undefined, payload: string): string {
  const text = normalizePayload(payload);
  return existing ? text + existing : text;
}

/**
 * Replace or insert the section for `version`.
 */
export function updateSection(
  existing: string | undefined,
  payload: string,
  version: string,
  title?: string
): MergeResult {
  const body = formatSectionBody(payload, version);
  const header = `## ${version}`;

  if (existing === undefined || existing.trim() === '') {
    const heading = title ? `# ${title}\n\n` : '';
    return { content: `${heading}${header}\n\n${body}\n`, section: 'inserted' };
  }

  const lines = scanLines(existing);
  const pattern = versionHeaderPattern(version);
  const match = lines.findIndex((line) => !line.inFence && pattern.test(line.text));

  if (match !== -1) {
    const headerLine = lines[match];
    const next = lines.find(
      (line, index) => index > match && !line.inFence && SECTION_BOUNDARY.test(line.text)
    );
    const bodyStart = headerLine.end;
    const bodyEnd = next ? next.start : existing.length;

    let replacement = `\n${body}\n${next ? '\n' : ''}`;
    if (!headerLine.terminated) {
      replacement = `\n${replacement}`;
    }
    return {
      content: existing.slice(0, bodyStart) + replacement + existing.slice(bodyEnd),
      section: 'replaced',
    };
  }

  // No section yet: insert after a leading "# Title" block, else at the top.
  let insertAt = 0;
  const first = lines.findIndex((line) => line.text.trim() !== '');
  const firstLine = lines[first];
  if (firstLine && !firstLine.inFence && TITLE.test(firstLine.text)) {
    let index = first + 1;
    while (index < lines.length && lines[index]?.text.trim() === '') {
      index++;
    }
    insertAt = lines[index]?.start ?? existing.length;
  }

  const before = existing.slice(0, insertAt);
  const after = existing.slice(insertAt);
  let separator = '';
  if (before.length > 0) {
    separator = before.endsWith('\n\n') ? '' : before.endsWith('\n') ? '\n' : '\n\n';
  }
  const section = `${header}\n\n${body}\n${after.length > 0 ? '\n' : ''}`;

  return { content: before + separator + section + after, section: 'inserted' };
}

/**
 * Pure merge of a payload into existing content for a file-writing mode.
 */
export function mergeContent(
  existing: string | undefined,
  payload: GeneratedPayload,
  mode: FileOutputMode,
  title?: string
): MergeResult {
  switch (mode) {
    case 'overwrite':
      return { content: normalizePayload(payload.text) };
    case 'append':
      return { content: appendContent(existing, payload.text) };
    case 'prepend':
      return { content: prependContent(existing, payload.text) };
    case 'update':
      return updateSection(existing, payload.text, payload.version, title);
  }
}

export interface MergeOptions {
  /** Whether the path was named explicitly; picks the auto-mode column */
  explicitFile?: boolean;
  /** Title for a new document; defaults to the document type's */
  title?: string;
}

export class SectionMerger {
  private readonly logger: Logger;

  constructor(logger: Logger = getLogger()) {
    this.logger = logger.child({ component: 'merger' });
  }

  async merge(
    path: string | undefined,
    payload: GeneratedPayload,
    mode: OutputMode,
    options: MergeOptions = {}
  ): Promise<WriteOutcome> {
    const concrete = resolveOutputMode(
      mode,
      payload.documentType,
      options.explicitFile ?? path !== undefined
    );

    if (concrete === 'none') {
      return { written: false, mode: 'none', content: normalizePayload(payload.text) };
    }
    if (path === undefined) {
      this.logger.debug(`No target file for "${concrete}"; printing instead`);
      return { written: false, mode: 'none', content: normalizePayload(payload.text) };
    }

    const target = resolve(path);
    const existing = await this.read(target);
    const title = options.title ?? DOCUMENT_PROFILES[payload.documentType].title;
    const merged = mergeContent(existing, payload, concrete, title);

    if (existing === merged.content) {
      this.logger.debug(`${target} already up to date`);
    }

    try {
      await writeFileAtomic(target, merged.content);
    } catch (error) {
      throw new OutputError(target, errnoCode(error) ?? String(error), { cause: error });
    }

    this.logger.debug(`Wrote ${target} (${concrete})`, { documentType: payload.documentType });
    return {
      written: true,
      mode: concrete,
      path: target,
      created: existing === undefined,
      content: merged.content,
      section: merged.section,
    };
  }

  private async read(target: string): Promise<string | undefined> {
    try {
      return await readFile(target, 'utf-8');
    } catch (error) {
      const code = errnoCode(error);
      if (code === 'ENOENT') {
        return undefined;
      }
      throw new OutputError(target, `existing file is unreadable (${code ?? String(error)})`, {
        cause: error,
      });
    }
  }
}
