import { describe, expect, it } from 'vitest';
import {
  DOCUMENT_PROFILES,
  isDocumentType,
  isOutputMode,
  resolveOutputMode,
} from './document-types.js';

describe('resolveOutputMode', () => {
  it.each([
    ['changelog', false, 'update'],
    ['changelog', true, 'update'],
    ['release-notes', false, 'overwrite'],
    ['announcement', false, 'overwrite'],
    ['message', false, 'none'],
    ['message', true, 'overwrite'],
    ['summary', false, 'none'],
    ['summary', true, 'overwrite'],
    ['document', false, 'none'],
    ['document', true, 'overwrite'],
  ] as const)('auto for %s (explicit file: %s) is %s', (type, explicitFile, expected) => {
    expect(resolveOutputMode('auto', type, explicitFile)).toBe(expected);
  });

  it('passes concrete modes through', () => {
    expect(resolveOutputMode('append', 'changelog', false)).toBe('append');
    expect(resolveOutputMode('none', 'release-notes', true)).toBe('none');
  });
});

describe('DOCUMENT_PROFILES', () => {
  it('uses factual temperatures for changelogs and release notes', () => {
    expect(DOCUMENT_PROFILES.changelog.temperature).toBe(0.7);
    expect(DOCUMENT_PROFILES['release-notes'].temperature).toBe(0.7);
    expect(DOCUMENT_PROFILES.message.temperature).toBe(0.9);
  });

  it('has a non-empty empty-range payload for every type', () => {
    for (const profile of Object.values(DOCUMENT_PROFILES)) {
      expect(profile.emptyPayload.trim()).not.toBe('');
    }
  });
});

describe('guards', () => {
  it('recognizes document types and output modes', () => {
    expect(isDocumentType('release-notes')).toBe(true);
    expect(isDocumentType('readme')).toBe(false);
    expect(isOutputMode('prepend')).toBe(true);
    expect(isOutputMode('merge')).toBe(false);
  });
});
