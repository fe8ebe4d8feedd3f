import { describe, it, expect } from 'vitest';
import {
  CacheError,
  ConfigError,
  EXIT_CODES,
  OutputError,
  RevdocError,
  RevisionError,
  SummarizationError,
  TemplateError,
  describeError,
  errnoCode,
  exitCodeFor,
} from './errors.js';

describe('errors', () => {
  it('names the offending input in each message', () => {
    expect(new RevisionError('v1..v9', 'unknown revision').message).toBe(
      'Invalid revision "v1..v9": unknown revision'
    );
    expect(new OutputError('/repo/CHANGELOG.md', 'EACCES').message).toBe(
      'Cannot write /repo/CHANGELOG.md: EACCES'
    );
    expect(new TemplateError('missing.md', 'not found').message).toBe(
      'Template missing.md: not found'
    );
    expect(new CacheError('/cache/abc.md', 'is unreadable (EISDIR)').message).toBe(
      'Cache entry /cache/abc.md is unreadable (EISDIR)'
    );
  });

  it('includes the last failure in a SummarizationError', () => {
    const error = new SummarizationError('commit def5678', 3, {
      cause: new Error('503 Service Unavailable'),
    });

    expect(error.message).toBe(
      'Summarization failed for commit def5678 after 3 attempt(s): 503 Service Unavailable'
    );
    expect(error.target).toBe('commit def5678');
    expect(error.attempts).toBe(3);
    expect(error.cause).toBeInstanceOf(Error);
  });

  it('maps every error kind to its exit code', () => {
    expect(exitCodeFor(new TemplateError('x', 'y'))).toBe(EXIT_CODES.template);
    expect(exitCodeFor(new RevisionError('x', 'y'))).toBe(EXIT_CODES.revision);
    expect(exitCodeFor(new ConfigError('x'))).toBe(EXIT_CODES.config);
    expect(exitCodeFor(new SummarizationError('x', 3))).toBe(EXIT_CODES.summarization);
    expect(exitCodeFor(new OutputError('x', 'y'))).toBe(EXIT_CODES.output);
    expect(exitCodeFor(new RevdocError('x'))).toBe(EXIT_CODES.general);
    expect(exitCodeFor(new TypeError('x'))).toBe(EXIT_CODES.general);
    expect(exitCodeFor(undefined)).toBe(EXIT_CODES.general);
  });

  it('keeps the class hierarchy', () => {
    const error = new ConfigError('bad');
    expect(error).toBeInstanceOf(RevdocError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ConfigError');
  });

  it('describeError returns the message without a stack', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError(42)).toBe('42');
  });

  it('errnoCode reads system error codes', () => {
    const error = Object.assign(new Error('no such file'), { code: 'ENOENT' });
    expect(errnoCode(error)).toBe('ENOENT');
    expect(errnoCode(new Error('plain'))).toBeUndefined();
    expect(errnoCode('ENOENT')).toBeUndefined();
  });
});
