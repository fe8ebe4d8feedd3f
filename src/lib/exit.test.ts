import { describe, it, expect, afterEach, vi } from 'vitest';
import { ConfigError, OutputError, RevisionError } from './errors.js';
import { exitProcess, setExitHandler, installTestExitHandler, ExitError, failWith } from './exit.js';

function recordingHandler(codes: number[], scale = 1) {
  return (code: number): never => {
    codes.push(code * scale);
    throw new ExitError(code);
  };
}

describe('exit', () => {
  let restore: (() => void) | undefined;

  afterEach(() => {
    restore?.();
    restore = undefined;
  });

  describe('exitProcess', () => {
    it('calls the installed handler with the exit code', () => {
      const codes: number[] = [];
      restore = setExitHandler(recordingHandler(codes));

      expect(() => exitProcess(1)).toThrow(ExitError);
      expect(() => exitProcess(0)).toThrow(ExitError);
      expect(codes).toEqual([1, 0]);
    });
  });

  describe('setExitHandler', () => {
    it('returns a restore function that reverts to previous handler', () => {
      const codes: number[] = [];
      const first = setExitHandler(recordingHandler(codes));
      const second = setExitHandler(recordingHandler(codes, 10));

      expect(() => exitProcess(1)).toThrow(ExitError);
      expect(codes).toEqual([10]);

      second();
      expect(() => exitProcess(2)).toThrow(ExitError);
      expect(codes).toEqual([10, 2]);

      first();
    });
  });

  describe('installTestExitHandler', () => {
    it('throws ExitError with the exit code', () => {
      restore = installTestExitHandler();

      expect(() => exitProcess(1)).toThrow('process.exit(1)');
    });
  });

  describe('ExitError', () => {
    it('carries name, code and message', () => {
      const err = new ExitError(127);
      expect(err).toBeInstanceOf(Error);
      expect(err.name).toBe('ExitError');
      expect(err.code).toBe(127);
      expect(err.message).toBe('process.exit(127)');
    });
  });

  describe('failWith', () => {
    function exitCodeOf(error: unknown): number | undefined {
      try {
        failWith(error);
      } catch (caught) {
        if (caught instanceof ExitError) return caught.code;
        throw caught;
      }
      return undefined;
    }

    it('prints the message and exits with the code for the error kind', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      restore = installTestExitHandler();

      expect(exitCodeOf(new RevisionError('main..nope', 'unknown revision'))).toBe(3);
      expect(exitCodeOf(new ConfigError('bad config'))).toBe(4);
      expect(exitCodeOf(new OutputError('/tmp/CHANGELOG.md', 'EACCES'))).toBe(6);
      expect(exitCodeOf(new Error('boom'))).toBe(1);
      expect(exitCodeOf('plain string')).toBe(1);

      expect(errorSpy.mock.calls[0]?.[1]).toBe(
        'Invalid revision "main..nope": unknown revision'
      );
      expect(errorSpy.mock.calls.at(-1)?.[1]).toBe('plain string');
    });
  });
});
