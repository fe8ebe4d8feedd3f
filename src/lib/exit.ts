/**
 * Process exit abstraction for testability.
 *
 * CLI code calls `exitProcess(code)` or `failWith(error)` instead of
 * `process.exit()`. Tests swap the handler with `installTestExitHandler()`
 * and assert on the code.
 */

import chalk from 'chalk';
import { describeError, exitCodeFor } from './errors.js';
import { getLogger } from './logger.js';

export type ExitHandler = (code: number) => never;

const defaultHandler: ExitHandler = (code: number) => process.exit(code);

let currentHandler: ExitHandler = defaultHandler;

export function exitProcess(code: number): never {
  return currentHandler(code);
}

/**
 * Replace the exit handler. Returns a restore function.
 */
export function setExitHandler(handler: ExitHandler): () => void {
  const previous = currentHandler;
  currentHandler = handler;
  return () => {
    currentHandler = previous;
  };
}

export class ExitError extends Error {
  constructor(public readonly code: number) {
    super(`process.exit(${code})`);
    this.name = 'ExitError';
  }
}

export function installTestExitHandler(): () => void {
  return setExitHandler((code: number) => {
    throw new ExitError(code);
  });
}

/**
 * Report a fatal error on stderr and exit with the code for its kind.
 * The stack is only shown at debug level.
 */
export function failWith(error: unknown): never {
  console.error(chalk.red('Error:'), describeError(error));
  if (error instanceof Error && error.stack) {
    getLogger().debug('Stack trace', {}, error.stack);
  }
  return exitProcess(exitCodeFor(error));
}
