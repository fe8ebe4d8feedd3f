/**
 * Error kinds surfaced by the documentation pipeline.
 *
 * Every fatal error carries the exit code the CLI terminates with, so scripts
 * can tell a bad revision from a failed model call or an unwritable file.
 * `CacheError` is the exception: it is only ever logged.
 */

export const EXIT_CODES = {
  success: 0,
  general: 1,
  template: 2,
  revision: 3,
  config: 4,
  summarization: 5,
  output: 6,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export class RevdocError extends Error {
  readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode = EXIT_CODES.general, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RevdocError';
    this.exitCode = exitCode;
  }
}

/** A revision expression that cannot be parsed or does not resolve. */
export class RevisionError extends RevdocError {
  constructor(
    readonly revision: string,
    detail: string,
    options?: ErrorOptions
  ) {
    super(`Invalid revision "${revision}": ${detail}`, EXIT_CODES.revision, options);
    this.name = 'RevisionError';
  }
}

/** The summarization client failed on every attempt. */
export class SummarizationError extends RevdocError {
  constructor(
    readonly target: string,
    readonly attempts: number,
    options?: ErrorOptions
  ) {
    const cause = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(
      `Summarization failed for ${target} after ${attempts} attempt(s)${cause}`,
      EXIT_CODES.summarization,
      options
    );
    this.name = 'SummarizationError';
  }
}

/** Unreadable or unwritable cache entry. Recovered locally as a cache miss. */
export class CacheError extends RevdocError {
  constructor(
    readonly entryPath: string,
    detail: string,
    options?: ErrorOptions
  ) {
    super(`Cache entry ${entryPath} ${detail}`, EXIT_CODES.general, options);
    this.name = 'CacheError';
  }
}

/** The target document cannot be read or written. */
export class OutputError extends RevdocError {
  constructor(
    readonly path: string,
    detail: string,
    options?: ErrorOptions
  ) {
    super(`Cannot write ${path}: ${detail}`, EXIT_CODES.output, options);
    this.name = 'OutputError';
  }
}

export class TemplateError extends RevdocError {
  constructor(
    readonly template: string,
    detail: string,
    options?: ErrorOptions
  ) {
    super(`Template ${template}: ${detail}`, EXIT_CODES.template, options);
    this.name = 'TemplateError';
  }
}

export class ConfigError extends RevdocError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, EXIT_CODES.config, options);
    this.name = 'ConfigError';
  }
}

/**
 * Map anything thrown to the exit code the CLI should use.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof RevdocError) {
    return error.exitCode;
  }
  return EXIT_CODES.general;
}

/**
 * Message for the user: the error's own message, never a stack.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Node's system errors carry a string `code` (ENOENT, EACCES, ...).
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
