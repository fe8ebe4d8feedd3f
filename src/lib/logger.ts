/**
 * Leveled logging for revdoc, as coloured text or one JSON object per line.
 *
 * Logs go to stderr: stdout is reserved for generated documents so that
 * `revdoc message | git commit -F -` stays clean.
 */

import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFormat = 'human' | 'json';

export interface LogContext {
  /** Pipeline stage, e.g. 'cache', 'summarizer', 'merger' */
  component?: string;
  /** Commit id, or the synthetic id of working-tree/staged changes */
  commit?: string;
  documentType?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  data?: unknown;
}

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  level: LogLevel;
  format: LogFormat;
  timestamps: boolean;
  /** Human format only */
  colors: boolean;
  sink: LogSink;
}

type Paint = (text: string) => string;

const LEVEL_STYLE: Record<LogLevel, { icon: string; paint: Paint }> = {
  debug: { icon: '·', paint: chalk.gray },
  info: { icon: 'ℹ', paint: chalk.cyan },
  warn: { icon: '⚠', paint: chalk.yellow },
  error: { icon: '✖', paint: chalk.red },
};

const plain: Paint = (text) => text;

const stderrSink: LogSink = (line) => console.error(line);

/**
 * Lines for one entry in human format: the message, then any data indented
 * beneath it.
 */
export function formatHuman(
  entry: LogEntry,
  options: Pick<LoggerOptions, 'timestamps' | 'colors'>
): string[] {
  const dim = options.colors ? chalk.gray : plain;
  const { icon, paint } = LEVEL_STYLE[entry.level];

  const tags: string[] = [];
  if (options.timestamps) tags.push(dim(`[${entry.timestamp}]`));
  if (entry.context?.component) {
    tags.push((options.colors ? chalk.magenta : plain)(`[${entry.context.component}]`));
  }
  if (entry.context?.commit) {
    tags.push((options.colors ? chalk.cyan : plain)(`[${entry.context.commit}]`));
  }

  const lines = [[...tags, icon, (options.colors ? paint : plain)(entry.message)].join(' ')];
  if (entry.data !== undefined) {
    const text = typeof entry.data === 'string' ? entry.data : JSON.stringify(entry.data, null, 2);
    lines.push(dim(text.replace(/^/gm, '   ')));
  }
  return lines;
}

export class Logger {
  private readonly options: LoggerOptions;
  private readonly context: LogContext;

  constructor(options: Partial<LoggerOptions> = {}, context: LogContext = {}) {
    this.options = {
      level: options.level ?? 'info',
      format: options.format ?? 'human',
      timestamps: options.timestamps ?? false,
      colors: options.colors ?? true,
      sink: options.sink ?? stderrSink,
    };
    this.context = context;
  }

  /**
   * Logger with the same settings and extra context on every entry.
   */
  child(context: LogContext): Logger {
    return new Logger(this.options, { ...this.context, ...context });
  }

  enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.options.level);
  }

  debug(message: string, context?: LogContext, data?: unknown): void {
    this.write('debug', message, context, data);
  }

  info(message: string, context?: LogContext, data?: unknown): void {
    this.write('info', message, context, data);
  }

  warn(message: string, context?: LogContext, data?: unknown): void {
    this.write('warn', message, context, data);
  }

  error(message: string, context?: LogContext, data?: unknown): void {
    this.write('error', message, context, data);
  }

  cacheHit(commit: string): void {
    this.debug('Cache hit', { component: 'cache', commit });
  }

  cacheMiss(commit: string): void {
    this.debug('Cache miss', { component: 'cache', commit });
  }

  attemptFailed(target: string, attempt: number, attempts: number, reason: string): void {
    this.warn(`Attempt ${attempt}/${attempts} failed: ${reason}`, {
      component: 'summarizer',
      commit: target,
    });
  }

  private write(level: LogLevel, message: string, context?: LogContext, data?: unknown): void {
    if (!this.enabled(level)) {
      return;
    }

    const merged = { ...this.context, ...context };
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(Object.keys(merged).length > 0 ? { context: merged } : {}),
      ...(data !== undefined ? { data } : {}),
    };

    const lines =
      this.options.format === 'json' ? [JSON.stringify(entry)] : formatHuman(entry, this.options);
    for (const line of lines) {
      this.options.sink(line);
    }
  }
}

let defaultLogger = new Logger();

/** Replace the process-wide logger; the CLI calls this once from its flags. */
export function configureLogger(options: Partial<LoggerOptions>): void {
  defaultLogger = new Logger(options);
}

export function getLogger(): Logger {
  return defaultLogger;
}

export function createLogger(options: Partial<LoggerOptions> = {}): Logger {
  return new Logger(options);
}
