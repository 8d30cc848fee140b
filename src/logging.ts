/**
 * Console logging.
 *
 * `Logger` is the interface every component takes; `createLogger` gives the
 * console-backed implementation configured from `logging` settings.
 */

import { LoggingConfigSchema, type LogLevel, type LoggingConfig } from './types/config.js';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

const consoleSink: LogSink = {
  out: line => console.log(line),
  err: line => console.error(line),
};

/**
 * Structured fields attached as the first extra argument are flattened into
 * JSON lines (`{ event: 'step_start', step: 'double' }`).
 */
export type LogFields = Record<string, string | number | boolean | undefined>;

function isLogFields(value: unknown): value is LogFields {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.message;
  }
  if (typeof arg === 'string') {
    return arg;
  }
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

export function createLogger(scope: string, config: Partial<LoggingConfig> = {}, sink: LogSink = consoleSink): Logger {
  const settings = LoggingConfigSchema.parse(config);
  const threshold = LEVEL_ORDER[settings.level];

  const write = (level: LogLevel, message: string, args: unknown[]): void => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    const [first, ...rest] = args;
    const fields = isLogFields(first) ? first : undefined;
    const extra = fields ? rest : args;

    let line: string;
    if (settings.format === 'json') {
      line = JSON.stringify({
        level,
        ts: new Date().toISOString(),
        scope,
        event: 'log',
        message: [message, ...extra.map(formatArg)].join(' '),
        ...fields,
      });
    } else {
      const ts = settings.showTimestamps ? `[${new Date().toISOString()}] ` : '';
      const suffix = extra.length > 0 ? ` ${extra.map(formatArg).join(' ')}` : '';
      line = `${ts}[${level.toUpperCase()}] [${scope}] ${message}${suffix}`;
    }

    if (level === 'error' || level === 'warn') {
      sink.err(line);
    } else {
      sink.out(line);
    }
  };

  return {
    debug: (message, ...args) => write('debug', message, args),
    info: (message, ...args) => write('info', message, args),
    warn: (message, ...args) => write('warn', message, args),
    error: (message, ...args) => write('error', message, args),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Lifecycle events of a single step.
 */
export class StepLogger {
  private startedAt = 0;

  constructor(
    private readonly stepName: string,
    private readonly logger: Logger
  ) {}

  start(): void {
    this.startedAt = Date.now();
    this.logger.info(`Step '${this.stepName}' started`, { event: 'step_start', step: this.stepName });
  }

  complete(): number {
    const duration = this.elapsedSeconds();
    this.logger.info(`Step '${this.stepName}' completed in ${duration.toFixed(3)}s (status=success)`, {
      event: 'step_complete',
      step: this.stepName,
      duration,
      status: 'success',
    });
    return duration;
  }

  fail(error: unknown): number {
    const duration = this.elapsedSeconds();
    this.logger.error(
      `Step '${this.stepName}' failed after ${duration.toFixed(3)}s`,
      { event: 'step_fail', step: this.stepName, duration, status: 'failed' },
      error
    );
    return duration;
  }

  private elapsedSeconds(): number {
    return this.startedAt === 0 ? 0 : (Date.now() - this.startedAt) / 1000;
  }
}

/**
 * Progress of one fan-out wave, reported every `interval` percent.
 */
export class FanOutProgressLogger {
  private completed = 0;
  private failed = 0;
  private lastReported = -1;
  private startedAt = 0;

  constructor(
    private readonly stepName: string,
    private readonly total: number,
    private readonly logger: Logger,
    private readonly interval = 10
  ) {}

  start(): void {
    this.startedAt = Date.now();
    this.logger.info(`Fan-out '${this.stepName}' started (${this.total} items)`, {
      event: 'map_start',
      step: this.stepName,
      total: this.total,
    });
  }

  update(status: 'completed' | 'failed'): void {
    if (status === 'completed') {
      this.completed += 1;
    } else {
      this.failed += 1;
    }

    const done = this.completed + this.failed;
    const percent = this.total > 0 ? Math.floor((100 * done) / this.total) : 100;
    if (percent >= this.lastReported + this.interval || done === this.total) {
      this.lastReported = percent;
      this.report(percent);
    }
  }

  complete(): void {
    const duration = this.startedAt === 0 ? 0 : (Date.now() - this.startedAt) / 1000;
    this.logger.info(`Fan-out '${this.stepName}' completed in ${duration.toFixed(3)}s`, {
      event: 'map_complete',
      step: this.stepName,
      duration,
      total: this.total,
      completed: this.completed,
      failed: this.failed,
    });
  }

  get progress(): { completed: number; failed: number; total: number } {
    return { completed: this.completed, failed: this.failed, total: this.total };
  }

  private report(percent: number): void {
    const width = 20;
    const filled = this.total > 0 ? Math.floor((width * (this.completed + this.failed)) / this.total) : width;
    const bar = '='.repeat(filled) + '>' + ' '.repeat(width - filled);
    this.logger.info(`  [${bar}] ${this.completed}/${this.total} (${percent}%)`, {
      event: 'map_progress',
      step: this.stepName,
      total: this.total,
      completed: this.completed,
      failed: this.failed,
    });
  }
}
