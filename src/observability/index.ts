/**
 * Observability module: logging and upload progress reporting.
 * @module observability
 */

/**
 * Log levels, lowest first.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Logger interface.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Console logger implementation.
 */
export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly minLevel: LogLevel;

  constructor(options?: { prefix?: string; minLevel?: LogLevel }) {
    this.prefix = options?.prefix ?? '[pmsync]';
    this.minLevel = options?.minLevel ?? 'info';
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.minLevel);
  }

  private format(level: LogLevel, message: string, context?: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';
    return `${timestamp} ${this.prefix} [${level.toUpperCase()}] ${message}${contextStr}`;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      console.debug(this.format('debug', message, context));
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      console.info(this.format('info', message, context));
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      console.warn(this.format('warn', message, context));
    }
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      console.error(this.format('error', message, context));
    }
  }
}

/**
 * No-op logger for when logging is disabled.
 */
export class NoOpLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/**
 * Recorded log entry.
 */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly context?: Record<string, unknown>;
}

/**
 * In-memory logger for development/testing.
 */
export class InMemoryLogger implements Logger {
  private readonly entries: LogEntry[] = [];

  debug(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'debug', message, context });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'info', message, context });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'warn', message, context });
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'error', message, context });
  }

  /** Gets all recorded entries */
  getEntries(): readonly LogEntry[] {
    return [...this.entries];
  }

  /** Gets the messages logged at a level */
  messages(level: LogLevel): string[] {
    return this.entries.filter(e => e.level === level).map(e => e.message);
  }
}

/**
 * Progress reporting for long-running uploads.
 *
 * `slot` is a display row chosen round-robin by the caller; it carries no
 * ordering meaning.
 */
export interface ProgressReporter {
  start(label: string, totalBytes: number, slot: number): ProgressHandle;
}

/**
 * Handle for a single progress line.
 */
export interface ProgressHandle {
  advance(bytes: number): void;
  done(): void;
}

/**
 * No-op progress reporter.
 */
export class NoOpProgressReporter implements ProgressReporter {
  start(): ProgressHandle {
    return { advance(): void {}, done(): void {} };
  }
}

/**
 * Progress reporter that writes start/finish lines to a logger.
 */
export class LoggerProgressReporter implements ProgressReporter {
  constructor(private readonly logger: Logger) {}

  start(label: string, totalBytes: number, slot: number): ProgressHandle {
    const logger = this.logger;
    let transferred = 0;
    logger.debug(`${label}: started`, { totalBytes, slot });
    return {
      advance(bytes: number): void {
        transferred += bytes;
      },
      done(): void {
        logger.debug(`${label}: done`, { transferred, slot });
      },
    };
  }
}
