/**
 * Structured Logger
 * One JSON object per line, one logger per component.
 *
 * Lines go to stderr by default so that command output on stdout stays
 * machine readable.
 */

import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Ordered from most to least verbose */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
  /** Correlates the lines written while handling one key press or command */
  requestId?: string;
  method?: string;
  url?: string;
  /** Elapsed time (ms) */
  duration?: number;
  statusCode?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

export interface LoggerConfig {
  /** default: 'warn' */
  minLevel?: LogLevel;
  /** Write to the console at all (default: true) */
  console?: boolean;
  /** Write every level to stderr (default: true); otherwise info/debug use stdout */
  stderr?: boolean;
  /** default: true */
  includeStack?: boolean;
}

type Metadata = Record<string, unknown>;

const CONSOLE_METHOD: Record<LogLevel, 'debug' | 'log' | 'warn' | 'error'> = {
  debug: 'debug',
  info: 'log',
  warn: 'warn',
  error: 'error',
};

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function describeError(error: unknown, includeStack: boolean): LogEntry['error'] {
  if (error === undefined || error === null) return undefined;
  if (!(error instanceof Error)) return { name: 'Error', message: String(error) };

  return {
    name: error.name,
    message: error.message,
    code: 'code' in error && typeof error.code === 'string' ? error.code : undefined,
    stack: includeStack ? error.stack : undefined,
  };
}

export class StructuredLogger {
  private readonly component: string;
  private minLevel: LogLevel;
  private readonly enabled: boolean;
  private readonly stderrOnly: boolean;
  private readonly includeStack: boolean;

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.minLevel = config.minLevel ?? 'warn';
    this.enabled = config.console !== false;
    this.stderrOnly = config.stderr !== false;
    this.includeStack = config.includeStack !== false;
  }

  debug(message: string, context?: LogContext, metadata?: Metadata): void {
    this.write({ level: 'debug', message, context, metadata });
  }

  info(message: string, context?: LogContext, metadata?: Metadata): void {
    this.write({ level: 'info', message, context, metadata });
  }

  warn(message: string, context?: LogContext, metadata?: Metadata): void {
    this.write({ level: 'warn', message, context, metadata });
  }

  /** `error` may be anything thrown; non-Error values are stringified */
  error(message: string, error?: unknown, context?: LogContext, metadata?: Metadata): void {
    this.write({ level: 'error', message, context, metadata }, error);
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }

  /**
   * Runs an async operation and logs its outcome and duration.
   * Errors are logged and rethrown.
   */
  async trackAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Omit<LogContext, 'duration'>
  ): Promise<T> {
    const startedAt = Date.now();
    const elapsed = () => ({ ...context, duration: Date.now() - startedAt });

    try {
      const result = await fn();
      this.debug(`${operation} completed`, elapsed());
      return result;
    } catch (error) {
      this.error(`${operation} failed`, error, elapsed());
      throw error;
    }
  }

  private write(
    fields: Pick<LogEntry, 'level' | 'message' | 'context' | 'metadata'>,
    error?: unknown
  ): void {
    if (!this.enabled) return;
    if (LOG_LEVELS.indexOf(fields.level) < LOG_LEVELS.indexOf(this.minLevel)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: fields.level,
      message: fields.message,
      component: this.component,
      context: fields.context,
      metadata: fields.metadata,
    };
    const described = describeError(error, this.includeStack);
    if (described) entry.error = described;

    const line = JSON.stringify(entry);
    if (this.stderrOnly) {
      console.error(line);
    } else {
      console[CONSOLE_METHOD[fields.level]](line);
    }
  }
}

/**
 * Component loggers
 */
export const loggers = {
  auth: new StructuredLogger('Auth'),
  api: new StructuredLogger('API'),
  action: new StructuredLogger('Action'),
  monitor: new StructuredLogger('Monitor'),
  plugin: new StructuredLogger('Plugin'),
  cli: new StructuredLogger('CLI'),
};

export function setLogLevel(level: LogLevel): void {
  for (const logger of Object.values(loggers)) {
    logger.setMinLevel(level);
  }
}

export function createRequestId(): string {
  return randomUUID();
}
