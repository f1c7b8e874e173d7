/**
 * Structured Logger
 * JSON-line logs written to stderr so stdout stays machine-readable.
 * Features:
 *   - level filtering (global override through MIXTAPE_LOG_LEVEL)
 *   - requestId correlation
 *   - duration tracking
 *   - error stack capture
 */

import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogContext {
  /** Correlates every line of one logical request */
  requestId?: string;
  method?: string;
  url?: string;
  /** Elapsed time (ms) */
  duration?: number;
  statusCode?: number;
  attempt?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: Exclude<LogLevel, 'silent'>;
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
  /** Minimum level (default: 'warn') */
  minLevel?: LogLevel;
  /** Line sink (default: process.stderr) */
  write?: (line: string) => void;
  formatter?: (entry: LogEntry) => string;
  /** Include stack traces (default: true) */
  includeStack?: boolean;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

// Process-wide override; set by the CLI (--verbose) or MIXTAPE_LOG_LEVEL.
let globalMinLevel: LogLevel | undefined = readEnvLevel();

function readEnvLevel(): LogLevel | undefined {
  const value = process.env.MIXTAPE_LOG_LEVEL;
  return value && isLogLevel(value) ? value : undefined;
}

export function setGlobalLogLevel(level: LogLevel | undefined): void {
  globalMinLevel = level;
}

export function getGlobalLogLevel(): LogLevel | undefined {
  return globalMinLevel;
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class StructuredLogger {
  private component: string;
  private config: Required<LoggerConfig>;

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.config = {
      minLevel: config.minLevel ?? 'warn',
      write: config.write ?? ((line: string) => process.stderr.write(line + '\n')),
      formatter: config.formatter ?? ((entry: LogEntry) => JSON.stringify(entry)),
      includeStack: config.includeStack !== false,
    };
  }

  private shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
    const minLevel = globalMinLevel ?? this.config.minLevel;
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
  }

  private output(entry: LogEntry): void {
    this.config.write(this.config.formatter(entry));
  }

  debug(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    this.log('debug', message, context, metadata);
  }

  info(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    this.log('info', message, context, metadata);
  }

  warn(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    this.log('warn', message, context, metadata);
  }

  error(
    message: string,
    error?: Error | null,
    context?: LogContext,
    metadata?: Record<string, unknown>
  ): void {
    if (!this.shouldLog('error')) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: 'error',
      message,
      component: this.component,
      context,
      metadata,
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        code: errorCode(error),
        stack: this.config.includeStack ? error.stack : undefined,
      };
    }

    this.output(entry);
  }

  private log(
    level: Exclude<LogLevel, 'silent' | 'error'>,
    message: string,
    context?: LogContext,
    metadata?: Record<string, unknown>
  ): void {
    this.output({
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
      context,
      metadata,
    });
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  /**
   * Run an async operation and log its outcome with the elapsed time
   */
  async trackAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Omit<LogContext, 'duration'>
  ): Promise<T> {
    const startTime = Date.now();

    try {
      const result = await fn();
      this.info(`${operation} completed`, { ...context, duration: Date.now() - startTime });
      return result;
    } catch (error) {
      this.error(
        `${operation} failed`,
        error instanceof Error ? error : new Error(String(error)),
        { ...context, duration: Date.now() - startTime }
      );
      throw error;
    }
  }
}

/**
 * One logger per component so output can be filtered by service
 */
export const loggers = {
  api: new StructuredLogger('API'),
  auth: new StructuredLogger('Auth'),
  store: new StructuredLogger('CredentialStore'),
  rateLimit: new StructuredLogger('RateLimit'),
  retry: new StructuredLogger('Retry'),
  batch: new StructuredLogger('Batch'),
  login: new StructuredLogger('Login'),
};

export function generateRequestId(): string {
  return randomUUID();
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}
