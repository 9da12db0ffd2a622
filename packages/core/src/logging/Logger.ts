/**
 * Logger - Lightweight leveled logging for handlerkit
 *
 * Usage:
 *   const logger = createLogger('debug');
 *   logger.debug('Synthesized registry', { system: 'World', handlers: 2 });
 *
 * Synthesis, schema loading and the runtime Registry take an optional
 * Logger; without one they stay silent.
 */

export type LogLevel = 'silent' | 'errors' | 'warnings' | 'info' | 'debug';

export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  trace(message: string, context?: Record<string, unknown>): void;
}

/**
 * Log level priorities (higher = more verbose)
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

export const LOG_LEVELS: readonly string[] = Object.keys(LOG_LEVEL_PRIORITY);

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

type ConsoleMethod = 'error' | 'warn' | 'info' | 'debug';

/**
 * Safe JSON stringify that handles circular references
 */
function safeStringify(obj: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }
    return value;
  });
}

export function formatMessage(message: string, context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  try {
    return `${message} ${safeStringify(context)}`;
  } catch {
    return `${message} [context serialization failed]`;
  }
}

/**
 * Console-based Logger. Methods below the threshold are no-ops.
 */
export class ConsoleLogger implements Logger {
  private readonly priority: number;

  constructor(logLevel: LogLevel = 'info') {
    this.priority = LOG_LEVEL_PRIORITY[logLevel];
  }

  private emit(
    required: LogLevel,
    method: ConsoleMethod,
    tag: string,
    message: string,
    context?: Record<string, unknown>
  ): void {
    if (this.priority < LOG_LEVEL_PRIORITY[required]) return;
    console[method](formatMessage(`[${tag}] ${message}`, context));
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.emit('errors', 'error', 'ERROR', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit('warnings', 'warn', 'WARN', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit('info', 'info', 'INFO', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit('debug', 'debug', 'DEBUG', message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.emit('debug', 'debug', 'TRACE', message, context);
  }
}

export function createLogger(level: LogLevel): Logger {
  return new ConsoleLogger(level);
}

/** Logger used when a caller passes none */
export const silentLogger: Logger = new ConsoleLogger('silent');
