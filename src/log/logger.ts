/**
 * Structured logging for IAM operations. The client never logs request bodies,
 * since they can carry passwords and credentials.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/** Fields attached to a log line. */
export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Console-based logger with structured output
 */
export class ConsoleLogger implements Logger {
  #minLevel: LogLevel;

  constructor(minLevel: LogLevel = 'info') {
    this.#minLevel = minLevel;
  }

  error(message: string, context?: LogContext): void {
    this.#log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.#log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.#log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.#log('debug', message, context);
  }

  #log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.#minLevel]) {
      return;
    }

    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';
    const line = `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'debug':
        console.debug(line);
        break;
      default:
        console.log(line);
    }
  }
}

/**
 * Logger that drops everything. Default when no logger is configured.
 */
export class NoopLogger implements Logger {
  error(_message: string, _context?: LogContext): void {}

  warn(_message: string, _context?: LogContext): void {}

  info(_message: string, _context?: LogContext): void {}

  debug(_message: string, _context?: LogContext): void {}
}
