/**
 * Structured logging for the training action.
 *
 * Loggers are constructed once by the entry point and passed to each
 * component; components derive a scoped logger with {@link Logger.child}.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
  /**
   * Returns a logger that adds `context` to every entry.
   */
  child(context: LogContext): Logger;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Destination for formatted log lines. Defaults to the console.
 */
export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'debug':
    case 'trace':
      console.debug(line);
      break;
    default:
      console.log(line);
  }
};

/**
 * Console-based logger with structured output
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly bindings: LogContext;
  private readonly sink: LogSink;

  constructor(minLevel: LogLevel = 'info', bindings: LogContext = {}, sink: LogSink = consoleSink) {
    this.minLevel = minLevel;
    this.bindings = bindings;
    this.sink = sink;
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.log('trace', message, context);
  }

  child(context: LogContext): Logger {
    return new ConsoleLogger(this.minLevel, { ...this.bindings, ...context }, this.sink);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const merged = { ...this.bindings, ...context };
    const timestamp = new Date().toISOString();
    const contextStr = Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged)}` : '';

    this.sink(level, `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`);
  }
}

/**
 * Logger that discards everything. Used by tests and library consumers
 * that bring no logger of their own.
 */
export class NoopLogger implements Logger {
  error(_message: string, _context?: LogContext): void {
    // No-op
  }

  warn(_message: string, _context?: LogContext): void {
    // No-op
  }

  info(_message: string, _context?: LogContext): void {
    // No-op
  }

  debug(_message: string, _context?: LogContext): void {
    // No-op
  }

  trace(_message: string, _context?: LogContext): void {
    // No-op
  }

  child(_context: LogContext): Logger {
    return this;
  }
}

/**
 * Picks the log level from the runner's debug switches.
 */
export function logLevelFromEnv(env: NodeJS.ProcessEnv): LogLevel {
  if (env.RUNNER_DEBUG === '1' || env.ACTIONS_RUNNER_DEBUG?.toLowerCase() === 'true') {
    return 'debug';
  }
  return 'info';
}
