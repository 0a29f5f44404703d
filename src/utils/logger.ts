/**
 * Logger utility for the ingestor
 *
 * One process-wide instance shared by the source adapter, the batch writer,
 * the Kinesis backend and the scheduler. Each caller prefixes its messages
 * with its component tag (`[newsapi]`, `[writer]`, `[kinesis]`, `[scheduler]`).
 * The level starts from LOG_LEVEL and the runner overrides it from the
 * validated config; the scheduler only builds its per-tick article preview
 * when the level is `debug`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

interface LogMessage {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: unknown;
  error?: unknown;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LEVELS as string[]).includes(value);
}

class Logger {
  private logLevel: LogLevel;

  constructor() {
    // Default to 'info' if LOG_LEVEL env var is not set or unknown
    const fromEnv = process.env.LOG_LEVEL?.toLowerCase() ?? '';
    this.logLevel = isLogLevel(fromEnv) ? fromEnv : 'info';
  }

  get level(): LogLevel {
    return this.logLevel;
  }

  setLevel(level: LogLevel) {
    this.logLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  private formatLog(level: LogLevel, message: string, data?: unknown): LogMessage {
    return {
      level,
      message,
      timestamp: new Date().toISOString(),
      data
    };
  }

  private output(logMessage: LogMessage) {
    const { level, message, timestamp, data, error } = logMessage;
    const prefix = `[${timestamp}] [${level.toUpperCase()}]`;

    switch (level) {
      case 'debug':
        console.debug(prefix, message, data ?? '');
        break;
      case 'info':
        console.info(prefix, message, data ?? '');
        break;
      case 'warn':
        console.warn(prefix, message, data ?? '');
        break;
      case 'error':
        console.error(prefix, message, data ?? '', error ?? '');
        break;
    }
  }

  debug(message: string, data?: unknown) {
    if (this.shouldLog('debug')) {
      this.output(this.formatLog('debug', message, data));
    }
  }

  info(message: string, data?: unknown) {
    if (this.shouldLog('info')) {
      this.output(this.formatLog('info', message, data));
    }
  }

  warn(message: string, data?: unknown) {
    if (this.shouldLog('warn')) {
      this.output(this.formatLog('warn', message, data));
    }
  }

  error(message: string, error?: unknown, data?: unknown) {
    if (this.shouldLog('error')) {
      const logMessage = this.formatLog('error', message, data);
      logMessage.error = error;
      this.output(logMessage);
    }
  }
}

// Export singleton instance
export const logger = new Logger();
