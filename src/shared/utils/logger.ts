/**
 * Structured Logging Utility
 * Colorized single-line logger. Every line goes to stderr so stdout only
 * ever carries the transcript.
 */

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export type LogMeta = Record<string, unknown>;

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
};

const levelColors: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: colors.gray,
  [LogLevel.INFO]: colors.blue,
  [LogLevel.WARN]: colors.yellow,
  [LogLevel.ERROR]: colors.red,
};

const levelPriority: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

export type LogSink = (line: string) => void;

interface LoggerConfig {
  level: LogLevel;
  enableColors: boolean;
  enableTimestamp: boolean;
  sink: LogSink;
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.WARN): LogLevel {
  const normalized = value?.trim().toLowerCase();
  const match = Object.values(LogLevel).find((level) => level === normalized);
  return match ?? fallback;
}

/**
 * Serialize metadata, expanding Error instances (JSON.stringify drops their fields)
 */
function serializeMeta(meta: LogMeta): string {
  return JSON.stringify(meta, (_key, value: unknown) => {
    if (value instanceof Error) {
      return { name: value.name, message: value.message };
    }
    return value;
  });
}

class Logger {
  private config: LoggerConfig = {
    level: parseLogLevel(process.env.LOG_LEVEL),
    enableColors: Boolean(process.stderr.isTTY) && process.env.NO_COLOR === undefined,
    enableTimestamp: true,
    sink: stderrSink,
  };

  private colorize(text: string, color: string): string {
    if (!this.config.enableColors) {
      return text;
    }
    return `${color}${text}${colors.reset}`;
  }

  private formatMessage(level: LogLevel, message: string, meta?: LogMeta): string {
    const parts: string[] = [];

    if (this.config.enableTimestamp) {
      parts.push(this.colorize(new Date().toISOString(), colors.gray));
    }

    parts.push(this.colorize(level.toUpperCase().padEnd(5), levelColors[level]));
    parts.push(message);

    if (meta && Object.keys(meta).length > 0) {
      parts.push(this.colorize(serializeMeta(meta), colors.gray));
    }

    return parts.join(' ');
  }

  private shouldLog(level: LogLevel): boolean {
    return levelPriority[level] >= levelPriority[this.config.level];
  }

  private log(level: LogLevel, message: string, meta?: LogMeta): void {
    if (!this.shouldLog(level)) {
      return;
    }
    this.config.sink(this.formatMessage(level, message, meta));
  }

  debug(message: string, meta?: LogMeta): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log(LogLevel.WARN, message, meta);
  }

  /**
   * Error level logging. A bare Error is expanded with its stack.
   */
  error(message: string, error?: Error | LogMeta): void {
    const meta: LogMeta = {};

    if (error instanceof Error) {
      meta.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    } else if (error) {
      Object.assign(meta, error);
    }

    this.log(LogLevel.ERROR, message, meta);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  setColors(enabled: boolean): void {
    this.config.enableColors = enabled;
  }

  setTimestamps(enabled: boolean): void {
    this.config.enableTimestamp = enabled;
  }

  setSink(sink: LogSink): void {
    this.config.sink = sink;
  }
}

export const logger = new Logger();

// Export for testing
export { Logger };
