export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown> & { error?: unknown };

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    message: string;
    stack?: string;
    name?: string;
  };
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m', // Green
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
  timestamp: '\x1b[90m', // Gray
  context: '\x1b[90m', // Gray
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

/**
 * Coerce anything thrown into an Error so it can be logged with a stack.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export class Logger {
  private minLevel: LogLevel;
  private useJSON: boolean;
  private supportsColor: boolean;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    const envLevel = (env.LOG_LEVEL || 'info').toLowerCase();
    this.minLevel = isLogLevel(envLevel) ? envLevel : 'info';

    // JSON lines in production, readable lines in development
    this.useJSON = env.NODE_ENV === 'production' || env.LOG_FORMAT === 'json';

    this.supportsColor = Boolean(process.stdout.isTTY) && env.NO_COLOR === undefined && env.FORCE_COLOR !== '0';
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.minLevel];
  }

  private formatTimestamp(): string {
    const now = new Date();
    if (this.useJSON) {
      return now.toISOString();
    }

    const hours = now.getHours().toString().padStart(2, '0');
    const minutes = now.getMinutes().toString().padStart(2, '0');
    const seconds = now.getSeconds().toString().padStart(2, '0');
    const ms = now.getMilliseconds().toString().padStart(3, '0');
    return `${hours}:${minutes}:${seconds}.${ms}`.padEnd(12);
  }

  format(level: LogLevel, message: string, context?: LogContext): string {
    const { error: rawError, ...rest } = context ?? {};
    const error = rawError === undefined ? undefined : toError(rawError);
    const hasContext = Object.keys(rest).length > 0;

    if (this.useJSON) {
      const entry: LogEntry = {
        timestamp: this.formatTimestamp(),
        level,
        message,
      };
      if (hasContext) {
        entry.context = rest;
      }
      if (error) {
        entry.error = { message: error.message, stack: error.stack, name: error.name };
      }
      return JSON.stringify(entry);
    }

    const paint = (color: string, text: string) => (this.supportsColor ? `${color}${text}${colors.reset}` : text);

    // timestamp (12 chars) + space + level padded to 6 + message
    let output = `${paint(colors.timestamp, this.formatTimestamp())} ${paint(colors[level], level.toUpperCase().padEnd(6))}${message}`;

    if (hasContext) {
      const pairs = Object.entries(rest)
        .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`)
        .join(' ');
      output += ` ${paint(colors.context, pairs)}`;
    }

    if (error) {
      output += `\n${paint(colors.error, `  Error: ${error.message}`)}`;
      if (error.stack) {
        const stackLines = error.stack.split('\n').slice(1, 4);
        output += `\n${paint(colors.timestamp, `  ${stackLines.join('\n  ')}`)}`;
      }
    }

    return output;
  }

  debug(message: string, context?: LogContext): void {
    if (this.isLevelEnabled('debug')) {
      console.log(this.format('debug', message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.isLevelEnabled('info')) {
      console.log(this.format('info', message, context));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.isLevelEnabled('warn')) {
      console.warn(this.format('warn', message, context));
    }
  }

  error(message: string, context?: LogContext): void {
    if (this.isLevelEnabled('error')) {
      console.error(this.format('error', message, context));
    }
  }
}

export const logger = new Logger();
