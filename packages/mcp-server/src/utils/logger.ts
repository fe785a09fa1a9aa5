/**
 * Structured logger for KinematicMCP.
 *
 * Supports both human-readable and JSON output formats.
 * All output goes to stderr (stdout is reserved for MCP protocol).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_NAMES: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_NAMES.some(name => name === value);
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: 'text' | 'json';
  component?: string;
}

export interface LoggerSettings {
  level: LogLevel;
  format: 'text' | 'json';
  output: (msg: string) => void;
}

export class Logger {
  private readonly settings: LoggerSettings;
  private readonly component: string;

  constructor(options: LoggerOptions = {}, settings?: LoggerSettings) {
    this.settings = settings ?? {
      level: options.level ?? 'info',
      format: options.format ?? 'text',
      output: (msg: string) => process.stderr.write(msg + '\n'),
    };
    this.component = options.component ?? 'KinematicMCP';
  }

  /**
   * Create a child logger with a specific component name. Children share
   * level, format and output with their parent, so later changes apply to both.
   */
  child(component: string): Logger {
    return new Logger({ component }, this.settings);
  }

  /** Set the output function (useful for testing) */
  setOutput(fn: (msg: string) => void): void {
    this.settings.output = fn;
  }

  getLevelName(): LogLevel {
    return this.settings.level;
  }

  setLevel(level: LogLevel): void {
    this.settings.level = level;
  }

  setFormat(format: 'text' | 'json'): void {
    this.settings.format = format;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.settings.level]) return;

    const hasData = data !== undefined && Object.keys(data).length > 0;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      message,
      ...(hasData ? { data } : {}),
    };

    if (this.settings.format === 'json') {
      this.settings.output(JSON.stringify(entry));
    } else {
      const prefix = `[${this.component}]`;
      const levelTag = level.toUpperCase().padEnd(5);
      const dataStr = hasData ? ' ' + JSON.stringify(data) : '';
      this.settings.output(`${prefix} ${levelTag} ${message}${dataStr}`);
    }
  }
}

/** Default global logger instance */
export const logger = new Logger();
