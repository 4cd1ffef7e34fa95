/**
 * Structured logger
 *
 * One line per entry, always on stderr by default so that stdout stays free
 * for machine-readable output:
 *
 *   2026-01-01T00:00:00.000Z [WARN] [loader] Skipping document {"file":"a.md"}
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  context?: Record<string, unknown>;
}

export interface LogWriter {
  write(chunk: string): unknown;
}

export interface LoggerConfig {
  level?: LogLevel;
  /** Emit entries as JSON objects instead of the text form. */
  json?: boolean;
  stream?: LogWriter;
  now?: () => Date;
}

const globalConfig: Required<LoggerConfig> = {
  level: 'warn',
  json: false,
  stream: process.stderr,
  now: () => new Date(),
};

/** Change defaults for loggers created afterwards and for existing ones without overrides. */
export function configure(config: LoggerConfig): void {
  Object.assign(globalConfig, stripUndefined(config));
}

export class Logger {
  constructor(
    private readonly component: string,
    private readonly overrides: LoggerConfig = {}
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  child(component: string): Logger {
    return new Logger(`${this.component}:${component}`, this.overrides);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.settings().level);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) return;

    const { now, json, stream } = this.settings();
    const entry: LogEntry = {
      timestamp: now().toISOString(),
      level,
      component: this.component,
      message,
      ...(context && Object.keys(context).length > 0 ? { context } : {}),
    };
    stream.write(`${json ? JSON.stringify(entry) : formatEntry(entry)}\n`);
  }

  private settings(): Required<LoggerConfig> {
    return { ...globalConfig, ...this.overrides };
  }
}

export function createLogger(component: string, config: LoggerConfig = {}): Logger {
  return new Logger(component, stripUndefined(config));
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function formatEntry(entry: LogEntry): string {
  const ctx = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
  return `${entry.timestamp} [${entry.level.toUpperCase()}] [${entry.component}] ${entry.message}${ctx}`;
}

function stripUndefined(config: LoggerConfig): LoggerConfig {
  const result: LoggerConfig = {};
  if (config.level !== undefined) result.level = config.level;
  if (config.json !== undefined) result.json = config.json;
  if (config.stream !== undefined) result.stream = config.stream;
  if (config.now !== undefined) result.now = config.now;
  return result;
}
