/**
 * MoodTray Structured Logger
 *
 * One line per entry so log output does not tear the terminal status line.
 * Loggers carry a module context plus optional bound fields (the mood state
 * or metric an entry is about), merged into every entry's data.
 */

import { CONFIG } from './config';

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

/**
 * Unknown names map to INFO
 */
export function parseLogLevel(name: string): LogLevel {
  return LEVEL_NAMES[name.toLowerCase()] ?? LogLevel.INFO;
}

type LogFields = Record<string, unknown>;

interface ErrorSummary {
  message: string;
  code?: string;
  stack?: string;
}

interface LogEntry {
  timestamp: string;
  level: string;
  context?: string;
  message: string;
  data?: unknown;
  error?: ErrorSummary;
}

// Resolved per call so console spies installed later still see the output
const WRITERS: Record<LogLevel, (line: string) => void> = {
  [LogLevel.DEBUG]: (line) => console.debug(line),
  [LogLevel.INFO]: (line) => console.info(line),
  [LogLevel.WARN]: (line) => console.warn(line),
  [LogLevel.ERROR]: (line) => console.error(line),
};

function summarizeError(error: unknown): ErrorSummary | undefined {
  if (error === undefined) {
    return undefined;
  }
  if (error instanceof Error) {
    const code: unknown = Reflect.get(error, 'code');
    return {
      message: error.message,
      code: typeof code === 'string' ? code : undefined,
      stack: error.stack,
    };
  }
  return { message: String(error) };
}

function mergeData(fields: LogFields, data: unknown): unknown {
  if (Object.keys(fields).length === 0) {
    return data;
  }
  if (data === undefined) {
    return fields;
  }
  if (typeof data === 'object' && data !== null && !Array.isArray(data)) {
    return { ...fields, ...data };
  }
  return { ...fields, data };
}

function formatPretty(entry: LogEntry): string {
  const context = entry.context ? ` [${entry.context}]` : '';
  let line = `[${entry.timestamp}] [${entry.level}]${context} ${entry.message}`;

  if (entry.data !== undefined) {
    line += ` ${JSON.stringify(entry.data)}`;
  }
  if (entry.error) {
    line += ` | Error: ${entry.error.message}`;
    if (entry.error.code) {
      line += ` (${entry.error.code})`;
    }
  }
  return line;
}

export class Logger {
  private level: LogLevel;
  private readonly pretty: boolean = CONFIG.logging.pretty;

  constructor(
    private readonly context?: string,
    level: string = CONFIG.logging.level,
    private readonly fields: LogFields = {}
  ) {
    this.level = parseLogLevel(level);
  }

  /**
   * Logger for a sub-module, e.g. `Orchestrator:Poll`; keeps level and fields
   */
  child(context: string): Logger {
    const nested = this.context ? `${this.context}:${context}` : context;
    return this.derive(nested, this.fields);
  }

  /**
   * Logger whose entries all carry `fields`, e.g. `{ state: 'busy' }`
   */
  withFields(fields: LogFields): Logger {
    return this.derive(this.context, { ...this.fields, ...fields });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  debug(message: string, data?: unknown): void {
    this.write(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: unknown): void {
    this.write(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write(LogLevel.WARN, message, data);
  }

  error(message: string, error?: unknown, data?: unknown): void {
    this.write(LogLevel.ERROR, message, data, summarizeError(error));
  }

  private derive(context: string | undefined, fields: LogFields): Logger {
    const derived = new Logger(context, 'info', fields);
    derived.setLevel(this.level);
    return derived;
  }

  private write(level: LogLevel, message: string, data?: unknown, error?: ErrorSummary): void {
    if (level < this.level) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      context: this.context,
      message,
      data: mergeData(this.fields, data),
      error,
    };

    WRITERS[level](this.pretty ? formatPretty(entry) : JSON.stringify(entry));
  }
}

/**
 * Create logger for specific module
 */
export const createLogger = (context: string): Logger => new Logger(context);
