import { Writable } from 'node:stream';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';
export type LogFormat = 'text' | 'json';

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  destination?: Writable;
  scope?: string;
  /** Metadata keys whose values are replaced before writing. */
  redactKeys?: string[];
}

const LEVEL_VALUES: Record<LogLevel, number> = {
  silent: 100,
  error: 40,
  warn: 30,
  info: 20,
  debug: 10,
};

const LOG_LEVELS: LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

const REDACTED = '[redacted]';

const DEFAULT_OPTIONS: Required<Omit<LoggerOptions, 'scope'>> = {
  level: 'info',
  format: 'text',
  destination: process.stderr,
  redactKeys: ['word'],
};

function formatScope(scope?: string): string {
  if (!scope) {
    return '';
  }
  return `[${scope}] `;
}

export class Logger {
  private level: LogLevel;
  private format: LogFormat;
  private destination: Writable;
  private scope?: string;
  private redactKeys: Set<string>;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? DEFAULT_OPTIONS.level;
    this.format = options.format ?? DEFAULT_OPTIONS.format;
    this.destination = options.destination ?? DEFAULT_OPTIONS.destination;
    this.scope = options.scope;
    this.redactKeys = new Set(options.redactKeys ?? DEFAULT_OPTIONS.redactKeys);
  }

  child(scope: string): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      destination: this.destination,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
      redactKeys: [...this.redactKeys],
    });
  }

  configure(options: LoggerOptions): void {
    if (options.level) {
      this.level = options.level;
    }
    if (options.format) {
      this.format = options.format;
    }
    if (options.destination) {
      this.destination = options.destination;
    }
    if (options.scope !== undefined) {
      this.scope = options.scope;
    }
    if (options.redactKeys) {
      this.redactKeys = new Set(options.redactKeys);
    }
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_VALUES[this.level] <= LEVEL_VALUES[level];
  }

  debug(message: string, metadata: Record<string, unknown> = {}): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata: Record<string, unknown> = {}): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata: Record<string, unknown> = {}): void {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata: Record<string, unknown> = {}): void {
    this.write('error', message, metadata);
  }

  private redact(metadata: Record<string, unknown>): Record<string, unknown> {
    if (this.redactKeys.size === 0) {
      return metadata;
    }
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(metadata)) {
      result[key] = this.redactKeys.has(key) && value !== undefined && value !== null ? REDACTED : value;
    }
    return result;
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, metadata: Record<string, unknown>) {
    if (!this.isEnabled(level)) {
      return;
    }

    const safeMetadata = this.redact(metadata);
    const timestamp = new Date().toISOString();
    if (this.format === 'json') {
      const payload = {
        level,
        time: timestamp,
        message,
        scope: this.scope,
        ...safeMetadata,
      };
      this.destination.write(`${JSON.stringify(payload)}\n`);
      return;
    }

    const prefix = `${timestamp} ${level.toUpperCase()} `;
    const strMetadata = Object.keys(safeMetadata).length > 0 ? ` ${JSON.stringify(safeMetadata)}` : '';
    this.destination.write(`${prefix}${formatScope(this.scope)}${message}${strMetadata}\n`);
  }
}

export function parseLogLevel(value?: string): LogLevel | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === normalized);
  if (!level) {
    throw new Error(`Unsupported log level "${value}". Use one of ${LOG_LEVELS.join(',')}.`);
  }
  return level;
}

export function parseLogFormat(value?: string): LogFormat | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (normalized === 'json' || normalized === 'text') {
    return normalized;
  }
  throw new Error(`Unsupported log format "${value}". Use text or json.`);
}

const globalLogger = new Logger();

export function getLogger(scope?: string): Logger {
  return scope ? globalLogger.child(scope) : globalLogger;
}

export function configureLogger(options: LoggerOptions): void {
  globalLogger.configure(options);
}
