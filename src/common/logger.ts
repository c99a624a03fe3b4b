import { Writable } from 'node:stream';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';
export type LogFormat = 'text' | 'json';

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  destination?: Writable;
  scope?: string;
}

const LEVEL_VALUES: Record<LogLevel, number> = {
  silent: 100,
  error: 40,
  warn: 30,
  info: 20,
  debug: 10,
};

const SECRET_KEYS = new Set(['token', 'credential', 'password', 'authorization']);

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_VALUES, value);
}

export function isLogFormat(value: string): value is LogFormat {
  return value === 'text' || value === 'json';
}

function levelFromEnv(): LogLevel {
  const value = process.env.GITREVFS_LOG_LEVEL?.toLowerCase();
  return value && isLogLevel(value) ? value : 'warn';
}

function formatScope(scope?: string): string {
  if (!scope) {
    return '';
  }
  return `[${scope}] `;
}

function scrub(metadata: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(metadata)) {
    result[key] = SECRET_KEYS.has(key.toLowerCase()) && value !== undefined ? '***' : value;
  }
  return result;
}

export class Logger {
  private level: LogLevel;
  private format: LogFormat;
  private destination: Writable;
  private scope?: string;
  private readonly parent?: Logger;

  constructor(options: LoggerOptions = {}, parent?: Logger) {
    this.level = options.level ?? levelFromEnv();
    this.format = options.format ?? 'text';
    this.destination = options.destination ?? process.stderr;
    this.scope = options.scope;
    this.parent = parent;
  }

  /**
   * Children follow later `configure` calls on their root logger.
   */
  child(scope: string): Logger {
    return new Logger({ scope: this.scope ? `${this.scope}:${scope}` : scope }, this.root());
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
  }

  getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.level;
  }

  isLevelEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_VALUES[this.getLevel()] <= LEVEL_VALUES[level];
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

  private root(): Logger {
    return this.parent ? this.parent.root() : this;
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, metadata: Record<string, unknown>) {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const { format, destination } = this.root();
    const safe = scrub(metadata);
    const timestamp = new Date().toISOString();
    if (format === 'json') {
      const payload = {
        level,
        time: timestamp,
        message,
        scope: this.scope,
        ...safe,
      };
      destination.write(`${JSON.stringify(payload)}\n`);
      return;
    }

    const prefix = `${timestamp} ${level.toUpperCase()} `;
    const strMetadata = Object.keys(safe).length > 0 ? ` ${JSON.stringify(safe)}` : '';
    destination.write(`${prefix}${formatScope(this.scope)}${message}${strMetadata}\n`);
  }
}

const globalLogger = new Logger();

export function getLogger(scope?: string): Logger {
  return scope ? globalLogger.child(scope) : globalLogger;
}

export function configureLogger(options: LoggerOptions): void {
  globalLogger.configure(options);
}
