/**
 * Shared logger for the conversion services.
 *
 * Every level goes to stderr through console.error so that stdout stays free
 * for the external tools and for anything piping the service's output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Key/value pairs attached to every line a logger writes */
export type LogFields = Record<string, unknown>;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const VALID_LOG_LEVELS: readonly string[] = ['debug', 'info', 'warn', 'error'];

export function isValidLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && VALID_LOG_LEVELS.includes(value);
}

/**
 * JSON replacer that serializes Error objects (whose properties are non-enumerable).
 */
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    const obj: Record<string, unknown> = { name: value.name, message: value.message };
    if ('code' in value && value.code !== undefined) obj.code = value.code;
    if (value.stack) obj.stack = value.stack;
    return obj;
  }
  return value;
}

function isPlainObject(value: unknown): value is LogFields {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

export class Logger {
  private level: LogLevel;
  private readonly context: string;
  private readonly fields: LogFields;

  constructor(context: string = 'pdfa', fields: LogFields = {}) {
    this.context = context;
    this.fields = fields;
    const envLevel = process.env.LOG_LEVEL;
    this.level = isValidLogLevel(envLevel) ? envLevel : 'info';
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  /**
   * Bound fields are merged under the call's own data. Non-object data
   * (an Error, a string) is kept under `data` so nothing is dropped.
   */
  private payload(data: unknown): unknown {
    if (Object.keys(this.fields).length === 0) return data;
    if (data === undefined) return this.fields;
    if (isPlainObject(data)) return { ...this.fields, ...data };
    return { ...this.fields, data };
  }

  private formatMessage(level: LogLevel, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    const base = `[${timestamp}] [${level.toUpperCase()}] [${this.context}] ${message}`;
    const payload = this.payload(data);
    if (payload !== undefined) {
      return `${base} ${JSON.stringify(payload, errorReplacer)}`;
    }
    return base;
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (this.shouldLog(level)) {
      console.error(this.formatMessage(level, message, data));
    }
  }

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  /**
   * Create a child logger with a compound context (`parent:child`).
   * The child inherits the level and the bound fields; `fields` are added on top,
   * e.g. a request's correlation id.
   */
  child(context: string, fields: LogFields = {}): Logger {
    const child = new Logger(`${this.context}:${context}`, { ...this.fields, ...fields });
    child.level = this.level;
    return child;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}
