export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

type LogRecord = {
  ts: string;
  level: LogLevel;
  msg: string;
  [key: string]: unknown;
};

export type LogSink = (line: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

function hasToJSON(value: object): value is { toJSON(): unknown } {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

/**
 * Convert log fields to JSON-safe values. Errors keep their name, message
 * and, for the project's own error types, code and suggestion.
 */
export function toLoggable(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) return value.map(toLoggable);
  if (value instanceof Error) {
    return hasToJSON(value)
      ? toLoggable(value.toJSON())
      : { name: value.name, message: value.message };
  }
  if (value instanceof Date) return value.toISOString();
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = toLoggable(v);
    }
    return out;
  }
  return String(value);
}

function formatField(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

const defaultSink: LogSink = (line) => {
  process.stderr.write(line);
};

export class Logger {
  constructor(
    private readonly options: {
      level?: LogLevel;
      format?: LogFormat;
      sink?: LogSink;
    } = {}
  ) {}

  private shouldLog(level: LogLevel): boolean {
    const configured = this.options.level ?? 'info';
    return LEVEL_ORDER[level] >= LEVEL_ORDER[configured];
  }

  child(fields: Record<string, unknown>): Logger {
    const parent = this;
    return new (class extends Logger {
      override log(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
        parent.log(level, msg, { ...fields, ...(extra ?? {}) });
      }
    })(this.options);
  }

  log(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const fields: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(extra ?? {})) {
      fields[k] = toLoggable(v);
    }

    const record: LogRecord = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...fields,
    };

    // Never log to stdout; the report goes there.
    const write = this.options.sink ?? defaultSink;

    if ((this.options.format ?? 'text') === 'json') {
      write(`${JSON.stringify(record)}\n`);
      return;
    }

    const details = Object.entries(fields)
      .map(([k, v]) => ` ${k}=${formatField(v)}`)
      .join('');
    write(`[${record.ts}] ${level.toUpperCase()} ${msg}${details}\n`);
  }

  debug(msg: string, extra?: Record<string, unknown>) {
    this.log('debug', msg, extra);
  }
  info(msg: string, extra?: Record<string, unknown>) {
    this.log('info', msg, extra);
  }
  warn(msg: string, extra?: Record<string, unknown>) {
    this.log('warn', msg, extra);
  }
  error(msg: string, extra?: Record<string, unknown>) {
    this.log('error', msg, extra);
  }
}
