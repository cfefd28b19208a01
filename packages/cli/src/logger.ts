import type { ICheckLogger } from '@proofmark/core';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  /** Receives one formatted line per record (default: stderr) */
  sink?: (line: string) => void;
  now?: () => Date;
}

type LogRecord = {
  ts: string;
  level: LogLevel;
  msg: string;
  [key: string]: unknown;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// Engine options may carry credentials for remote engines.
const SECRET_KEY_PATTERN = /^(password|pass|token|accessToken|apiKey|secret|authorization)$/i;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export function redactSecrets(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redactSecrets);
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = SECRET_KEY_PATTERN.test(k) ? '[REDACTED]' : redactSecrets(v);
    }
    return out;
  }
  return value;
}

function defaultSink(line: string): void {
  // stdout carries reports and corrected text.
  process.stderr.write(`${line}\n`);
}

export class Logger implements ICheckLogger {
  constructor(
    private readonly options: LoggerOptions = {},
    private readonly fields: Record<string, unknown> = {}
  ) {}

  child(fields: Record<string, unknown>): Logger {
    return new Logger(this.options, { ...this.fields, ...fields });
  }

  log(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.options.level ?? 'info']) return;

    const now = this.options.now ?? (() => new Date());
    const details = redactSecrets({ ...this.fields, ...(extra ?? {}) });
    const fields = isPlainObject(details) ? details : {};
    const record: LogRecord = { ts: now().toISOString(), level, msg, ...fields };
    const sink = this.options.sink ?? defaultSink;

    if ((this.options.format ?? 'text') === 'json') {
      sink(JSON.stringify(record));
      return;
    }

    const fieldsPart = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
    sink(`[${record.ts}] ${level.toUpperCase()} ${msg}${fieldsPart}`);
  }

  debug(msg: string, extra?: Record<string, unknown>): void {
    this.log('debug', msg, extra);
  }
  info(msg: string, extra?: Record<string, unknown>): void {
    this.log('info', msg, extra);
  }
  warn(msg: string, extra?: Record<string, unknown>): void {
    this.log('warn', msg, extra);
  }
  error(msg: string, extra?: Record<string, unknown>): void {
    this.log('error', msg, extra);
  }
}
