import { randomUUID } from 'node:crypto';
import type { MiddlewareHandler } from 'hono';
import { getEnv } from '../config/env.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** One JSON line. Bindings and call data are spread after the fixed fields. */
export interface LogEntry {
  level: LogLevel;
  msg: string;
  timestamp: string;
  service: string;
  [key: string]: unknown;
}

/** Receives the serialized entry; defaults to the console method for the level. */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  service?: string;
  /** Fields added to every entry (workerId, component, requestId, ...) */
  bindings?: Record<string, unknown>;
  sink?: LogSink;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'debug':
      console.debug(line);
      break;
    default:
      console.log(line);
  }
};

// --- Redaction ---
// Requesters' contact details and proxy credentials must never reach the logs.

const REDACTED = '[REDACTED]';

/** Matched as substrings of the lowercased key. */
const SENSITIVE_KEY_PARTS = [
  'password',
  'secret',
  'token',
  'api_key',
  'apikey',
  'authorization',
  'cookie',
  'credential',
  'private_key',
  'privatekey',
  'service_key',
  'servicekey',
  'connection_string',
  'connectionstring',
  'proxy',
  'phone',
  'email',
];

const SENSITIVE_VALUE_PATTERNS: RegExp[] = [
  /(?:sk|pk|key|token|secret|password)[_-]?[a-zA-Z0-9]{16,}/g,
  /eyJ[a-zA-Z0-9._-]{20,}/g, // JWTs
  /[a-z]+:\/\/[^\s:@/"']+:[^\s@/"']+@[^\s"']+/gi, // URLs with inline credentials
  /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, // email addresses
  /\b\d{3}[-. ]?\d{3}[-. ]?\d{4}\b/g, // US phone numbers
];

const MAX_DEPTH = 6;

function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEY_PARTS.some((part) => lower.includes(part));
}

function scrubText(text: string): string {
  return SENSITIVE_VALUE_PATTERNS.reduce((acc, pattern) => acc.replace(pattern, REDACTED), text);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function redact(key: string, value: unknown, depth: number): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: scrubText(value.message) };
  }
  if (Array.isArray(value)) {
    return depth >= MAX_DEPTH ? '[Array]' : value.map((item) => redact(key, item, depth + 1));
  }
  if (isRecord(value)) {
    return depth >= MAX_DEPTH ? '[Object]' : redactObject(value, depth + 1);
  }
  if (typeof value !== 'string') return value;
  return isSensitiveKey(key) ? REDACTED : scrubText(value);
}

/**
 * Copy of `obj` with sensitive keys masked and emails, phone numbers, tokens
 * and credentialed URLs scrubbed from every string. Error values become
 * `{ name, message }`.
 */
export function redactObject(obj: Record<string, unknown>, depth = 0): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = redact(key, value, depth);
  }
  return result;
}

// --- Logger ---

export class Logger {
  private readonly level: LogLevel;
  private readonly service: string;
  private readonly bindings: Record<string, unknown>;
  private readonly sink: LogSink;

  constructor(opts: LoggerOptions = {}) {
    this.level = opts.level ?? defaultLevel();
    this.service = opts.service ?? 'recordsrunner';
    this.bindings = opts.bindings ? redactObject(opts.bindings) : {};
    this.sink = opts.sink ?? consoleSink;
  }

  child(bindings: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      service: this.service,
      bindings: { ...this.bindings, ...bindings },
      sink: this.sink,
    });
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.write('debug', msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.write('info', msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.write('warn', msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.write('error', msg, data);
  }

  private write(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;

    const entry: LogEntry = {
      level,
      msg,
      timestamp: new Date().toISOString(),
      service: this.service,
      ...this.bindings,
      ...(data ? redactObject(data) : {}),
    };
    this.sink(level, JSON.stringify(entry));
  }
}

function defaultLevel(): LogLevel {
  const env = getEnv();
  return env.LOG_LEVEL ?? (env.NODE_ENV === 'production' ? 'info' : 'debug');
}

let defaultLogger: Logger | null = null;

/** Process-wide logger. Passing options replaces it. */
export function getLogger(opts?: LoggerOptions): Logger {
  if (!defaultLogger || opts) {
    defaultLogger = new Logger(opts);
  }
  return defaultLogger;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// --- HTTP request logging ---

export const REQUEST_ID_HEADER = 'X-Request-Id';

/** Logs start and completion of every API call and echoes the request id. */
export function requestLoggingMiddleware(): MiddlewareHandler {
  return async (c, next) => {
    const httpRequestId = c.req.header(REQUEST_ID_HEADER) ?? randomUUID();
    const startedAt = Date.now();
    const log = getLogger().child({ httpRequestId, method: c.req.method, path: c.req.path });

    log.debug('request_started');
    c.header(REQUEST_ID_HEADER, httpRequestId);

    await next();

    const status = c.res.status;
    const data = { status, durationMs: Date.now() - startedAt };
    if (status >= 500) {
      log.error('request_completed', data);
    } else {
      log.info('request_completed', data);
    }
  };
}
