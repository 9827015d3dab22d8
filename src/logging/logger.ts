/**
 * Structured Logger
 *
 * One JSON object per entry. A root logger owns the sink (service name,
 * minimum level, output, debug sampling); child loggers share that sink and
 * only layer their own context (acting user, component, operation) on top.
 *
 * @module logging/logger
 */

import { randomUUID } from 'node:crypto';

// ─── Types ───────────────────────────────────────────────────────────────────

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogMetadata {
  [key: string]: unknown;
}

export interface LogContext {
  correlationId?: string;
  userId?: string;
  service?: string;
  component?: string;
  operation?: string;
}

export interface ErrorInfo {
  name: string;
  message: string;
  /** Set for errors carrying a string `code`, such as `AccessControlError`. */
  code?: string;
  stack?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  correlationId: string;
  component?: string;
  operation?: string;
  userId?: string;
  metadata?: LogMetadata;
  error?: ErrorInfo;
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  /** `error` may be anything thrown; non-Error values are wrapped. */
  error(message: string, error?: unknown, metadata?: LogMetadata): void;
  fatal(message: string, error?: unknown, metadata?: LogMetadata): void;
  child(context: LogContext): Logger;
}

export type LogOutput = (entry: LogEntry) => void;

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LoggerOptions {
  /** Defaults to 'plantgate'. */
  service?: string;
  /** Defaults to 'info'. */
  level?: LogLevel;
  context?: LogContext;
  /** Defaults to one JSON line on stdout. */
  output?: LogOutput;
  /** Fraction of debug entries kept, clamped to [0, 1]. Defaults to 1. */
  debugSampleRate?: number;
  /** Returns a value in [0, 1). Defaults to Math.random. */
  randomFn?: () => number;
}

// ─── Sink ────────────────────────────────────────────────────────────────────

interface LogSink {
  readonly service: string;
  accepts(level: LogLevel): boolean;
  write(entry: LogEntry): void;
}

function writeJsonLine(entry: LogEntry): void {
  process.stdout.write(`${JSON.stringify(entry)}\n`);
}

function createSink(options: LoggerOptions): LogSink {
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
  const sampleRate = Math.max(0, Math.min(1, options.debugSampleRate ?? 1));
  const random = options.randomFn ?? Math.random;

  return {
    service: options.service ?? 'plantgate',
    accepts(level) {
      if (LOG_LEVELS.indexOf(level) < threshold) return false;
      if (level !== 'debug' || sampleRate === 1) return true;
      return sampleRate > 0 && random() < sampleRate;
    },
    write: options.output ?? writeJsonLine,
  };
}

function describeError(error: unknown): ErrorInfo {
  if (!(error instanceof Error)) {
    return { name: 'NonError', message: String(error) };
  }
  const info: ErrorInfo = { name: error.name, message: error.message };
  const code: unknown = Reflect.get(error, 'code');
  if (typeof code === 'string') info.code = code;
  if (error.stack) info.stack = error.stack;
  return info;
}

// ─── Loggers ─────────────────────────────────────────────────────────────────

function bindLogger(sink: LogSink, context: LogContext): Logger {
  const emit = (level: LogLevel, message: string, error: unknown, metadata?: LogMetadata) => {
    if (!sink.accepts(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: context.service ?? sink.service,
      correlationId: context.correlationId ?? '',
    };
    if (context.component) entry.component = context.component;
    if (context.operation) entry.operation = context.operation;
    if (context.userId) entry.userId = context.userId;
    if (metadata && Object.keys(metadata).length > 0) entry.metadata = metadata;
    if (error !== undefined) entry.error = describeError(error);

    sink.write(entry);
  };

  return {
    debug: (message, metadata) => emit('debug', message, undefined, metadata),
    info: (message, metadata) => emit('info', message, undefined, metadata),
    warn: (message, metadata) => emit('warn', message, undefined, metadata),
    error: (message, error, metadata) => emit('error', message, error, metadata),
    fatal: (message, error, metadata) => emit('fatal', message, error, metadata),
    child: (extra) => bindLogger(sink, { ...context, ...extra }),
  };
}

/**
 * Creates a root logger. Entries from it and all of its children share one
 * correlation id unless a context overrides it.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const sink = createSink(options);
  return bindLogger(sink, {
    ...options.context,
    correlationId: options.context?.correlationId || randomUUID(),
    service: options.context?.service || sink.service,
  });
}

/** Drops everything; the default when no logger is injected. */
export function createSilentLogger(): Logger {
  return createLogger({ level: 'fatal', output: () => undefined });
}
