// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING MODULE — Structured Logs with Component Context
// ═══════════════════════════════════════════════════════════════════════════════

import { loadConfig } from '../config/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component?: string;
  runId?: string;
  duration?: number;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

export interface LogContext {
  component?: string;
  runId?: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// REDACTION
// ─────────────────────────────────────────────────────────────────────────────────

const SENSITIVE_KEYS = ['password', 'secret', 'authorization', 'apikey'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function redactValue(value: unknown, depth: number): unknown {
  if (depth > 5) return '[MAX_DEPTH]';
  if (Array.isArray(value)) {
    return value.map(item => redactValue(item, depth + 1));
  }
  if (isRecord(value)) {
    return redactRecord(value, depth + 1);
  }
  return value;
}

function redactRecord(record: Record<string, unknown>, depth = 0): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive))) {
      result[key] = '[REDACTED]';
    } else {
      result[key] = redactValue(value, depth);
    }
  }
  return result;
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOG LEVELS
// ─────────────────────────────────────────────────────────────────────────────────

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[minLevel];
}

/**
 * Normalize whatever was caught into an Error for logging.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER CLASS
// ─────────────────────────────────────────────────────────────────────────────────

export class Logger {
  private context: LogContext;
  private minLevel: LogLevel;
  private jsonFormat: boolean;

  constructor(context: LogContext = {}) {
    this.context = context;
    const config = loadConfig();
    this.minLevel = config.debugMode ? 'debug' : 'info';
    this.jsonFormat = config.logFormat === 'json';
  }

  private formatEntry(level: LogLevel, message: string, extra?: Partial<LogEntry>): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.context,
      ...extra,
    };

    if (entry.metadata) {
      entry.metadata = redactRecord(entry.metadata);
    }

    return entry;
  }

  private output(entry: LogEntry): void {
    if (this.jsonFormat) {
      console.log(JSON.stringify(entry));
      return;
    }

    const component = entry.component ? `[${entry.component}]` : '';
    const runId = entry.runId ? `(${entry.runId.slice(0, 8)})` : '';
    const duration = entry.duration !== undefined ? ` ${entry.duration}ms` : '';

    const levelColors: Record<LogLevel, string> = {
      debug: '\x1b[36m', // cyan
      info: '\x1b[32m',  // green
      warn: '\x1b[33m',  // yellow
      error: '\x1b[31m', // red
      fatal: '\x1b[35m', // magenta
    };
    const reset = '\x1b[0m';
    const color = levelColors[entry.level];

    console.log(
      `${entry.timestamp} ${color}${entry.level.toUpperCase().padEnd(5)}${reset} ${component}${runId} ${entry.message}${duration}`
    );

    if (entry.metadata && Object.keys(entry.metadata).length > 0) {
      console.log('  ', JSON.stringify(entry.metadata));
    }

    if (entry.error) {
      console.log(`  Error: ${entry.error.name}: ${entry.error.message}`);
      if (entry.error.stack) {
        console.log('  ', entry.error.stack.split('\n').slice(1, 4).join('\n  '));
      }
    }
  }

  private log(level: LogLevel, message: string, extra?: Partial<LogEntry>): void {
    if (!shouldLog(level, this.minLevel)) return;
    this.output(this.formatEntry(level, message, extra));
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // PUBLIC API
  // ─────────────────────────────────────────────────────────────────────────────

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log('debug', message, { metadata });
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log('info', message, { metadata });
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('warn', message, { metadata });
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log('error', message, {
      metadata,
      error: error ? { name: error.name, message: error.message, stack: error.stack } : undefined,
    });
  }

  fatal(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log('fatal', message, {
      metadata,
      error: error ? { name: error.name, message: error.message, stack: error.stack } : undefined,
    });
  }

  // Operation timing
  time(message: string, startTime: number, metadata?: Record<string, unknown>): void {
    this.log('info', message, { duration: Date.now() - startTime, metadata });
  }

  child(context: Partial<LogContext>): Logger {
    return new Logger({ ...this.context, ...context });
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// SINGLETON ROOT LOGGER
// ─────────────────────────────────────────────────────────────────────────────────

let rootLogger: Logger | null = null;

export function getLogger(context?: LogContext): Logger {
  if (!rootLogger) {
    rootLogger = new Logger();
  }
  if (context) {
    return rootLogger.child(context);
  }
  return rootLogger;
}

// Component-specific loggers
export const loggers = {
  favorites: () => getLogger({ component: 'favorites' }),
  loader: () => getLogger({ component: 'loader' }),
  export: () => getLogger({ component: 'export' }),
  delivery: () => getLogger({ component: 'delivery' }),
  notifier: () => getLogger({ component: 'notifier' }),
  storage: () => getLogger({ component: 'storage' }),
};
