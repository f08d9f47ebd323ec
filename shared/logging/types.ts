/**
 * Logging Types
 *
 * Shared by every rowfill package. Entries are structured so they can be
 * printed to a terminal or appended to a JSON-lines file unchanged.
 */

// ============================================
// LOG LEVELS
// ============================================

export const LOG_LEVELS = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
  silent: 6
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

// ============================================
// LOG ENTRY
// ============================================

/** Context carried by a logger and stamped on each entry it writes. */
export interface LogContext {
  /** Correlation ID for one enrichment run (set per queryBatch call) */
  correlationId?: string;
  /** Name of the schema driving the run */
  schema?: string;
}

export interface LogEntry extends LogContext {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Component that produced the log (e.g. "engine.query", "mcp.client") */
  component: string;
  message: string;
  /** Structured data payload, redacted */
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

// ============================================
// TRANSPORT INTERFACE
// ============================================

export interface LogTransport {
  /** Transport name for debugging */
  name: string;
  /** Minimum level this transport handles */
  minLevel: LogLevel;
  log(entry: LogEntry): void | Promise<void>;
  /** Flush any buffered logs (for graceful shutdown) */
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

// ============================================
// LOGGER CONFIG
// ============================================

export interface LoggerConfig {
  /** Entries below this level are dropped */
  minLevel: LogLevel;
  component: string;
  /** Context attached to every entry */
  defaultContext?: LogContext;
  transports: LogTransport[];
  /** Data keys to redact (regex patterns) */
  redactPatterns?: RegExp[];
  /** Keep last N entries in memory */
  ringBufferSize?: number;
}

// ============================================
// LOGGER INTERFACE
// ============================================

export interface ILogger {
  trace(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: Error | unknown, data?: Record<string, unknown>): void;
  fatal(message: string, error?: Error | unknown, data?: Record<string, unknown>): void;

  /** Create a child logger with additional context */
  child(context: LogContext & { component?: string }): ILogger;

  setCorrelationId(id: string): void;

  /** Recent entries from the ring buffer */
  getRecentLogs(count?: number): LogEntry[];

  flush(): Promise<void>;
}

// ============================================
// SENSITIVE FIELD PATTERNS
// ============================================

export const DEFAULT_REDACT_PATTERNS = [
  /apiKey/i,
  /api_key/i,
  /password/i,
  /secret/i,
  /token/i,
  /authorization/i,
  /credential/i,
];
