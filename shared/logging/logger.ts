/**
 * Core Logger Implementation
 *
 * Structured logging with multiple transports. Child loggers share the
 * parent's transports and ring buffer and add their own component/context.
 */

import { LOG_LEVELS, DEFAULT_REDACT_PATTERNS } from "./types.js";
import type { LogLevel, LogEntry, LogContext, LoggerConfig, ILogger } from "./types.js";

// ============================================
// RING BUFFER
// ============================================

export class RingBuffer<T> {
  private buffer: Array<T | undefined>;
  private head = 0;
  private count = 0;

  constructor(private capacity: number) {
    this.buffer = new Array<T | undefined>(capacity);
  }

  push(item: T): void {
    this.buffer[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) this.count++;
  }

  getAll(): T[] {
    if (this.count === 0) return [];
    const ordered = this.count < this.capacity
      ? this.buffer.slice(0, this.count)
      : [...this.buffer.slice(this.head), ...this.buffer.slice(0, this.head)];
    return ordered.filter((item): item is T => item !== undefined);
  }

  getLast(n: number): T[] {
    return this.getAll().slice(-n);
  }
}

// ============================================
// LOGGER IMPLEMENTATION
// ============================================

export class Logger implements ILogger {
  private readonly config: LoggerConfig;
  private readonly redactPatterns: RegExp[];
  private readonly ringBuffer: RingBuffer<LogEntry>;
  private context: LogContext;

  constructor(config: LoggerConfig, ringBuffer?: RingBuffer<LogEntry>) {
    this.config = config;
    this.redactPatterns = config.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
    this.ringBuffer = ringBuffer ?? new RingBuffer<LogEntry>(config.ringBufferSize ?? 1000);
    this.context = { ...config.defaultContext };
  }

  // ----------------------------------------
  // Log Methods
  // ----------------------------------------

  trace(message: string, data?: Record<string, unknown>): void {
    this.write("trace", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write("warn", message, data);
  }

  error(message: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.write("error", message, data, error);
  }

  fatal(message: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.write("fatal", message, data, error);
  }

  // ----------------------------------------
  // Core Logging
  // ----------------------------------------

  private write(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: Error | unknown
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message,
      ...this.context
    };

    if (data) {
      entry.data = this.redact(data);
    }

    if (error !== undefined) {
      entry.error = error instanceof Error
        ? { name: error.name, message: error.message, stack: error.stack }
        : { name: "Unknown", message: String(error) };
    }

    this.ringBuffer.push(entry);

    for (const transport of this.config.transports) {
      if (LOG_LEVELS[level] >= LOG_LEVELS[transport.minLevel]) {
        try {
          Promise.resolve(transport.log(entry)).catch((e: unknown) => {
            console.error(`[Logger] Transport ${transport.name} failed:`, e);
          });
        } catch (e) {
          // Transport error - fall back to console
          console.error(`[Logger] Transport ${transport.name} failed:`, e);
        }
      }
    }
  }

  // ----------------------------------------
  // Redaction
  // ----------------------------------------

  private redact(data: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      if (this.redactPatterns.some(pattern => pattern.test(key))) {
        result[key] = "[REDACTED]";
      } else if (isRecord(value)) {
        result[key] = this.redact(value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }

  // ----------------------------------------
  // Context Management
  // ----------------------------------------

  child(context: LogContext & { component?: string }): ILogger {
    const { component, ...rest } = context;
    return new Logger({
      ...this.config,
      component: component || this.config.component,
      defaultContext: { ...this.context, ...rest }
    }, this.ringBuffer);
  }

  setCorrelationId(id: string): void {
    this.context.correlationId = id;
  }

  getRecentLogs(count: number = 100): LogEntry[] {
    return this.ringBuffer.getLast(count);
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  async flush(): Promise<void> {
    await Promise.all(this.config.transports.map(t => t.flush?.()));
  }

  async close(): Promise<void> {
    await this.flush();
    await Promise.all(this.config.transports.map(t => t.close?.()));
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

// ============================================
// GLOBAL LOGGER
// ============================================

let globalLogger: Logger | null = null;

export function initLogger(config: LoggerConfig): Logger {
  globalLogger = new Logger(config);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    throw new Error("Logger not initialized. Call initLogger() first.");
  }
  return globalLogger;
}

export function log(): Logger {
  return getLogger();
}
