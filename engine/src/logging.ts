/**
 * Logging Setup for the Engine
 *
 * Initializes the shared logging system with a console transport and, when
 * a log directory is configured, a rotating file transport.
 */

import * as path from "path";
import * as os from "os";
import {
  initLogger,
  log,
  ConsoleTransport,
  FileTransport,
  isLogLevel,
} from "@rowfill/shared/logging";
import type { Logger, ILogger, LogContext, LogEntry, LogLevel, LogTransport } from "@rowfill/shared/logging";

// ============================================
// CONFIGURATION
// ============================================

export const DEFAULT_LOG_DIR = path.join(os.homedir(), ".rowfill", "logs");

export interface LoggingOptions {
  /** Minimum level to log (default: LOG_LEVEL env, else "info") */
  minLevel?: LogLevel;
  /** Enable console output (default: true) */
  console?: boolean;
  /** Directory for the file transport; no file output when omitted */
  logDir?: string;
  /** Console colors (default: auto-detect) */
  colors?: boolean;
}

// ============================================
// INITIALIZATION
// ============================================

let logger: Logger | null = null;

function levelFromEnv(): LogLevel {
  const raw = (process.env.LOG_LEVEL || "").toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

/**
 * Initialize the logging system for the engine.
 */
export function initEngineLogging(options: LoggingOptions = {}): Logger {
  const minLevel = options.minLevel || levelFromEnv();
  const transports: LogTransport[] = [];

  if (options.console !== false) {
    transports.push(new ConsoleTransport({
      minLevel,
      colors: options.colors,
      prettyPrint: process.env.NODE_ENV !== "production",
    }));
  }

  if (options.logDir) {
    transports.push(new FileTransport({
      minLevel: "debug", // Always log debug+ to file
      logDir: options.logDir,
      filename: "rowfill",
      maxSize: 10 * 1024 * 1024,
      maxFiles: 5,
    }));
  }

  logger = initLogger({
    minLevel,
    component: "engine",
    transports,
    ringBufferSize: 1000,
  });

  return logger;
}

/**
 * Get the engine logger. Auto-initializes with console output if the host
 * never called initEngineLogging().
 */
export function getEngineLogger(): Logger {
  return logger ?? initEngineLogging();
}

export { log };

// ============================================
// COMPONENT LOGGERS
// ============================================

type ComponentContext = LogContext & { component?: string };

/**
 * Logger handed to modules at import time. It looks up the engine logger on
 * every call, so a later initEngineLogging() (new level, file output)
 * reaches loggers created before it.
 */
class ComponentLogger implements ILogger {
  constructor(private context: ComponentContext) {}

  private target(): ILogger {
    return getEngineLogger().child(this.context);
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.target().trace(message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.target().debug(message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.target().info(message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.target().warn(message, data);
  }

  error(message: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.target().error(message, error, data);
  }

  fatal(message: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.target().fatal(message, error, data);
  }

  child(context: ComponentContext): ILogger {
    return new ComponentLogger({ ...this.context, ...context });
  }

  setCorrelationId(id: string): void {
    this.context = { ...this.context, correlationId: id };
  }

  getRecentLogs(count?: number): LogEntry[] {
    return getEngineLogger().getRecentLogs(count);
  }

  flush(): Promise<void> {
    return getEngineLogger().flush();
  }
}

/**
 * Create a namespaced logger for a specific component.
 *
 * ```typescript
 * const mcpLog = createComponentLogger("mcp.client");
 * mcpLog.info("Server started"); // logs as [engine.mcp.client]
 * ```
 */
export function createComponentLogger(component: string): ILogger {
  return new ComponentLogger({ component: `engine.${component}` });
}
