/**
 * Structured Logging
 *
 * Usage:
 *
 * ```typescript
 * import { initLogger, log, ConsoleTransport, FileTransport } from "@rowfill/shared/logging";
 *
 * initLogger({
 *   minLevel: "info",
 *   component: "engine",
 *   transports: [
 *     new ConsoleTransport({ colors: true }),
 *     new FileTransport({ logDir: "~/.rowfill/logs" })
 *   ]
 * });
 *
 * log().info("Batch finished", { records: 42 });
 * const mcpLog = log().child({ component: "engine.mcp" });
 * mcpLog.warn("Server did not answer tools/list");
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogContext,
  type LogTransport,
  type LoggerConfig,
  type ILogger
} from "./types.js";

export {
  Logger,
  initLogger,
  getLogger,
  log
} from "./logger.js";

export {
  ConsoleTransport,
  FileTransport,
  formatConsoleEntry,
  type ConsoleTransportOptions,
  type ConsoleFormat,
  type FileTransportOptions
} from "./transports/index.js";
