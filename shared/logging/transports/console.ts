/**
 * Console Transport
 *
 * One line per entry: time, level, component, then the run context
 * (schema and a short correlation id) and the message. Data follows either
 * as compact key=value pairs or as indented JSON. Warnings and errors go to
 * stderr so stdout stays clean for a caller piping results.
 */

import type { LogTransport, LogEntry, LogLevel } from "../types.js";

const ANSI = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
  inverse: "\x1b[7m",
};

const LEVEL_STYLE: Record<LogLevel, { label: string; color: string }> = {
  trace: { label: "TRC", color: ANSI.gray },
  debug: { label: "DBG", color: ANSI.cyan },
  info: { label: "INF", color: ANSI.blue },
  warn: { label: "WRN", color: ANSI.yellow },
  error: { label: "ERR", color: ANSI.red },
  fatal: { label: "FTL", color: ANSI.inverse + ANSI.red },
  silent: { label: "   ", color: ANSI.reset },
};

export interface ConsoleTransportOptions {
  minLevel?: LogLevel;
  /** Default: on when stderr is a TTY */
  colors?: boolean;
  /** Show HH:MM:SS (default: true) */
  timestamps?: boolean;
  /** Indented JSON data instead of key=value pairs (default: false) */
  prettyPrint?: boolean;
  /** Line sinks; default process.stdout / process.stderr */
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

export interface ConsoleFormat {
  colors: boolean;
  timestamps: boolean;
  prettyPrint: boolean;
}

function scalar(value: unknown): string {
  if (typeof value === "string") return /\s/.test(value) ? JSON.stringify(value) : value;
  if (value === undefined) return "undefined";
  return typeof value === "object" && value !== null ? JSON.stringify(value) : String(value);
}

/** Render one entry as console text (may span lines in pretty mode). */
export function formatConsoleEntry(entry: LogEntry, format: ConsoleFormat): string {
  const paint = (text: string, color: string): string =>
    format.colors ? `${color}${text}${ANSI.reset}` : text;

  const style = LEVEL_STYLE[entry.level];
  const head: string[] = [];
  if (format.timestamps) head.push(paint(entry.timestamp.slice(11, 19), ANSI.dim));
  head.push(paint(style.label, style.color));
  head.push(paint(`[${entry.component}]`, ANSI.magenta));
  if (entry.schema) head.push(paint(`<${entry.schema}>`, ANSI.cyan));
  if (entry.correlationId) head.push(paint(`#${entry.correlationId.slice(0, 6)}`, ANSI.dim));
  head.push(entry.message);

  let text = head.join(" ");
  const data = entry.data && Object.keys(entry.data).length > 0 ? entry.data : undefined;
  if (data && format.prettyPrint) {
    text += "\n" + paint(JSON.stringify(data, null, 2), ANSI.dim);
  } else if (data) {
    const pairs = Object.entries(data).map(([key, value]) => `${key}=${scalar(value)}`);
    text += " " + paint(pairs.join(" "), ANSI.dim);
  }

  if (entry.error) {
    text += "\n" + paint(`  ${entry.error.name}: ${entry.error.message}`, ANSI.red);
    if (entry.error.stack && (entry.level === "error" || entry.level === "fatal")) {
      const frames = entry.error.stack.split("\n").slice(1).join("\n");
      if (frames) text += "\n" + paint(frames, ANSI.dim);
    }
  }
  return text;
}

export class ConsoleTransport implements LogTransport {
  name = "console";
  minLevel: LogLevel;
  private readonly format: ConsoleFormat;
  private readonly stdout: (line: string) => void;
  private readonly stderr: (line: string) => void;

  constructor(options: ConsoleTransportOptions = {}) {
    this.minLevel = options.minLevel ?? "info";
    this.format = {
      colors: options.colors ?? process.stderr.isTTY === true,
      timestamps: options.timestamps ?? true,
      prettyPrint: options.prettyPrint ?? false,
    };
    this.stdout = options.stdout ?? (line => process.stdout.write(line + "\n"));
    this.stderr = options.stderr ?? (line => process.stderr.write(line + "\n"));
  }

  log(entry: LogEntry): void {
    const text = formatConsoleEntry(entry, this.format);
    const toStderr = entry.level === "warn" || entry.level === "error" || entry.level === "fatal";
    (toStderr ? this.stderr : this.stdout)(text);
  }
}
