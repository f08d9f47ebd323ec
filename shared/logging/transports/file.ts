/**
 * File Transport
 *
 * Appends JSON lines to `<logDir>/<filename>-<YYYY-MM-DD>.log`. Writes are
 * chained on one promise so entries land in order; when the active file
 * would pass maxSize it is shifted to `.1` (and `.1` to `.2`, ...), keeping
 * at most maxFiles rotated files.
 */

import { promises as fs } from "fs";
import * as path from "path";
import type { LogTransport, LogEntry, LogLevel } from "../types.js";

export interface FileTransportOptions {
  minLevel?: LogLevel;
  logDir: string;
  /** Base filename (default: "rowfill") */
  filename?: string;
  /** Bytes before rotation (default: 10 MB) */
  maxSize?: number;
  /** Rotated files kept next to the active one (default: 5) */
  maxFiles?: number;
  /** Injectable clock for the dated file name */
  now?: () => Date;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class FileTransport implements LogTransport {
  name = "file";
  minLevel: LogLevel;
  private readonly logDir: string;
  private readonly filename: string;
  private readonly maxSize: number;
  private readonly maxFiles: number;
  private readonly now: () => Date;
  private chain: Promise<void> = Promise.resolve();
  /** Size of the active file, read lazily once per file */
  private sizes = new Map<string, number>();
  private dirReady = false;
  private failed = false;

  constructor(options: FileTransportOptions) {
    this.minLevel = options.minLevel ?? "info";
    this.logDir = options.logDir;
    this.filename = options.filename ?? "rowfill";
    this.maxSize = options.maxSize ?? 10 * 1024 * 1024;
    this.maxFiles = options.maxFiles ?? 5;
    this.now = options.now ?? (() => new Date());
  }

  /** Path of the file written today. */
  currentPath(): string {
    const day = this.now().toISOString().slice(0, 10);
    return path.join(this.logDir, `${this.filename}-${day}.log`);
  }

  log(entry: LogEntry): Promise<void> {
    const line = JSON.stringify(entry) + "\n";
    this.chain = this.chain
      .then(() => this.append(line))
      .catch((err: unknown) => {
        // Report once; a broken log dir must not flood the console
        if (!this.failed) {
          this.failed = true;
          console.error(`[FileTransport] Cannot write to ${this.logDir}:`, err);
        }
      });
    return this.chain;
  }

  private async append(line: string): Promise<void> {
    if (!this.dirReady) {
      await fs.mkdir(this.logDir, { recursive: true });
      this.dirReady = true;
    }

    const file = this.currentPath();
    const bytes = Buffer.byteLength(line);
    let size = this.sizes.get(file) ?? await this.sizeOf(file);
    if (size > 0 && size + bytes > this.maxSize) {
      await this.rotate(file);
      size = 0;
    }

    await fs.appendFile(file, line, "utf-8");
    this.sizes.set(file, size + bytes);
  }

  private async sizeOf(file: string): Promise<number> {
    try {
      return (await fs.stat(file)).size;
    } catch (err) {
      if (isMissing(err)) return 0;
      throw err;
    }
  }

  private async rotate(file: string): Promise<void> {
    await fs.rm(`${file}.${this.maxFiles}`, { force: true });
    for (let i = this.maxFiles - 1; i >= 1; i--) {
      await this.renameIfPresent(`${file}.${i}`, `${file}.${i + 1}`);
    }
    await this.renameIfPresent(file, `${file}.1`);
  }

  private async renameIfPresent(from: string, to: string): Promise<void> {
    try {
      await fs.rename(from, to);
    } catch (err) {
      if (!isMissing(err)) throw err;
    }
  }

  async flush(): Promise<void> {
    await this.chain;
  }

  async close(): Promise<void> {
    await this.flush();
  }
}
