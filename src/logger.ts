import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

import { loadDigraphConfig, type LogLevelSetting } from "./config/digraphConfig.js";

/**
 * Default maximum size (in bytes) of the primary log file before a rotation is
 * triggered.
 */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MiB

/** Default number of log files retained during rotation, the active one included. */
const DEFAULT_MAX_FILE_COUNT = 5;

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevelSetting, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Number.POSITIVE_INFINITY,
};

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  /** Minimum level written to stdout and the log file. Defaults to `info`. */
  readonly level?: LogLevelSetting;
  readonly logFile?: string | null;
  /** Maximum size in bytes before the active log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of historical log files to retain (including the active one). */
  readonly maxFileCount?: number;
  /**
   * Optional listener invoked every time an entry passes the level threshold.
   * Tests use it to observe entries without parsing stdout.
   */
  readonly onEntry?: (entry: LogEntry) => void;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function describeError(error: unknown): { message: string } {
  return { message: error instanceof Error ? error.message : String(error) };
}

/**
 * Structured logger that emits JSON lines on stdout and optionally mirrors them
 * to a file. File writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger {
  private readonly threshold: number;
  private readonly logFile?: string;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly entryListener?: (entry: LogEntry) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  /** Whether the directory holding {@link logFile} has been created already. */
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.threshold = LEVEL_RANK[options.level ?? "info"];
    this.logFile = options.logFile ?? undefined;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    this.entryListener = options.onEntry;
  }

  /** Whether entries at {@link level} pass the configured threshold. */
  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= this.threshold;
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  /** Waits for all pending log writes to be flushed. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(payload !== undefined ? { payload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    process.stdout.write(line);
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }

    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue
      .then(async () => {
        try {
          await this.ensureLogDestination(logFile);
          await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
          await appendFile(logFile, line, "utf8");
        } catch (error) {
          this.reportFailure("log_file_write_failed", describeError(error));
          // Let the next entry retry the directory creation.
          this.logDirectoryReady = false;
        }
      })
      .catch((error: unknown) => {
        this.reportFailure("log_queue_failed", describeError(error));
        this.writeQueue = Promise.resolve();
      });
  }

  private reportFailure(message: string, payload: unknown): void {
    const entry: LogEntry = { timestamp: new Date().toISOString(), level: "error", message, payload };
    process.stderr.write(`${JSON.stringify(entry)}\n`);
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  /**
   * Rotates the active log file when appending {@link pendingBytes} would
   * exceed the configured size limit.
   */
  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    let currentSize: number;
    try {
      currentSize = (await stat(logFile)).size;
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw error;
    }

    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    const keep = this.maxFileCount;
    if (keep === 1) {
      await rm(logFile, { force: true });
      return;
    }

    await rm(`${logFile}.${keep - 1}`, { force: true });
    for (let index = keep - 2; index >= 0; index -= 1) {
      const source = index === 0 ? logFile : `${logFile}.${index}`;
      try {
        await rename(source, `${logFile}.${index + 1}`);
      } catch (error) {
        if (!isMissingFile(error)) {
          throw error;
        }
      }
    }
  }
}

let defaultLogger: StructuredLogger | undefined;

/**
 * Returns the process-wide logger configured through `DIGRAPH_LOG_LEVEL` and
 * `DIGRAPH_LOG_FILE`. Graphs constructed without an explicit logger use it.
 */
export function getDefaultLogger(): StructuredLogger {
  if (!defaultLogger) {
    const config = loadDigraphConfig();
    defaultLogger = new StructuredLogger({ level: config.logLevel, logFile: config.logFile });
  }
  return defaultLogger;
}
