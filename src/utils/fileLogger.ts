/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * fileLogger.ts: Size-capped log file sink for TwitchTuner.
 */
import { formatError, getErrorCode } from "./errors.js";
import type { LogLevel, LogRecord } from "./logger.js";
import type { Nullable } from "../types/index.js";
import df from "dateformat";
import fs from "node:fs";
import path from "node:path";

const { promises: fsPromises } = fs;

/* Lines are buffered in memory and appended once a second, with a synchronous flush on shutdown. Once the file grows past logging.maxSize, it is cut down to its
 * newest half at a line boundary, written to a temporary file and renamed over the original.
 */

const FLUSH_INTERVAL = 1000;

// ANSI colors per level, shared with the console sink so both read the same in a terminal.
export const LEVEL_COLORS: Readonly<Record<LogLevel, string>> = {

  debug: "\x1b[36m",
  error: "\x1b[31m",
  info: "",
  warn: "\x1b[33m"
};

export const ANSI_RESET = "\x1b[0m";

/**
 * Formats a record as one log file line: timestamp, level tag (omitted for info), stream id, message.
 * @param record - The record.
 * @param now - The timestamp to print.
 * @returns The line, newline included.
 */
export function formatLogLine(record: LogRecord, now: Date): string {

  const color = LEVEL_COLORS[record.level];
  const tag = (record.level === "info") ? "" : [ "[", record.level.toUpperCase(), record.category ? ":" + record.category : "", "] " ].join("");
  const stream = record.streamId ? [ "[", record.streamId, "] " ].join("") : "";

  return [ "[", df(now, "yyyy/mm/dd HH:MM:ss.l"), "] ", color, tag, stream, record.message, color ? ANSI_RESET : "", "\n" ].join("");
}

/**
 * An append-only log file with a size cap.
 */
export class LogFile {

  private buffer: string[] = [];
  private readonly filePath: string;
  private flushing: Promise<void> = Promise.resolve();
  private readonly maxSize: number;
  private size = 0;
  private timer: Nullable<ReturnType<typeof setInterval>> = null;

  constructor(filePath: string, maxSize: number) {

    this.filePath = filePath;
    this.maxSize = maxSize;
  }

  /**
   * Creates the file and its directory if needed and starts the flush timer.
   */
  public async open(): Promise<void> {

    await fsPromises.mkdir(path.dirname(this.filePath), { recursive: true });

    try {

      this.size = (await fsPromises.stat(this.filePath)).size;
    } catch(error) {

      if(getErrorCode(error) !== "ENOENT") {

        throw error;
      }

      await fsPromises.writeFile(this.filePath, "", "utf-8");
      this.size = 0;
    }

    this.timer = setInterval((): void => {

      void this.flush();
    }, FLUSH_INTERVAL);
  }

  public append(line: string): void {

    this.buffer.push(line);
  }

  /**
   * Appends everything buffered so far. Flushes run one after another, so lines stay in order.
   */
  public async flush(): Promise<void> {

    this.flushing = this.flushing.then(async () => this.writeBuffer());

    return this.flushing;
  }

  /**
   * Appends everything buffered so far without yielding. Used on exit, when no further I/O callbacks will run.
   */
  public flushSync(): void {

    if(this.buffer.length === 0) {

      return;
    }

    const content = this.buffer.join("");

    this.buffer = [];

    try {

      fs.appendFileSync(this.filePath, content, "utf-8");
      this.size += Buffer.byteLength(content);
    } catch(error) {

      // eslint-disable-next-line no-console
      console.error("Unable to write the final log entries to %s: %s.", this.filePath, formatError(error));
    }
  }

  /**
   * Stops the flush timer and writes what is left.
   */
  public close(): void {

    if(this.timer) {

      clearInterval(this.timer);
      this.timer = null;
    }

    this.flushSync();
  }

  private async writeBuffer(): Promise<void> {

    if(this.buffer.length === 0) {

      return;
    }

    const content = this.buffer.join("");

    this.buffer = [];

    try {

      await fsPromises.appendFile(this.filePath, content, "utf-8");
      this.size += Buffer.byteLength(content);

      if(this.size > this.maxSize) {

        await this.trim();
      }
    } catch(error) {

      // The logger cannot log its own failures.
      // eslint-disable-next-line no-console
      console.error("Unable to write to the log file %s: %s.", this.filePath, formatError(error));
    }
  }

  private async trim(): Promise<void> {

    const content = await fsPromises.readFile(this.filePath);
    let start = content.length - Math.floor(this.maxSize / 2);

    if(start <= 0) {

      this.size = content.length;

      return;
    }

    const newline = content.indexOf(0x0a, start);

    if(newline !== -1) {

      start = newline + 1;
    }

    const tempPath = this.filePath + ".tmp";

    await fsPromises.writeFile(tempPath, content.subarray(start));
    await fsPromises.rename(tempPath, this.filePath);

    this.size = content.length - start;
  }
}

// The file behind the default sink. Null until initializeFileLogger() succeeds, and records are dropped until then.
let activeFile: Nullable<LogFile> = null;

/**
 * Opens the log file for the default sink. A file that cannot be opened disables file logging rather than stopping the server.
 * @param logPath - Absolute path of the log file.
 * @param maxSize - logging.maxSize, in bytes.
 */
export async function initializeFileLogger(logPath: string, maxSize: number): Promise<void> {

  const file = new LogFile(logPath, maxSize);

  try {

    await file.open();
    activeFile = file;
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Unable to open the log file %s: %s. File logging is disabled.", logPath, formatError(error));
  }
}

/**
 * The default sink.
 */
export function writeLogEntry(record: LogRecord): void {

  activeFile?.append(formatLogLine(record, new Date()));
}

export function flushLogBufferSync(): void {

  activeFile?.flushSync();
}

export function shutdownFileLogger(): void {

  activeFile?.close();
  activeFile = null;
}
