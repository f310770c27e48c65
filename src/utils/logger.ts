/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logger.ts: Leveled logging for TwitchTuner.
 */
import { ANSI_RESET, LEVEL_COLORS, writeLogEntry } from "./fileLogger.js";
import { initDebugFilter, isAnyDebugEnabled, isCategoryEnabled } from "./debugFilter.js";
import type { Nullable } from "../types/index.js";
import { format } from "util";
import { getStreamId } from "./streamContext.js";

/* Every message becomes a LogRecord and goes to exactly one sink. The file sink is the default; --console switches to the console sink, which console-stamp
 * timestamps. Messages logged inside a viewer session carry that session's stream id, taken from the async context.
 */

export type LogLevel = "debug" | "error" | "info" | "warn";

/**
 * One formatted log message.
 */
export interface LogRecord {

  // Debug category, for debug records.
  readonly category?: string;

  readonly level: LogLevel;
  readonly message: string;
  readonly streamId?: string;
}

export type LogSink = (record: LogRecord) => void;

const consoleSink: LogSink = (record) => {

  const color = LEVEL_COLORS[record.level];
  const text = record.streamId ? [ "[", record.streamId, "] ", record.message ].join("") : record.message;
  const line = color ? [ color, text, ANSI_RESET ].join("") : text;

  /* eslint-disable no-console */
  switch(record.level) {

    case "error":

      console.error(line);

      break;

    case "warn":

      console.warn(line);

      break;

    default:

      console.log(line);

      break;
  }
  /* eslint-enable no-console */
};

let consoleLogging = false;
let overrideSink: Nullable<LogSink> = null;

/**
 * Chooses between the console sink and the file sink.
 * @param enabled - True for the console.
 */
export function setConsoleLogging(enabled: boolean): void {

  consoleLogging = enabled;
}

/**
 * Routes every record to the given sink instead of the console or file. Passing null restores the normal routing.
 */
export function setLogSink(sink: Nullable<LogSink>): void {

  overrideSink = sink;
}

/**
 * Hands a record to the active sink.
 */
export function emitLog(record: LogRecord): void {

  if(overrideSink) {

    overrideSink(record);
  } else if(consoleLogging) {

    consoleSink(record);
  } else {

    writeLogEntry(record);
  }
}

/**
 * Enables every debug category, or none. Used by --debug when TWITCHTUNER_DEBUG is unset.
 */
export function setDebugLogging(enabled: boolean): void {

  initDebugFilter(enabled ? "*" : "");
}

function log(level: LogLevel, message: string, args: unknown[], category?: string): void {

  const id = getStreamId();

  emitLog({

    ...(category ? { category } : {}),
    level,
    message: (args.length > 0) ? format(message, ...args) : message,
    ...(id ? { streamId: id } : {})
  });
}

/**
 * The application logger. Messages are printf-style format strings for util.format().
 */
export const LOG = {

  /**
   * Logs a debug message when its category passes the TWITCHTUNER_DEBUG filter.
   * @param category - The debug category, e.g. "pipeline" or "recording:retention".
   */
  debug: function(category: string, message: string, ...args: unknown[]): void {

    if(isAnyDebugEnabled() && isCategoryEnabled(category)) {

      log("debug", message, args, category);
    }
  },

  error: function(message: string, ...args: unknown[]): void {

    log("error", message, args);
  },

  info: function(message: string, ...args: unknown[]): void {

    log("info", message, args);
  },

  warn: function(message: string, ...args: unknown[]): void {

    log("warn", message, args);
  }
};
