/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * morganStream.ts: Routes morgan's request log into the LOG sinks.
 */
import type { StreamOptions } from "morgan";
import { emitLog } from "./logger.js";

/**
 * Creates the stream morgan writes request lines to. Each line becomes an info record without a stream id, since morgan reports after the response has finished,
 * outside any one session's logging.
 * @returns The morgan stream option.
 */
export function createMorganStream(): StreamOptions {

  return {

    write: (line: string): void => {

      const message = line.trim();

      if(message) {

        emitLog({ level: "info", message });
      }
    }
  };
}
