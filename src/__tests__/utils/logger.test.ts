/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logger.test.ts: Tests for LOG routing, stream ids and the morgan adapter.
 */
import { LOG, setLogSink } from "../../utils/logger.js";
import { afterEach, beforeEach, describe, expect, test } from "@jest/globals";
import type { LogRecord } from "../../utils/logger.js";
import { createMorganStream } from "../../utils/morganStream.js";
import { initDebugFilter } from "../../utils/debugFilter.js";
import { runWithStreamContext } from "../../utils/streamContext.js";

describe("LOG", () => {

  let records: LogRecord[];

  beforeEach(() => {

    records = [];
    setLogSink((record) => records.push(record));
  });

  afterEach(() => {

    setLogSink(null);
    initDebugFilter("");
  });

  test("formats arguments and tags the level", () => {

    LOG.warn("Recorder for %s exited with %s.", "alice", "code 1");
    LOG.info("Plain message with 100% literal text.");

    expect(records).toEqual([ { level: "warn", message: "Recorder for alice exited with code 1." },
      { level: "info", message: "Plain message with 100% literal text." } ]);
  });

  test("messages inside a viewer session carry its stream id", async () => {

    await runWithStreamContext({ channelId: "alice", streamId: "alice-3" }, async () => {

      LOG.error("Write failed.");

      return Promise.resolve();
    });

    expect(records).toEqual([{ level: "error", message: "Write failed.", streamId: "alice-3" }]);
  });

  test("debug messages pass only for enabled categories", () => {

    LOG.debug("recording", "Filtered while debug is off.");

    initDebugFilter("recording,-recording:retention");
    LOG.debug("recording", "Tick for %s.", "alice");
    LOG.debug("recording:retention", "Excluded.");
    LOG.debug("pipeline", "Not selected.");

    expect(records).toEqual([{ category: "recording", level: "debug", message: "Tick for alice." }]);
  });

  test("the morgan stream logs each trimmed request line at info level", () => {

    const stream = createMorganStream();

    stream.write("GET /lineup.json from 127.0.0.1 responded 200 in 1.2 ms.\n");
    stream.write("\n");

    expect(records).toEqual([{ level: "info", message: "GET /lineup.json from 127.0.0.1 responded 200 in 1.2 ms." }]);
  });
});
