/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * channelMap.test.ts: Tests for guide number assignment.
 */
import { buildChannelMap, getChannelByNumber } from "../../hdhr/channelMap.js";
import { describe, expect, test } from "@jest/globals";
import { makeChannel } from "../helpers/channels.js";

describe("buildChannelMap", () => {

  test("numbers channels by position when none set a number", () => {

    const entries = buildChannelMap([ makeChannel("alice", true), makeChannel("bob", false), makeChannel("carol", false) ]);

    expect(entries.map((entry) => [ entry.channel.id, entry.number ])).toEqual([ [ "alice", 1 ], [ "bob", 2 ], [ "carol", 3 ] ]);
  });

  test("explicit numbers are kept and auto-assigned numbers skip them", () => {

    const entries = buildChannelMap([ makeChannel("a", false), makeChannel("b", false, { channelNumber: 2 }), makeChannel("c", false),
      makeChannel("d", false, { channelNumber: 2 }) ]);

    expect(entries.map((entry) => [ entry.channel.id, entry.number ])).toEqual([ [ "a", 1 ], [ "b", 2 ], [ "c", 3 ], [ "d", 4 ] ]);
  });

  test("entries are sorted by number", () => {

    const entries = buildChannelMap([ makeChannel("high", false, { channelNumber: 50 }), makeChannel("auto", false) ]);

    expect(entries.map((entry) => entry.number)).toEqual([ 1, 50 ]);
  });
});

describe("getChannelByNumber", () => {

  test("finds the channel that holds a number", () => {

    const channels = [ makeChannel("alice", true, { channelNumber: 10 }), makeChannel("bob", false) ];

    expect(getChannelByNumber(channels, 10)?.id).toBe("alice");
    expect(getChannelByNumber(channels, 1)?.id).toBe("bob");
    expect(getChannelByNumber(channels, 2)).toBeUndefined();
  });
});
