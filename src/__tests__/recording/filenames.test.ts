/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * filenames.test.ts: Tests for recording path construction.
 */
import { MAX_TITLE_LENGTH, buildRecordingPath, sanitizeFilename } from "../../recording/filenames.js";
import { describe, expect, test } from "@jest/globals";
import type { ChannelRecord } from "../../types/index.js";
import path from "node:path";

function channel(displayName: string, title: string): ChannelRecord {

  return {

    artworkUrl: "",
    category: "Art",
    displayName,
    id: "alice",
    live: true,
    recordingEnabled: true,
    startedAt: null,
    thumbnailUrl: "",
    title
  };
}

describe("sanitizeFilename", () => {

  test("replaces characters that are invalid on common filesystems", () => {

    expect(sanitizeFilename("a<b>:c")).toBe("a_b__c");
    expect(sanitizeFilename("who/what\\why?")).toBe("who_what_why_");
    expect(sanitizeFilename("tab\there")).toBe("tab_here");
  });

  test("trims whitespace and dots and falls back when nothing is left", () => {

    expect(sanitizeFilename("  ..hidden..  ")).toBe("hidden");
    expect(sanitizeFilename("...")).toBe("untitled");
    expect(sanitizeFilename("", "alice")).toBe("alice");
  });
});

describe("buildRecordingPath", () => {

  const startedAt = new Date(2026, 2, 5, 9, 7, 3);

  test("groups recordings by channel and names them by start time and title", () => {

    expect(buildRecordingPath("/recordings", channel("Alice", "Any% run"), startedAt)).toBe(path.join("/recordings", "Alice", "2026-03-05_09-07-03 - Any% run.ts"));
  });

  test("sanitizes the directory and truncates long titles", () => {

    const title = "x".repeat(MAX_TITLE_LENGTH + 10);

    expect(buildRecordingPath("/recordings", channel("Alice/Bob", title), startedAt)).toBe(path.join("/recordings", "Alice_Bob", "2026-03-05_09-07-03 - " +
      "x".repeat(MAX_TITLE_LENGTH) + ".ts"));
  });

  test("truncation never splits an emoji", () => {

    const title = "x".repeat(MAX_TITLE_LENGTH - 1) + "\u{1F3AE}\u{1F3AE}";

    expect(buildRecordingPath("/recordings", channel("Alice", title), startedAt)).toBe(path.join("/recordings", "Alice", "2026-03-05_09-07-03 - " +
      "x".repeat(MAX_TITLE_LENGTH - 1) + "\u{1F3AE}.ts"));
  });

  test("uses placeholders when the name or title is unusable", () => {

    expect(buildRecordingPath("/recordings", channel("..", ""), startedAt)).toBe(path.join("/recordings", "alice", "2026-03-05_09-07-03 - untitled.ts"));
  });
});
