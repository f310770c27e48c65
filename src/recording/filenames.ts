/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * filenames.ts: Recording path construction for TwitchTuner.
 */
import type { ChannelRecord } from "../types/index.js";
import df from "dateformat";
import path from "node:path";

// Longest title kept in a recording filename.
export const MAX_TITLE_LENGTH = 50;

// Characters that are invalid in a filename on at least one of the filesystems we care about, plus ASCII control characters.
// eslint-disable-next-line no-control-regex
const INVALID_FILENAME_CHARACTERS = /[<>:"/\\|?*\u0000-\u001f]/g;

/**
 * Makes a string safe to use as a single path component. Invalid characters become underscores, surrounding whitespace and dots are trimmed, and an empty result is
 * replaced by the fallback.
 * @param value - The raw string.
 * @param fallback - Returned when nothing usable is left.
 * @returns The sanitized component.
 */
export function sanitizeFilename(value: string, fallback = "untitled"): string {

  const sanitized = value.replace(INVALID_FILENAME_CHARACTERS, "_").trim().replace(/^\.+|\.+$/g, "").trim();

  return (sanitized.length > 0) ? sanitized : fallback;
}

/**
 * Builds the output path for a new recording: <root>/<display name>/<start time> - <title>.ts.
 *
 * The start time is local time, formatted so that files sort chronologically by name.
 * @param root - Recording root directory.
 * @param channel - The channel being recorded.
 * @param startedAt - When the recording started.
 * @returns The absolute output path.
 */
export function buildRecordingPath(root: string, channel: ChannelRecord, startedAt: Date): string {

  const directory = sanitizeFilename(channel.displayName, channel.id);
  // Cut by code point so an emoji at the boundary is never split.
  const title = sanitizeFilename(Array.from(channel.title).slice(0, MAX_TITLE_LENGTH).join(""));

  return path.join(root, directory, [ df(startedAt, "yyyy-mm-dd_HH-MM-ss"), " - ", title, ".ts" ].join(""));
}
