/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * app.test.ts: Tests for HTTP request log filtering.
 */
import { describe, expect, test } from "@jest/globals";
import { shouldSkipRequestLog } from "../app.js";

describe("shouldSkipRequestLog", () => {

  test("\"all\" logs everything", () => {

    expect(shouldSkipRequestLog("all", "/health", 200)).toBe(false);
  });

  test("\"errors\" logs failures except missing browser assets", () => {

    expect(shouldSkipRequestLog("errors", "/lineup.json", 200)).toBe(true);
    expect(shouldSkipRequestLog("errors", "/stream/alice", 500)).toBe(false);
    expect(shouldSkipRequestLog("errors", "/favicon.ico", 404)).toBe(true);
    expect(shouldSkipRequestLog("errors", "/favicon.ico", 500)).toBe(false);
    expect(shouldSkipRequestLog("errors", "/nope", 404)).toBe(false);
  });

  test("\"filtered\" skips successful polling only", () => {

    expect(shouldSkipRequestLog("filtered", "/discover.json", 200)).toBe(true);
    expect(shouldSkipRequestLog("filtered", "/status.json", 200)).toBe(true);
    expect(shouldSkipRequestLog("filtered", "/health", 503)).toBe(false);
    expect(shouldSkipRequestLog("filtered", "/stream/alice", 200)).toBe(false);
  });

  test("\"none\" skips everything", () => {

    expect(shouldSkipRequestLog("none", "/stream/alice", 500)).toBe(true);
  });
});
