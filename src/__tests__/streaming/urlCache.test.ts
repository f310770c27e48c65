/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * urlCache.test.ts: Tests for the discovered stream URL cache.
 */
import { STREAM_URL_TTL, StreamUrlCache } from "../../streaming/urlCache.js";
import { beforeEach, describe, expect, test } from "@jest/globals";

describe("StreamUrlCache", () => {

  let now: number;
  let cache: StreamUrlCache;

  beforeEach(() => {

    now = 1000000;
    cache = new StreamUrlCache(() => now);
  });

  test("returns a URL right after it is stored", () => {

    cache.put("bob", "https://video.example/bob/index.m3u8");

    expect(cache.get("bob")).toBe("https://video.example/bob/index.m3u8");
    expect(cache.get("alice")).toBeUndefined();
  });

  test("treats an entry as absent once the lifetime has elapsed", () => {

    cache.put("bob", "https://video.example/bob/index.m3u8");

    now += STREAM_URL_TTL - 1;
    expect(cache.get("bob")).toBe("https://video.example/bob/index.m3u8");

    now += 1;
    expect(cache.get("bob")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  test("replaces an entry and restarts its lifetime", () => {

    cache.put("bob", "https://video.example/old.m3u8");
    now += STREAM_URL_TTL - 10;
    cache.put("bob", "https://video.example/new.m3u8");
    now += 20;

    expect(cache.get("bob")).toBe("https://video.example/new.m3u8");
    expect(cache.size).toBe(1);
  });

  test("invalidate removes an entry and reports whether one existed", () => {

    cache.put("bob", "https://video.example/bob/index.m3u8");

    expect(cache.invalidate("bob")).toBe(true);
    expect(cache.invalidate("bob")).toBe(false);
    expect(cache.get("bob")).toBeUndefined();
  });

  test("sweep removes only expired entries", () => {

    cache.put("alice", "https://video.example/alice.m3u8");
    now += 4 * 60 * 1000;
    cache.put("bob", "https://video.example/bob.m3u8");
    now += 60 * 1000;

    expect(cache.sweep()).toBe(1);
    expect(cache.size).toBe(1);
    expect(cache.get("bob")).toBe("https://video.example/bob.m3u8");
  });

  test("honors a custom lifetime", () => {

    const short = new StreamUrlCache(() => now, 100);

    short.put("bob", "https://video.example/bob.m3u8");
    now += 100;

    expect(short.get("bob")).toBeUndefined();
  });
});
