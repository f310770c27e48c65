/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * urlCache.ts: Time-bounded cache of discovered Twitch media URLs.
 */
import { LOG } from "../utils/index.js";

/* Discovering a channel's direct HLS URL costs an extractor run of a second or more. In discover mode the live pipeline caches the result so that channel surfing
 * back to the same channel skips the lookup. Twitch's signed URLs expire, so entries live for five minutes at most. The check is done inline on every read, which
 * makes correctness independent of the periodic sweep; sweep() only keeps the map from holding entries nobody will ask for again.
 *
 * The live pipeline invalidates a channel's entry when its session tears down, and the recording supervisor invalidates entries of channels that went offline, so a
 * stale URL is at worst used once.
 *
 * All operations are synchronous. JavaScript runs them to completion on the event loop, so no caller can observe a half-updated entry.
 */

// Fixed entry lifetime in milliseconds.
export const STREAM_URL_TTL = 5 * 60 * 1000;

/**
 * A cached discovery result.
 */
interface CacheEntry {

  readonly discoveredAt: number;
  readonly url: string;
}

/**
 * Maps channel ids to their most recently discovered media URL.
 */
export class StreamUrlCache {

  private readonly entries = new Map<string, CacheEntry>();
  private readonly now: () => number;
  private readonly ttl: number;

  /**
   * @param now - Clock in milliseconds. Tests pass a controllable one.
   * @param ttl - Entry lifetime. Defaults to five minutes.
   */
  constructor(now: () => number = Date.now, ttl = STREAM_URL_TTL) {

    this.now = now;
    this.ttl = ttl;
  }

  /**
   * Returns the cached URL for a channel. An entry at or past its lifetime is removed and reported as absent.
   * @param id - The channel id.
   * @returns The URL, or undefined on a miss.
   */
  public get(id: string): string | undefined {

    const entry = this.entries.get(id);

    if(!entry) {

      return undefined;
    }

    if((this.now() - entry.discoveredAt) >= this.ttl) {

      this.entries.delete(id);
      LOG.debug("streaming:cache", "Cached URL for %s expired.", id);

      return undefined;
    }

    return entry.url;
  }

  /**
   * Stores a freshly discovered URL, replacing any previous entry for the channel.
   * @param id - The channel id.
   * @param url - The direct media URL.
   */
  public put(id: string, url: string): void {

    this.entries.set(id, { discoveredAt: this.now(), url });
  }

  /**
   * Removes a channel's entry.
   * @param id - The channel id.
   * @returns True if an entry was removed.
   */
  public invalidate(id: string): boolean {

    const removed = this.entries.delete(id);

    if(removed) {

      LOG.debug("streaming:cache", "Invalidated cached URL for %s.", id);
    }

    return removed;
  }

  /**
   * Removes every expired entry.
   * @returns The number of entries removed.
   */
  public sweep(): number {

    const now = this.now();
    let removed = 0;

    for(const [ id, entry ] of this.entries) {

      if((now - entry.discoveredAt) >= this.ttl) {

        this.entries.delete(id);
        removed++;
      }
    }

    return removed;
  }

  /**
   * Number of entries currently held, expired or not.
   */
  public get size(): number {

    return this.entries.size;
  }
}
