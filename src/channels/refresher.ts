/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * refresher.ts: Periodic channel status refresh for TwitchTuner.
 */
import type { ChannelSnapshot, Nullable } from "../types/index.js";
import { LOG, formatError } from "../utils/index.js";
import type { ChannelStore } from "./index.js";
import type { SubscriptionLoadResult } from "../config/subscriptions.js";
import type { TwitchClient } from "./twitch.js";
import { offlineRecord } from "./twitch.js";

/* The refresher is the only writer of the channel store. Each refresh re-reads the subscriptions file, so edits take effect without a restart, asks Twitch for the
 * state of every subscribed channel, and publishes the result as a new snapshot. A failed refresh leaves the previous snapshot in place and is reported through
 * lastRefresh, which the health endpoint exposes.
 *
 * Without Twitch credentials the subscribed channels are still published, all offline. The tuner documents then list them, and direct streaming still works
 * because the extractor does not need the API.
 */

/**
 * When the last refresh ran and how it went.
 */
export interface RefreshStatus {

  error: Nullable<string>;
  time: Nullable<Date>;
}

export interface ChannelRefresherOptions {

  client: TwitchClient;

  // Milliseconds between refreshes.
  interval: number;

  loadSubscriptions: () => Promise<SubscriptionLoadResult>;
  store: ChannelStore;
}

/**
 * Keeps the channel store current.
 */
export class ChannelRefresher {

  private readonly client: TwitchClient;
  private inFlight: Nullable<Promise<Nullable<ChannelSnapshot>>> = null;
  private readonly interval: number;
  private readonly loadSubscriptions: () => Promise<SubscriptionLoadResult>;
  private pollInterval: Nullable<ReturnType<typeof setInterval>> = null;
  private status: RefreshStatus = { error: null, time: null };
  private readonly store: ChannelStore;
  private warnedNoCredentials = false;

  constructor(options: ChannelRefresherOptions) {

    this.client = options.client;
    this.interval = options.interval;
    this.loadSubscriptions = options.loadSubscriptions;
    this.store = options.store;
  }

  /**
   * Refreshes immediately, then on every interval.
   */
  public start(): void {

    if(this.pollInterval) {

      return;
    }

    void this.refresh();

    this.pollInterval = setInterval(() => {

      void this.refresh();
    }, this.interval);
  }

  public stop(): void {

    if(this.pollInterval) {

      clearInterval(this.pollInterval);
      this.pollInterval = null;
    }
  }

  /**
   * Refreshes the channel store. A call made while a refresh is running shares its result. Never rejects.
   * @returns The published snapshot, or null if the refresh failed.
   */
  public async refresh(): Promise<Nullable<ChannelSnapshot>> {

    this.inFlight ??= this.performRefresh().finally(() => {

      this.inFlight = null;
    });

    return this.inFlight;
  }

  public get lastRefresh(): RefreshStatus {

    return { ...this.status };
  }

  private async performRefresh(): Promise<Nullable<ChannelSnapshot>> {

    try {

      const loaded = await this.loadSubscriptions();

      if(loaded.parseError) {

        throw new Error("The subscriptions file could not be read: " + (loaded.parseErrorMessage ?? "unknown error"));
      }

      let snapshot: ChannelSnapshot;

      if(!this.client.hasCredentials) {

        if(!this.warnedNoCredentials) {

          LOG.warn("Twitch client credentials are not configured. Channels are listed as offline and recording is inactive.");
          this.warnedNoCredentials = true;
        }

        snapshot = this.store.replace(loaded.subscriptions.map(offlineRecord));
      } else {

        snapshot = this.store.replace(await this.client.fetchChannels(loaded.subscriptions));
      }

      this.status = { error: null, time: snapshot.takenAt };

      return snapshot;
    } catch(error) {

      this.status = { error: formatError(error), time: new Date() };

      LOG.warn("Channel refresh failed: %s. Keeping the previous channel list.", formatError(error));

      return null;
    }
  }
}
