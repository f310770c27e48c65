/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * refresher.test.ts: Tests for the periodic channel refresh.
 */
import { type FetchFunction, TwitchClient } from "../../channels/twitch.js";
import { describe, expect, jest, test } from "@jest/globals";
import { ChannelRefresher } from "../../channels/refresher.js";
import { ChannelStore } from "../../channels/index.js";
import type { SubscriptionLoadResult } from "../../config/subscriptions.js";
import { createDeferred } from "../helpers/fakeProcess.js";
import { makeChannel } from "../helpers/channels.js";

const LOADED: SubscriptionLoadResult = {

  parseError: false,
  subscriptions: [ { channelNumber: 5, id: "alice", recordingEnabled: true }, { id: "bob", recordingEnabled: false } ],
  warnings: []
};

function createRefresher(client: TwitchClient, store: ChannelStore, load: () => Promise<SubscriptionLoadResult>): ChannelRefresher {

  return new ChannelRefresher({ client, interval: 60000, loadSubscriptions: load, store });
}

describe("ChannelRefresher", () => {

  test("without credentials every subscribed channel is published offline", async () => {

    const fetchMock = jest.fn<FetchFunction>();
    const store = new ChannelStore();
    const refresher = createRefresher(new TwitchClient({ clientId: "", clientSecret: "", fetch: fetchMock }), store, async () => Promise.resolve(LOADED));

    const snapshot = await refresher.refresh();

    expect(snapshot?.channels.map((channel) => [ channel.id, channel.live, channel.channelNumber, channel.recordingEnabled ])).toEqual([
      [ "alice", false, 5, true ],
      [ "bob", false, undefined, false ]
    ]);
    expect(fetchMock).not.toHaveBeenCalled();
    expect(refresher.lastRefresh.error).toBeNull();
    expect(refresher.lastRefresh.time).toBe(snapshot?.takenAt);
  });

  test("an unreadable subscriptions file keeps the previous snapshot and records the error", async () => {

    const store = new ChannelStore([makeChannel("alice", true)]);
    const refresher = createRefresher(new TwitchClient({ clientId: "", clientSecret: "" }), store, async () => Promise.resolve({

      parseError: true,
      parseErrorMessage: "Unexpected token } in JSON at position 12",
      subscriptions: [],
      warnings: []
    }));

    expect(await refresher.refresh()).toBeNull();
    expect(refresher.lastRefresh.error).toBe("The subscriptions file could not be read: Unexpected token } in JSON at position 12");
    expect(store.getChannel("alice")?.live).toBe(true);
  });

  test("a Twitch failure keeps the previous snapshot", async () => {

    const store = new ChannelStore([makeChannel("alice", true)]);
    const client = new TwitchClient({ clientId: "test-client", clientSecret: "test-secret", fetch: async () => Promise.resolve(new Response("", { status: 503 })) });
    const refresher = createRefresher(client, store, async () => Promise.resolve(LOADED));

    expect(await refresher.refresh()).toBeNull();
    expect(refresher.lastRefresh.error).toBe("Twitch token request failed with HTTP 503");
    expect(store.getChannels()).toHaveLength(1);
  });

  test("calls made while a refresh runs share it", async () => {

    const gate = createDeferred<SubscriptionLoadResult>();
    const load = jest.fn(async () => gate.promise);
    const refresher = createRefresher(new TwitchClient({ clientId: "", clientSecret: "" }), new ChannelStore(), load);

    const first = refresher.refresh();
    const second = refresher.refresh();

    gate.resolve(LOADED);

    expect(await first).toBe(await second);
    expect(load).toHaveBeenCalledTimes(1);

    await refresher.refresh();

    expect(load).toHaveBeenCalledTimes(2);
  });
});
