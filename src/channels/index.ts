/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Channel snapshot store for TwitchTuner.
 */
import type { ChannelRecord, ChannelSnapshot } from "../types/index.js";
import { EventEmitter } from "node:events";
import { LOG } from "../utils/index.js";

/*
 * CHANNEL SNAPSHOT
 *
 * The store holds the most recent set of channel records. The refresher builds a complete new list and hands it to replace(), which freezes it and swaps the
 * reference in one assignment. Readers that took the previous snapshot keep a consistent view of it; nothing ever mutates a published snapshot.
 *
 * Every replace() emits "updated" with the new snapshot. The recording supervisor listens so that it reconciles as soon as a channel goes live or offline.
 */

export type SnapshotListener = (snapshot: ChannelSnapshot) => void;

/**
 * Holds the current channel snapshot.
 */
export class ChannelStore extends EventEmitter {

  private snapshot: ChannelSnapshot;

  /**
   * @param initial - Records to start with. Defaults to none.
   */
  constructor(initial: readonly ChannelRecord[] = []) {

    super();

    this.snapshot = freezeSnapshot(initial, new Date());
  }

  public getSnapshot(): ChannelSnapshot {

    return this.snapshot;
  }

  public getChannels(): readonly ChannelRecord[] {

    return this.snapshot.channels;
  }

  /**
   * @param id - The channel login. Matched case-insensitively.
   * @returns The record, or undefined if the channel is not subscribed.
   */
  public getChannel(id: string): ChannelRecord | undefined {

    const key = id.toLowerCase();

    return this.snapshot.channels.find((channel) => channel.id === key);
  }

  /**
   * Publishes a new snapshot and notifies listeners.
   * @param records - The complete new channel list.
   * @param takenAt - When the data was fetched. Defaults to now.
   * @returns The published snapshot.
   */
  public replace(records: readonly ChannelRecord[], takenAt = new Date()): ChannelSnapshot {

    const snapshot = freezeSnapshot(records, takenAt);

    this.snapshot = snapshot;

    LOG.debug("channels", "Snapshot replaced: %s channel%s, %s live.", snapshot.channels.length, (snapshot.channels.length === 1) ? "" : "s", this.liveCount);

    this.emit("updated", snapshot);

    return snapshot;
  }

  /**
   * Subscribes to snapshot updates.
   * @param listener - Called with each new snapshot.
   * @returns A function that removes the listener.
   */
  public onUpdate(listener: SnapshotListener): () => void {

    this.on("updated", listener);

    return (): void => {

      this.off("updated", listener);
    };
  }

  /**
   * Number of live channels in the current snapshot.
   */
  public get liveCount(): number {

    return this.snapshot.channels.filter((channel) => channel.live).length;
  }
}

/**
 * Copies and freezes a record list into a snapshot.
 */
function freezeSnapshot(records: readonly ChannelRecord[], takenAt: Date): ChannelSnapshot {

  return Object.freeze({ channels: Object.freeze(records.map((record) => Object.freeze({ ...record }))), takenAt });
}
