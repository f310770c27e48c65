/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * channelMap.ts: Channel id to guide number mapping for the tuner documents.
 */
import type { ChannelRecord } from "../types/index.js";
import { LOG } from "../utils/index.js";

/*
 * GUIDE NUMBER MAPPING
 *
 * HDHomeRun clients, M3U players, and XMLTV guides all identify channels by a number (GuideNumber, tvg-chno). TwitchTuner keys channels by Twitch login, so
 * this module assigns the numbers.
 *
 * A subscription can set an explicit number. Channels with an explicit number keep it, and every other channel is numbered from 1 upward in subscription order,
 * skipping numbers already claimed. Without explicit numbers the result is simply position + 1. When two subscriptions claim the same number, the first keeps it
 * and the second is auto-assigned.
 *
 * The mapping is rebuilt from the current snapshot on every request, so it always matches the documents served alongside it.
 */

// Auto-assigned numbers start here.
const AUTO_ASSIGN_START = 1;

/**
 * One channel with its guide number.
 */
export interface ChannelMapEntry {

  channel: ChannelRecord;
  number: number;
}

/**
 * Assigns guide numbers to channels.
 * @param channels - Channels in subscription order.
 * @returns Entries sorted by guide number.
 */
export function buildChannelMap(channels: readonly ChannelRecord[]): ChannelMapEntry[] {

  const taken = new Set<number>();
  const entries: ChannelMapEntry[] = [];
  const unassigned: ChannelRecord[] = [];

  for(const channel of channels) {

    if(channel.channelNumber === undefined) {

      unassigned.push(channel);

      continue;
    }

    if(taken.has(channel.channelNumber)) {

      LOG.warn("Channel number %s is already used. %s gets the next free number instead.", channel.channelNumber, channel.id);

      unassigned.push(channel);

      continue;
    }

    taken.add(channel.channelNumber);
    entries.push({ channel, number: channel.channelNumber });
  }

  let nextNumber = AUTO_ASSIGN_START;

  for(const channel of unassigned) {

    while(taken.has(nextNumber)) {

      nextNumber++;
    }

    taken.add(nextNumber);
    entries.push({ channel, number: nextNumber });
  }

  return entries.sort((a, b) => a.number - b.number);
}

/**
 * Looks up a channel by its guide number.
 * @param channels - Channels in subscription order.
 * @param channelNumber - The guide number.
 * @returns The channel, or undefined if no channel has this number.
 */
export function getChannelByNumber(channels: readonly ChannelRecord[], channelNumber: number): ChannelRecord | undefined {

  return buildChannelMap(channels).find((entry) => entry.number === channelNumber)?.channel;
}
