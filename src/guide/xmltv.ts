/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * xmltv.ts: XMLTV program guide generation for TwitchTuner.
 */
import type { ChannelRecord } from "../types/index.js";
import { buildChannelMap } from "../hdhr/channelMap.js";
import df from "dateformat";
import { escapeXml } from "../utils/index.js";

/*
 * XMLTV GUIDE
 *
 * Twitch has no schedule, so the guide describes what is on right now. Each channel gets a single programme that started an hour ago and runs for the next day,
 * which keeps guide grids filled between refreshes. Live channels show the stream title and game; offline channels show a placeholder. The guide is rebuilt from
 * the current snapshot on every request, so it changes as soon as a channel goes live or offline.
 *
 * Channel ids are Twitch logins, matching tvg-id in the M3U playlist.
 */

// The programme window around the time the guide is generated.
const PROGRAMME_LEAD = 60 * 60 * 1000;
const PROGRAMME_LENGTH = 24 * 60 * 60 * 1000;

/**
 * Formats a time in XMLTV's "YYYYMMDDhhmmss +0000" form, in UTC.
 * @param date - The time.
 * @returns The formatted time.
 */
export function formatXmltvTime(date: Date): string {

  return df(date, "yyyymmddHHMMss", true) + " +0000";
}

/**
 * Returns the programme text for a channel.
 */
function describe(channel: ChannelRecord): { category: string; desc: string; title: string } {

  if(!channel.live) {

    return { category: "Offline", desc: "Channel is currently offline", title: channel.displayName + " is Offline" };
  }

  return {

    category: channel.category,
    desc: channel.category ? "Playing " + channel.category : "Live on Twitch",
    title: channel.title || (channel.displayName + " is Live")
  };
}

/**
 * Generates the XMLTV document.
 * @param channels - Channels in subscription order.
 * @param now - The time the guide is generated.
 * @returns The XML document.
 */
export function generateXmltv(channels: readonly ChannelRecord[], now: Date): string {

  const entries = buildChannelMap(channels);
  const start = formatXmltvTime(new Date(now.getTime() - PROGRAMME_LEAD));
  const stop = formatXmltvTime(new Date(now.getTime() + PROGRAMME_LENGTH));
  const lines = [ "<?xml version=\"1.0\" encoding=\"utf-8\"?>", "<tv generator-info-name=\"TwitchTuner\">" ];

  // XMLTV requires every channel element before the first programme.
  for(const { channel, number } of entries) {

    lines.push("  <channel id=\"" + escapeXml(channel.id) + "\">");
    lines.push("    <display-name>" + escapeXml(channel.displayName) + "</display-name>");
    lines.push("    <display-name>" + String(number) + "</display-name>");

    if(channel.artworkUrl) {

      lines.push("    <icon src=\"" + escapeXml(channel.artworkUrl) + "\" />");
    }

    lines.push("  </channel>");
  }

  for(const { channel } of entries) {

    const { category, desc, title } = describe(channel);
    const icon = (channel.live && channel.thumbnailUrl) ? channel.thumbnailUrl : channel.artworkUrl;

    lines.push("  <programme start=\"" + start + "\" stop=\"" + stop + "\" channel=\"" + escapeXml(channel.id) + "\">");
    lines.push("    <title>" + escapeXml(title) + "</title>");
    lines.push("    <desc>" + escapeXml(desc) + "</desc>");

    if(category) {

      lines.push("    <category>" + escapeXml(category) + "</category>");
    }

    if(icon) {

      lines.push("    <icon src=\"" + escapeXml(icon) + "\" />");
    }

    lines.push("  </programme>");
  }

  lines.push("</tv>");

  return lines.join("\n") + "\n";
}
