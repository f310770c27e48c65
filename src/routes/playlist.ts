/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * playlist.ts: M3U playlist route for TwitchTuner.
 */
import type { ChannelRecord, Config } from "../types/index.js";
import type { Express, Request, Response } from "express";
import type { AppContext } from "../context.js";
import { buildChannelMap } from "../hdhr/channelMap.js";

/* The playlist endpoint generates an extended M3U playlist for IPTV clients (Jellyfin, Threadfin, VLC, Channels DVR). Each channel carries the attributes those
 * clients use to match it with the XMLTV guide: tvg-id is the channel login, which is also the XMLTV channel id, and tvg-chno is the guide number from the lineup.
 */

/**
 * Resolves the base URL for generated links. A configured server.baseUrl wins. Otherwise headers are examined in priority order so that links use the host and
 * protocol the client connected with, even behind a reverse proxy:
 *
 * 1. X-Forwarded-Host header (set by reverse proxies like nginx, Traefik)
 * 2. Host header (standard HTTP/1.1 header)
 * 3. Fallback to configured server host and port
 *
 * For protocol, Express's req.protocol already respects X-Forwarded-Proto when trust proxy is enabled.
 *
 * @param req - The Express request object.
 * @param config - The application configuration.
 * @returns The base URL without a trailing slash (e.g., "http://192.168.1.10:5000").
 */
export function resolveBaseUrl(req: Request, config: Config): string {

  if(config.server.baseUrl) {

    return config.server.baseUrl.replace(/\/+$/, "");
  }

  // X-Forwarded-Host may list several hosts when proxied through multiple layers. The first is the one the client used.
  const forwardedHost = req.get("x-forwarded-host");
  const host = forwardedHost ? forwardedHost.split(",")[0].trim() : req.get("host");

  return req.protocol + "://" + (host ?? (config.server.host + ":" + String(config.server.port)));
}

/**
 * Makes a value safe inside a double-quoted M3U attribute.
 */
function attributeValue(value: string): string {

  return value.replace(/"/g, "'").replace(/[\r\n]+/g, " ");
}

/**
 * Generates the M3U playlist.
 * @param channels - Channels in subscription order.
 * @param baseUrl - The base URL for stream links (e.g., "http://localhost:5000").
 * @returns The playlist, one EXTINF line and one URL line per channel.
 */
export function generatePlaylistContent(channels: readonly ChannelRecord[], baseUrl: string): string {

  const lines = ["#EXTM3U"];

  for(const { channel, number } of buildChannelMap(channels)) {

    const name = attributeValue(channel.displayName);

    lines.push([
      "#EXTINF:-1 tvg-id=\"", channel.id, "\" tvg-chno=\"", String(number), "\" tvg-name=\"", name, "\" tvg-logo=\"", attributeValue(channel.artworkUrl),
      "\" group-title=\"Twitch\",", name
    ].join(""));
    lines.push(baseUrl + "/stream/" + channel.id);
  }

  return lines.join("\n") + "\n";
}

/**
 * Creates the playlist endpoints. /playlist.m3u is the canonical path; /playlist is kept for clients configured with the shorter form.
 * @param app - The Express application.
 * @param ctx - Application services.
 */
export function setupPlaylistEndpoint(app: Express, ctx: AppContext): void {

  app.get([ "/playlist.m3u", "/playlist" ], (req: Request, res: Response): void => {

    res.set("Content-Type", "audio/x-mpegurl");
    res.send(generatePlaylistContent(ctx.store.getChannels(), resolveBaseUrl(req, ctx.config)));
  });
}
