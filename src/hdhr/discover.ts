/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * discover.ts: HDHomeRun discovery and lineup endpoints for TwitchTuner.
 */
import type { ChannelRecord, HdhrConfig } from "../types/index.js";
import type { Express, Request, Response } from "express";
import type { AppContext } from "../context.js";
import type { ViewerSession } from "../streaming/registry.js";
import { escapeXml, getPackageVersion } from "../utils/index.js";
import { buildChannelMap } from "./channelMap.js";
import { resolveBaseUrl } from "../routes/playlist.js";

/* These endpoints implement the HDHomeRun HTTP API that Plex and other clients use to identify, configure, and monitor tuners. They are served by the main HTTP
 * server, so the stream URLs in lineup.json point back at the same host and port the client used. Plex does not auto-detect emulated tuners; users enter the
 * address in Plex's DVR setup.
 *
 * The document builders are plain functions of the configuration and the channel snapshot. The route handlers only resolve the base URL and serialize.
 */

// Identity reported to clients. "HDTC-2US" is a model Plex recognizes.
const MANUFACTURER = "TwitchTuner";
const MODEL_NUMBER = "HDTC-2US";
const FIRMWARE_NAME = "hdhomeruntc_atsc";

/**
 * Response body of /discover.json.
 */
export interface DiscoverDocument {

  BaseURL: string;
  DeviceAuth: string;
  DeviceID: string;
  FirmwareName: string;
  FirmwareVersion: string;
  FriendlyName: string;
  LineupURL: string;
  Manufacturer: string;
  ModelNumber: string;
  TunerCount: number;
}

/**
 * One entry of /lineup.json.
 */
export interface LineupEntry {

  GuideName: string;
  GuideNumber: string;
  URL: string;
}

/**
 * Tuner status entry for the /status.json endpoint. Active tuners include channel info and signal stats; idle tuners have only Resource.
 */
export interface TunerStatusEntry {

  // RF tuning frequency in Hz. Always 0 for IP-based tuners.
  Frequency?: number;

  // Tuner identifier (e.g., "tuner0", "tuner1").
  Resource: string;

  // Signal percentages are always 100 for network streams.
  SignalQualityPercent?: number;
  SignalStrengthPercent?: number;
  SymbolQualityPercent?: number;

  // Client IP address receiving the stream.
  TargetIP?: string;

  VctName?: string;

  // Guide number as a string.
  VctNumber?: string;
}

/**
 * Builds the /discover.json document.
 * @param hdhr - Tuner identity settings.
 * @param baseUrl - Base URL the client used.
 * @returns The document.
 */
export function buildDiscoverDocument(hdhr: HdhrConfig, baseUrl: string): DiscoverDocument {

  // DeviceAuth must be non-empty. There is no DRM context, so the DeviceID doubles as it.
  return {

    BaseURL: baseUrl,
    DeviceAuth: hdhr.deviceId.toUpperCase(),
    DeviceID: hdhr.deviceId.toUpperCase(),
    FirmwareName: FIRMWARE_NAME,
    FirmwareVersion: getPackageVersion(),
    FriendlyName: hdhr.friendlyName,
    LineupURL: baseUrl + "/lineup.json",
    Manufacturer: MANUFACTURER,
    ModelNumber: MODEL_NUMBER,
    TunerCount: hdhr.tunerCount
  };
}

/**
 * Builds the UPnP device description served at /device.xml.
 * @param hdhr - Tuner identity settings.
 * @param baseUrl - Base URL the client used.
 * @returns The XML document.
 */
export function buildDeviceXml(hdhr: HdhrConfig, baseUrl: string): string {

  const deviceId = hdhr.deviceId.toUpperCase();

  return [
    "<?xml version=\"1.0\" encoding=\"UTF-8\"?>",
    "<root xmlns=\"urn:schemas-upnp-org:device-1-0\">",
    "  <specVersion>",
    "    <major>1</major>",
    "    <minor>0</minor>",
    "  </specVersion>",
    "  <URLBase>" + escapeXml(baseUrl) + "</URLBase>",
    "  <device>",
    "    <deviceType>urn:schemas-upnp-org:device:MediaServer:1</deviceType>",
    "    <friendlyName>" + escapeXml(hdhr.friendlyName) + "</friendlyName>",
    "    <manufacturer>" + MANUFACTURER + "</manufacturer>",
    "    <modelName>" + MODEL_NUMBER + "</modelName>",
    "    <modelNumber>" + MODEL_NUMBER + "</modelNumber>",
    "    <serialNumber>" + deviceId + "</serialNumber>",
    "    <UDN>uuid:" + deviceId + "</UDN>",
    "  </device>",
    "</root>"
  ].join("\n");
}

/**
 * Builds the channel lineup. Every subscribed channel is listed whether or not it is live; tuning an offline channel fails at stream time.
 * @param channels - Channels in subscription order.
 * @param baseUrl - Base URL for stream links.
 * @returns Lineup entries in guide number order.
 */
export function buildLineup(channels: readonly ChannelRecord[], baseUrl: string): LineupEntry[] {

  return buildChannelMap(channels).map((entry) => ({

    GuideName: entry.channel.displayName,
    GuideNumber: String(entry.number),
    URL: baseUrl + "/stream/" + entry.channel.id
  }));
}

/**
 * Builds the /status.json tuner table. Sessions fill tuner slots in the order they started; remaining slots up to the tuner count are idle. When more viewers are
 * connected than there are tuners, every session is still listed.
 * @param channels - Channels in subscription order.
 * @param sessions - Active viewer sessions, oldest first.
 * @param tunerCount - Advertised tuner count.
 * @returns One entry per tuner slot.
 */
export function buildTunerStatus(channels: readonly ChannelRecord[], sessions: readonly ViewerSession[], tunerCount: number): TunerStatusEntry[] {

  const numbers = new Map(buildChannelMap(channels).map((entry): [string, number] => [ entry.channel.id, entry.number ]));
  const names = new Map(channels.map((channel): [string, string] => [ channel.id, channel.displayName ]));
  const tuners: TunerStatusEntry[] = [];

  for(const [ index, session ] of sessions.entries()) {

    const tuner: TunerStatusEntry = {

      Frequency: 0,
      Resource: "tuner" + String(index),
      SignalQualityPercent: 100,
      SignalStrengthPercent: 100,
      SymbolQualityPercent: 100,
      VctName: names.get(session.channelId) ?? session.channelId
    };

    const number = numbers.get(session.channelId);

    if(number !== undefined) {

      tuner.VctNumber = String(number);
    }

    // Normalize IPv6-mapped IPv4 addresses (::ffff:192.168.1.1 becomes 192.168.1.1).
    if(session.clientAddress) {

      tuner.TargetIP = session.clientAddress.startsWith("::ffff:") ? session.clientAddress.slice(7) : session.clientAddress;
    }

    tuners.push(tuner);
  }

  for(let i = sessions.length; i < tunerCount; i++) {

    tuners.push({ Resource: "tuner" + String(i) });
  }

  return tuners;
}

/**
 * Sets up the HDHomeRun discovery and lineup endpoints on the main Express app.
 * @param app - The Express application.
 * @param ctx - Application services.
 */
export function setupHdhrEndpoints(app: Express, ctx: AppContext): void {

  // GET /device.xml - UPnP device description. Plex fetches this during discovery before querying discover.json.
  app.get("/device.xml", (req: Request, res: Response): void => {

    res.set("Content-Type", "text/xml");
    res.send(buildDeviceXml(ctx.config.hdhr, resolveBaseUrl(req, ctx.config)));
  });

  app.get("/discover.json", (req: Request, res: Response): void => {

    res.json(buildDiscoverDocument(ctx.config.hdhr, resolveBaseUrl(req, ctx.config)));
  });

  app.get("/lineup.json", (req: Request, res: Response): void => {

    res.json(buildLineup(ctx.store.getChannels(), resolveBaseUrl(req, ctx.config)));
  });

  // GET /lineup_status.json - Channels are configured rather than scanned, so the scan is always complete.
  app.get("/lineup_status.json", (_req: Request, res: Response): void => {

    res.json({

      ScanInProgress: 0,
      ScanPossible: 1,
      Source: "Cable",
      SourceList: ["Cable"]
    });
  });

  // POST /lineup.post - Plex posts scan=start during setup. There is nothing to scan.
  app.post("/lineup.post", (_req: Request, res: Response): void => {

    res.sendStatus(200);
  });

  // GET /status.json - Real-time tuner activity for monitoring dashboards.
  app.get("/status.json", (_req: Request, res: Response): void => {

    res.json(buildTunerStatus(ctx.store.getChannels(), ctx.registry.getAll(), ctx.config.hdhr.tunerCount));
  });
}
