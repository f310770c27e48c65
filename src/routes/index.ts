/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Route aggregator for TwitchTuner.
 */
import type { AppContext } from "../context.js";
import type { Express } from "express";
import { setupChannelsEndpoint } from "./channels.js";
import { setupEpgEndpoint } from "./epg.js";
import { setupHdhrEndpoints } from "../hdhr/discover.js";
import { setupHealthEndpoint } from "./health.js";
import { setupMpegTsRoutes } from "./mpegts.js";
import { setupPlaylistEndpoint } from "./playlist.js";
import { setupRecordingsEndpoint } from "./recordings.js";
import { setupStreamsEndpoint } from "./streams.js";

/*
 * ROUTE SETUP
 *
 * This module aggregates all route setup functions and provides a single function to configure all HTTP endpoints on the Express application.
 */

/**
 * Configures all HTTP endpoints on the Express application.
 * @param app - The Express application.
 * @param ctx - Application services.
 */
export function setupRoutes(app: Express, ctx: AppContext): void {

  setupChannelsEndpoint(app, ctx);
  setupEpgEndpoint(app, ctx);
  setupHdhrEndpoints(app, ctx);
  setupHealthEndpoint(app, ctx);
  setupMpegTsRoutes(app, ctx);
  setupPlaylistEndpoint(app, ctx);
  setupRecordingsEndpoint(app, ctx);
  setupStreamsEndpoint(app, ctx);
}

export { generatePlaylistContent, resolveBaseUrl, setupPlaylistEndpoint } from "./playlist.js";
export { setupChannelsEndpoint } from "./channels.js";
export { setupEpgEndpoint } from "./epg.js";
export { setupHealthEndpoint } from "./health.js";
export { setupMpegTsRoutes } from "./mpegts.js";
export { setupRecordingsEndpoint } from "./recordings.js";
export { setupStreamsEndpoint } from "./streams.js";
