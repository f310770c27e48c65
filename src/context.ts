/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * context.ts: Shared application services for TwitchTuner.
 */
import type { Config, Nullable } from "./types/index.js";
import type { ChannelRefresher } from "./channels/refresher.js";
import type { ChannelStore } from "./channels/index.js";
import type { LiveStreamService } from "./streaming/mpegts.js";
import type { RecordingSupervisor } from "./recording/supervisor.js";
import type { SessionRegistry } from "./streaming/registry.js";
import type { StreamUrlCache } from "./streaming/urlCache.js";

/**
 * The services created at startup and handed to every route. There is exactly one of each per process.
 */
export interface AppContext {

  config: Config;
  liveService: LiveStreamService;
  refresher: ChannelRefresher;
  registry: SessionRegistry;
  store: ChannelStore;

  // Null when recording is disabled.
  supervisor: Nullable<RecordingSupervisor>;

  urlCache: StreamUrlCache;
}
