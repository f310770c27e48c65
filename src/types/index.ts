/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Type definitions for TwitchTuner.
 */

/**
 * A utility type that represents a value that can be null.
 * @typeParam T - The type that can be nullable.
 */
export type Nullable<T> = T | null;

/*
 * CONFIGURATION TYPES
 *
 * These interfaces define the structure of the application configuration. The Config interface is the root configuration object, with nested interfaces for each
 * functional area. Values are layered from hard-coded defaults, the user config file, environment variables, and CLI flags, then validated at startup.
 */

/**
 * How the live pipeline obtains media from Twitch.
 *
 * - "direct": the extractor writes the stream itself to stdout.
 * - "discover": the extractor only resolves the direct media URL, which is cached and handed to a separate fetch stage.
 */
export type ExtractionMode = "direct" | "discover";

/**
 * HTTP request logging levels understood by the morgan setup in app.ts.
 */
export type HttpLogLevel = "all" | "errors" | "filtered" | "none";

/**
 * HDHomeRun emulation settings.
 */
export interface HdhrConfig {

  // Eight hex digit device identifier reported to clients. Environment variable: HDHR_DEVICE_ID.
  deviceId: string;

  // Name shown in Plex and other clients for this tuner. Environment variable: HDHR_FRIENDLY_NAME.
  friendlyName: string;

  // Number of tuners advertised in discover.json and status.json. Environment variable: HDHR_TUNER_COUNT. Default: 5.
  tunerCount: number;
}

/**
 * Logging configuration.
 */
export interface LoggingConfig {

  // HTTP request logging level. Environment variable: HTTP_LOG_LEVEL. Default: "errors".
  httpLogLevel: HttpLogLevel;

  // Maximum log file size in bytes. When exceeded, the file is trimmed to half this size. Environment variable: LOG_MAX_SIZE. Default: 1048576.
  maxSize: number;
}

/**
 * Filesystem locations that can be overridden. Anything left null resolves inside the data directory.
 */
export interface PathsConfig {

  // Absolute path to the log file. Environment variable: TWITCHTUNER_LOG_FILE.
  logFile: Nullable<string>;
}

/**
 * Background recording settings.
 */
export interface RecordingConfig {

  // Master switch for the recording supervisor. Environment variable: RECORDING_ENABLED. Default: true.
  enabled: boolean;

  // Upper bound in milliseconds between reconciliation ticks when no snapshot update arrives. Environment variable: RECORDING_FALLBACK_INTERVAL. Default: 300000.
  fallbackInterval: number;

  // Root directory for recordings. When null, recordings go to <data-dir>/recordings. Environment variable: RECORDING_PATH.
  path: Nullable<string>;

  // Quality selector passed to the extractor for recordings. Environment variable: RECORDING_QUALITY. Default: "best".
  quality: string;

  // Extra extractor arguments for recordings, whitespace separated. Environment variable: RECORDER_ARGS.
  recorderArgs: string;

  // Recordings older than this many days are deleted by the hourly retention sweep. Environment variable: RETENTION_DAYS. Default: 7.
  retentionDays: number;
}

/**
 * HTTP server settings.
 */
export interface ServerConfig {

  // Public base URL used in generated playlists and lineups. When null, the URL is derived from each request. Environment variable: BASE_URL.
  baseUrl: Nullable<string>;

  // Interface address to bind. Environment variable: HOST. Default: "0.0.0.0".
  host: string;

  // TCP port to listen on. Environment variable: PORT. Default: 5000.
  port: number;
}

/**
 * Live streaming settings.
 */
export interface StreamingConfig {

  // Twitch URL template for a channel. "{channel}" is replaced by the login. Environment variable: CHANNEL_URL_TEMPLATE.
  channelUrlTemplate: string;

  // Largest chunk in bytes written to a viewer in one write. Environment variable: STREAM_CHUNK_SIZE. Default: 32768.
  chunkSize: number;

  // Extraction mode. Environment variable: EXTRACTION_MODE. Default: "direct".
  extractionMode: ExtractionMode;

  // Extractor executable. Environment variable: STREAMLINK_BIN. Default: "streamlink".
  extractor: string;

  // Extra extractor arguments for live viewing, whitespace separated. Environment variable: EXTRACTOR_ARGS.
  extractorArgs: string;

  // Fetch and transcode executable. Environment variable: FFMPEG_BIN. Default: "ffmpeg".
  fetcher: string;

  // Milliseconds between SIGTERM and SIGKILL during teardown. Environment variable: KILL_GRACE_PERIOD. Default: 5000.
  killGracePeriod: number;

  // Quality selector, comma separated in preference order. Environment variable: STREAM_QUALITY. Default: "1080p60,1080p,720p60,720p,best".
  quality: string;

  // Output arguments for an optional transcode stage. Empty disables the stage. Environment variable: TRANSCODE_ARGS.
  transcodeArgs: string;
}

/**
 * Twitch API and subscription settings.
 */
export interface TwitchConfig {

  // Absolute path to the subscriptions file. When null, <data-dir>/channels.json is used. Environment variable: SUBSCRIPTIONS_PATH.
  channelsFile: Nullable<string>;

  // Helix application client ID. Environment variable: CLIENT_ID.
  clientId: string;

  // Helix application client secret. Environment variable: CLIENT_SECRET.
  clientSecret: string;

  // Milliseconds between channel status refreshes. Environment variable: UPDATE_INTERVAL. Default: 300000.
  updateInterval: number;
}

/**
 * The root configuration object.
 */
export interface Config {

  hdhr: HdhrConfig;
  logging: LoggingConfig;
  paths: PathsConfig;
  recording: RecordingConfig;
  server: ServerConfig;
  streaming: StreamingConfig;
  twitch: TwitchConfig;
}

/*
 * CHANNEL TYPES
 *
 * A ChannelRecord is the read-only view of one subscribed Twitch channel at the time of the last refresh. Records are grouped into immutable snapshots that are replaced
 * wholesale by the channel refresher.
 */

/**
 * One subscribed Twitch channel.
 */
export interface ChannelRecord {

  // Profile image URL.
  readonly artworkUrl: string;

  // Current game or category name. Empty when offline.
  readonly category: string;

  // Explicit guide number from the subscriptions file, if any.
  readonly channelNumber?: number;

  readonly displayName: string;

  // Twitch login, lowercase. Used as the channel key throughout.
  readonly id: string;

  readonly live: boolean;

  // Whether the recording supervisor should record this channel while it is live.
  readonly recordingEnabled: boolean;

  readonly startedAt: Nullable<Date>;

  // Stream preview image. Empty when offline.
  readonly thumbnailUrl: string;

  // Current stream title. Empty when offline.
  readonly title: string;
}

/**
 * An immutable set of channel records and the time they were taken.
 */
export interface ChannelSnapshot {

  readonly channels: readonly ChannelRecord[];
  readonly takenAt: Date;
}

/*
 * HEALTH TYPES
 */

/**
 * Response shape for the /health endpoint.
 */
export interface HealthStatus {

  channels: {

    live: number;
    total: number;
  };

  // Whether the extractor executable responded to a version probe.
  extractorAvailable: boolean;

  lastRefresh: {

    error: Nullable<string>;
    time: Nullable<string>;
  };

  memory: {

    heapTotal: number;
    heapUsed: number;
    rss: number;
  };

  message?: string;

  recordings: {

    active: number;
    enabled: boolean;
  };

  status: "degraded" | "healthy";

  streams: {

    active: number;
    limit: number;
  };

  timestamp: string;

  // Process uptime in seconds.
  uptime: number;

  version: string;
}
