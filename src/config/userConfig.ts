/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * userConfig.ts: User configuration file management for TwitchTuner.
 */
import type { Config, Nullable } from "../types/index.js";
import { LOG, formatError, getErrorCode } from "../utils/index.js";
import fs from "node:fs";
import { getConfigFilePath } from "./paths.js";
import path from "node:path";

const { promises: fsPromises } = fs;

/*
 * USER CONFIGURATION FILE
 *
 * TwitchTuner stores user configuration in <data-dir>/config.json. The configuration system uses a layered approach:
 *
 * 1. Hard-coded defaults (defined in DEFAULTS)
 * 2. User config file (<data-dir>/config.json)
 * 3. Environment variables
 * 4. CLI flags (applied by index.ts after merging)
 *
 * Container deployments configure everything through environment variables. The variable names for the Twitch credentials, base URL, quality, and file locations
 * are the ones earlier tuner setups used, so an existing environment carries over unchanged.
 */

/*
 * SETTING METADATA
 *
 * Each configurable setting has metadata describing its type, valid range, environment variable name, and human-readable description. The metadata drives merging,
 * validation, and the --list-env output.
 */

/**
 * Metadata describing a single configuration setting. Default values are not stored here to avoid duplication. Use getNestedValue(DEFAULTS, setting.path) to get
 * the default value for a setting.
 */
export interface SettingMetadata {

  // Human-readable description shown by --list-env.
  description: string;

  // Environment variable that can override this setting, or null if not overridable.
  envVar: string | null;

  // Maximum allowed value for numeric settings.
  max?: number;

  // Minimum allowed value for numeric settings.
  min?: number;

  // True if the setting may be null. An empty environment variable sets it to null.
  nullable?: boolean;

  // Dot-separated path to the setting (e.g., "streaming.quality").
  path: string;

  // Data type for parsing and validation.
  type: "boolean" | "host" | "integer" | "path" | "port" | "string";

  // Valid values for string type settings.
  validValues?: string[];

  // Unit of measurement shown by --list-env (e.g., "ms", "bytes").
  unit?: string;
}

/**
 * Metadata for all configurable settings, organized by category.
 */
export const CONFIG_METADATA: Record<string, SettingMetadata[]> = {

  hdhr: [
    {

      description: "Eight hex digit HDHomeRun device ID. Generated and saved to config.json on first start when empty or invalid.",
      envVar: "HDHR_DEVICE_ID",
      path: "hdhr.deviceId",
      type: "string"
    },
    {

      description: "Tuner name shown by Plex and other HDHomeRun clients.",
      envVar: "HDHR_FRIENDLY_NAME",
      path: "hdhr.friendlyName",
      type: "string"
    },
    {

      description: "Number of tuners advertised to clients.",
      envVar: "HDHR_TUNER_COUNT",
      max: 32,
      min: 1,
      path: "hdhr.tunerCount",
      type: "integer"
    }
  ],

  logging: [
    {

      description: "HTTP request logging level. \"none\" disables, \"errors\" logs 4xx and 5xx only, \"filtered\" skips tuner polling noise, \"all\" logs everything.",
      envVar: "HTTP_LOG_LEVEL",
      path: "logging.httpLogLevel",
      type: "string",
      validValues: [ "none", "errors", "filtered", "all" ]
    },
    {

      description: "Maximum log file size. When exceeded, the file is trimmed to half this size.",
      envVar: "LOG_MAX_SIZE",
      max: 104857600,
      min: 10240,
      path: "logging.maxSize",
      type: "integer",
      unit: "bytes"
    }
  ],

  paths: [
    {

      description: "Absolute path to the log file. Defaults to twitchtuner.log in the data directory.",
      envVar: "TWITCHTUNER_LOG_FILE",
      nullable: true,
      path: "paths.logFile",
      type: "path"
    }
  ],

  recording: [
    {

      description: "Record subscribed channels while they are live.",
      envVar: "RECORDING_ENABLED",
      path: "recording.enabled",
      type: "boolean"
    },
    {

      description: "Root directory for recordings. Defaults to the recordings directory inside the data directory.",
      envVar: "RECORDING_PATH",
      nullable: true,
      path: "recording.path",
      type: "path"
    },
    {

      description: "Quality selector passed to the extractor for recordings.",
      envVar: "RECORDING_QUALITY",
      path: "recording.quality",
      type: "string"
    },
    {

      description: "Extra extractor arguments for recordings, whitespace separated.",
      envVar: "RECORDER_ARGS",
      path: "recording.recorderArgs",
      type: "string"
    },
    {

      description: "Recordings older than this many days are deleted. Zero keeps recordings forever.",
      envVar: "RETENTION_DAYS",
      max: 3650,
      min: 0,
      path: "recording.retentionDays",
      type: "integer",
      unit: "days"
    },
    {

      description: "Longest wait between recording reconciliation passes when no channel update arrives.",
      envVar: "RECORDING_FALLBACK_INTERVAL",
      max: 3600000,
      min: 10000,
      path: "recording.fallbackInterval",
      type: "integer",
      unit: "ms"
    }
  ],

  server: [
    {

      description: "Public base URL used in lineups and playlists. Leave empty to derive it from each request.",
      envVar: "BASE_URL",
      nullable: true,
      path: "server.baseUrl",
      type: "string"
    },
    {

      description: "Interface address to bind. Use 0.0.0.0 for all interfaces.",
      envVar: "HOST",
      path: "server.host",
      type: "host"
    },
    {

      description: "TCP port for the HTTP server.",
      envVar: "PORT",
      max: 65535,
      min: 1,
      path: "server.port",
      type: "port"
    }
  ],

  streaming: [
    {

      description: "Twitch channel URL template. {channel} is replaced by the channel login.",
      envVar: "CHANNEL_URL_TEMPLATE",
      path: "streaming.channelUrlTemplate",
      type: "string"
    },
    {

      description: "Largest chunk written to a viewer in one write.",
      envVar: "STREAM_CHUNK_SIZE",
      max: 1048576,
      min: 1024,
      path: "streaming.chunkSize",
      type: "integer",
      unit: "bytes"
    },
    {

      description: "\"direct\" streams through the extractor. \"discover\" resolves and caches the media URL and fetches it with ffmpeg.",
      envVar: "EXTRACTION_MODE",
      path: "streaming.extractionMode",
      type: "string",
      validValues: [ "direct", "discover" ]
    },
    {

      description: "Extractor executable (streamlink or a compatible tool).",
      envVar: "STREAMLINK_BIN",
      path: "streaming.extractor",
      type: "path"
    },
    {

      description: "Extra extractor arguments for live viewing, whitespace separated.",
      envVar: "EXTRACTOR_ARGS",
      path: "streaming.extractorArgs",
      type: "string"
    },
    {

      description: "ffmpeg executable used for the fetch and transcode stages.",
      envVar: "FFMPEG_BIN",
      path: "streaming.fetcher",
      type: "path"
    },
    {

      description: "Time between SIGTERM and SIGKILL when stopping a pipeline.",
      envVar: "KILL_GRACE_PERIOD",
      max: 60000,
      min: 100,
      path: "streaming.killGracePeriod",
      type: "integer",
      unit: "ms"
    },
    {

      description: "Stream quality, comma separated in order of preference.",
      envVar: "STREAM_QUALITY",
      path: "streaming.quality",
      type: "string"
    },
    {

      description: "ffmpeg output arguments for an optional transcode stage. Leave empty to pass the stream through unchanged.",
      envVar: "TRANSCODE_ARGS",
      path: "streaming.transcodeArgs",
      type: "string"
    }
  ],

  twitch: [
    {

      description: "Absolute path to the subscriptions file. Defaults to channels.json in the data directory.",
      envVar: "SUBSCRIPTIONS_PATH",
      nullable: true,
      path: "twitch.channelsFile",
      type: "path"
    },
    {

      description: "Twitch application client ID.",
      envVar: "CLIENT_ID",
      path: "twitch.clientId",
      type: "string"
    },
    {

      description: "Twitch application client secret.",
      envVar: "CLIENT_SECRET",
      path: "twitch.clientSecret",
      type: "string"
    },
    {

      description: "Time between channel status refreshes.",
      envVar: "UPDATE_INTERVAL",
      max: 86400000,
      min: 30000,
      path: "twitch.updateInterval",
      type: "integer",
      unit: "ms"
    }
  ]
};

/**
 * The parsed contents of config.json. Any JSON object is accepted; only paths named in CONFIG_METADATA are read from it.
 */
export type UserConfig = Record<string, unknown>;

/**
 * Result of loading user config.
 */
export interface UserConfigLoadResult {

  // The loaded configuration (empty object if file missing or parse error).
  config: UserConfig;

  // True if the config file exists but contains invalid JSON.
  parseError: boolean;

  // Error message if parseError is true.
  parseErrorMessage?: string;
}

/**
 * Narrows a value to a plain object.
 * @param value - The value to check.
 * @returns True if the value is a non-null, non-array object.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {

  return (typeof value === "object") && (value !== null) && !Array.isArray(value);
}

/*
 * CONFIG FILE OPERATIONS
 */

/**
 * Loads user configuration from the config file. Returns an empty config if the file doesn't exist, and sets parseError if the file exists but contains invalid
 * JSON or is not a JSON object.
 * @param filePath - Defaults to config.json in the data directory.
 * @returns The loaded configuration with parse status.
 */
export async function loadUserConfig(filePath = getConfigFilePath()): Promise<UserConfigLoadResult> {

  let content: string;

  try {

    content = await fsPromises.readFile(filePath, "utf-8");
  } catch(error) {

    // File doesn't exist - this is normal, use defaults.
    if(getErrorCode(error) === "ENOENT") {

      return { config: {}, parseError: false };
    }

    LOG.warn("Failed to read configuration file %s: %s. Using defaults.", filePath, formatError(error));

    return { config: {}, parseError: false };
  }

  try {

    const parsed: unknown = JSON.parse(content);

    if(!isPlainObject(parsed)) {

      throw new Error("the top level must be a JSON object");
    }

    return { config: parsed, parseError: false };
  } catch(parseError) {

    const message = formatError(parseError);

    LOG.warn("Invalid JSON in configuration file %s: %s. Using defaults.", filePath, message);

    return { config: {}, parseError: true, parseErrorMessage: message };
  }
}

/**
 * Saves user configuration to the config file. Creates the data directory if it doesn't exist.
 * @param config - The configuration to save.
 * @param filePath - Defaults to config.json in the data directory.
 * @throws If the file cannot be written.
 */
export async function saveUserConfig(config: UserConfig, filePath = getConfigFilePath()): Promise<void> {

  await fsPromises.mkdir(path.dirname(filePath), { recursive: true });
  await fsPromises.writeFile(filePath, JSON.stringify(config, null, 2) + "\n", "utf-8");

  LOG.info("Configuration saved to %s.", filePath);
}

/*
 * CONFIGURATION MERGING
 */

/**
 * Hard-coded default configuration values. These are the baseline values used when neither user config nor environment variables provide a value.
 */
export const DEFAULTS: Config = {

  hdhr: {

    deviceId: "",
    friendlyName: "Twitch Tuner",
    tunerCount: 5
  },

  logging: {

    httpLogLevel: "errors",
    maxSize: 1048576
  },

  paths: {

    logFile: null
  },

  recording: {

    enabled: true,
    fallbackInterval: 300000,
    path: null,
    quality: "best",
    recorderArgs: "--retry-streams 10 --retry-max 5",
    retentionDays: 7
  },

  server: {

    baseUrl: null,
    host: "0.0.0.0",
    port: 5000
  },

  streaming: {

    channelUrlTemplate: "https://www.twitch.tv/{channel}",
    chunkSize: 32768,
    extractionMode: "direct",
    extractor: "streamlink",
    extractorArgs: "--hls-live-edge 3 --stream-segment-threads 2",
    fetcher: "ffmpeg",
    killGracePeriod: 5000,
    quality: "1080p60,1080p,720p60,720p,best",
    transcodeArgs: ""
  },

  twitch: {

    channelsFile: null,
    clientId: "",
    clientSecret: "",
    updateInterval: 300000
  }
};

/**
 * Returns a deep copy of the defaults.
 * @returns A fresh Config object.
 */
export function cloneDefaults(): Config {

  return structuredClone(DEFAULTS);
}

/**
 * Parses an environment variable value according to the setting type.
 * @param value - The raw environment variable value.
 * @param setting - The setting being parsed.
 * @returns The parsed value, or undefined if parsing fails.
 */
export function parseEnvValue(value: string, setting: SettingMetadata): Nullable<boolean | number | string> | undefined {

  if(setting.nullable && (value.trim() === "")) {

    return null;
  }

  switch(setting.type) {

    case "boolean": {

      // Accept common truthy values for environment variables.
      const lower = value.toLowerCase();

      return (lower === "true") || (lower === "1") || (lower === "yes");
    }

    case "integer":
    case "port": {

      const num = Number(value.trim());

      return ((value.trim() === "") || Number.isNaN(num)) ? undefined : num;
    }

    default: {

      return value;
    }
  }
}

/**
 * Gets a value from a nested object using a dot-separated path.
 * @param obj - The object to read from.
 * @param settingPath - Dot-separated path (e.g., "streaming.quality").
 * @returns The value at the path, or undefined if not found.
 */
export function getNestedValue(obj: unknown, settingPath: string): unknown {

  let current: unknown = obj;

  for(const part of settingPath.split(".")) {

    if(!isPlainObject(current)) {

      return undefined;
    }

    current = current[part];
  }

  return current;
}

/**
 * Sets a value in a nested object using a dot-separated path, creating intermediate objects as needed. Existing non-object values along the path are replaced.
 * @param obj - The object to modify.
 * @param settingPath - Dot-separated path (e.g., "hdhr.deviceId").
 * @param value - The value to set.
 */
export function setNestedValue(obj: Record<string, unknown>, settingPath: string, value: unknown): void {

  const parts = settingPath.split(".");
  let current = obj;

  for(const part of parts.slice(0, -1)) {

    const next = current[part];

    if(isPlainObject(next)) {

      current = next;

      continue;
    }

    const created: Record<string, unknown> = {};

    current[part] = created;
    current = created;
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Checks that a value has the shape a setting expects. Range checks are left to validateConfiguration() so that every problem is reported together.
 * @param setting - The setting.
 * @param value - The candidate value.
 * @returns True if the value can be stored.
 */
function acceptsValue(setting: SettingMetadata, value: unknown): boolean {

  if(value === null) {

    return setting.nullable === true;
  }

  switch(setting.type) {

    case "boolean":

      return typeof value === "boolean";

    case "integer":
    case "port":

      return (typeof value === "number") && !Number.isNaN(value);

    default:

      return typeof value === "string";
  }
}

/**
 * Stores a value into the typed configuration at a setting's path. The section and key must already exist in the configuration, which is always true for
 * settings listed in CONFIG_METADATA since DEFAULTS defines every one of them.
 * @param config - The configuration being built.
 * @param setting - The setting.
 * @param value - The value, already checked with acceptsValue().
 * @returns True if the value was stored.
 */
export function applySetting(config: Config, setting: SettingMetadata, value: unknown): boolean {

  const [ section, key ] = setting.path.split(".");
  const target: unknown = getNestedValue(config, section);

  if(!isPlainObject(target) || !(key in target) || !acceptsValue(setting, value)) {

    return false;
  }

  return Reflect.set(target, key, value);
}

/**
 * Calls a function for every setting in CONFIG_METADATA.
 * @param fn - Called with each setting.
 */
export function forEachSetting(fn: (setting: SettingMetadata) => void): void {

  for(const settings of Object.values(CONFIG_METADATA)) {

    for(const setting of settings) {

      fn(setting);
    }
  }
}

/**
 * Merges user configuration with defaults and environment overrides to produce the final configuration. Priority: env vars > user config > defaults. Values of
 * the wrong type are ignored with a warning and the lower layer's value is kept.
 * @param userConfig - User configuration from the config file.
 * @param env - Environment to read overrides from. Defaults to process.env.
 * @returns The merged configuration.
 */
export function mergeConfiguration(userConfig: UserConfig, env: NodeJS.ProcessEnv = process.env): Config {

  const config = cloneDefaults();

  // Apply user config values.
  forEachSetting((setting) => {

    const userValue = getNestedValue(userConfig, setting.path);

    if((userValue !== undefined) && !applySetting(config, setting, userValue)) {

      LOG.warn("Ignoring %s in config.json: expected a %s value, got %s.", setting.path, setting.type, JSON.stringify(userValue));
    }
  });

  // Apply environment variable overrides (highest priority).
  forEachSetting((setting) => {

    const envValue = setting.envVar ? env[setting.envVar] : undefined;

    if(envValue === undefined) {

      return;
    }

    const parsedValue = parseEnvValue(envValue, setting);

    if((parsedValue === undefined) || !applySetting(config, setting, parsedValue)) {

      LOG.warn("Ignoring %s=%s: expected a %s value.", setting.envVar, envValue, setting.type);
    }
  });

  return config;
}
