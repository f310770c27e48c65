/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Configuration management for TwitchTuner.
 */
import type { Config, Nullable } from "../types/index.js";
import { LOG, getCurrentPattern, unknownDebugCategories } from "../utils/index.js";
import { cloneDefaults, forEachSetting, getNestedValue, loadUserConfig, mergeConfiguration } from "./userConfig.js";
import { getChannelsFilePath, getRecordingsDir } from "./paths.js";

/*
 * CONFIGURATION
 *
 * The CONFIG object centralizes all tunable parameters for the application. Configuration uses a layered approach with the following priority (highest to lowest):
 *
 * 1. Environment variables (SCREAMING_SNAKE_CASE naming)
 * 2. User config file (<data-dir>/config.json)
 * 3. Hard-coded defaults (defined in userConfig.ts)
 *
 * The settings are organized by functional area:
 *
 * - server: Network binding and the public base URL
 * - hdhr: Device identity reported to HDHomeRun clients
 * - streaming: Extractor and ffmpeg executables, quality, and pipeline tuning
 * - recording: The recording supervisor and retention
 * - twitch: Helix credentials, the subscriptions file, and the refresh interval
 * - logging and paths: Log file location and limits
 *
 * Configuration is initialized at startup via initializeConfiguration(). If validation fails, the process exits with a descriptive error message.
 */

// The CONFIG object is initialized during startup. It starts as a copy of DEFAULTS and is replaced by the merged configuration.
export let CONFIG: Config = cloneDefaults();

/**
 * Indicates whether a user config file parse error occurred during initialization.
 */
export let configParseError = false;

/**
 * The parse error message if configParseError is true.
 */
export let configParseErrorMessage: string | undefined;

/**
 * Initializes the configuration by loading the user config file, merging with defaults, and applying environment variable overrides. This must be called at startup
 * before any code accesses CONFIG.
 */
export async function initializeConfiguration(): Promise<void> {

  const result = await loadUserConfig();

  configParseError = result.parseError;
  configParseErrorMessage = result.parseErrorMessage;

  CONFIG = mergeConfiguration(result.config);

  LOG.info("Configuration initialized from defaults, user config, and environment variables.");
}

/*
 * CONFIGURATION VALIDATION
 *
 * Ranges and allowed values come from CONFIG_METADATA. All problems are collected and reported together.
 */

/**
 * Validates that a configuration value is a positive integer within an optional range.
 * @param name - The configuration name for error messages, typically the environment variable name.
 * @param value - The value to validate.
 * @param min - Optional minimum allowed value (inclusive).
 * @param max - Optional maximum allowed value (inclusive).
 * @returns Error message if invalid, null if valid.
 */
export function validatePositiveInt(name: string, value: number, min?: number, max?: number): Nullable<string> {

  if(!Number.isInteger(value) || (value < 1)) {

    return [ name, " must be a positive integer, got: ", String(value) ].join("");
  }

  return validateRange(name, value, min, max);
}

/**
 * Checks the optional bounds of a numeric value.
 */
function validateRange(name: string, value: number, min?: number, max?: number): Nullable<string> {

  if((min !== undefined) && (value < min)) {

    return [ name, " must be at least ", String(min), ", got: ", String(value) ].join("");
  }

  if((max !== undefined) && (value > max)) {

    return [ name, " must be at most ", String(max), ", got: ", String(value) ].join("");
  }

  return null;
}

/**
 * Validates all configuration values and throws an error if any are invalid.
 * @param config - The configuration to check. Defaults to CONFIG.
 * @throws If any configuration value is invalid. The error message lists all invalid values.
 */
export function validateConfiguration(config: Config = CONFIG): void {

  const errors: string[] = [];

  forEachSetting((setting) => {

    const name = setting.envVar ?? setting.path;
    const value = getNestedValue(config, setting.path);

    if(typeof value === "number") {

      // Zero is a meaningful value only where the minimum allows it, such as RETENTION_DAYS.
      const error = (setting.min === 0) ? (Number.isInteger(value) ? validateRange(name, value, setting.min, setting.max) :
        [ name, " must be an integer, got: ", String(value) ].join("")) : validatePositiveInt(name, value, setting.min, setting.max);

      if(error) {

        errors.push(error);
      }

      return;
    }

    if((typeof value === "string") && setting.validValues && !setting.validValues.includes(value)) {

      errors.push([ name, " must be one of ", setting.validValues.join(", "), ", got: ", value ].join(""));
    }
  });

  if(!/^[0-9a-fA-F]{8}$/.test(config.hdhr.deviceId) && (config.hdhr.deviceId !== "")) {

    errors.push("HDHR_DEVICE_ID must be eight hexadecimal digits, got: " + config.hdhr.deviceId);
  }

  if(!config.streaming.channelUrlTemplate.includes("{channel}")) {

    errors.push("CHANNEL_URL_TEMPLATE must contain {channel}, got: " + config.streaming.channelUrlTemplate);
  }

  if(config.server.baseUrl !== null) {

    try {

      const url = new URL(config.server.baseUrl);

      if((url.protocol !== "http:") && (url.protocol !== "https:")) {

        errors.push("BASE_URL must be an http or https URL, got: " + config.server.baseUrl);
      }
    } catch {

      errors.push("BASE_URL must be an absolute URL, got: " + config.server.baseUrl);
    }
  }

  if(errors.length > 0) {

    throw new Error([ "Configuration validation failed:\n  ", errors.join("\n  ") ].join(""));
  }
}

/**
 * Logs the most commonly adjusted values at startup.
 */
export function displayConfiguration(): void {

  const debugPattern = getCurrentPattern();

  LOG.info("Starting TwitchTuner with configuration:");
  LOG.info("  Server: %s:%s%s", CONFIG.server.host, CONFIG.server.port, CONFIG.server.baseUrl ? " (public URL " + CONFIG.server.baseUrl + ")" : "");
  LOG.info("  Tuner: %s, %s tuners, device ID %s", CONFIG.hdhr.friendlyName, CONFIG.hdhr.tunerCount, CONFIG.hdhr.deviceId || "pending");
  LOG.info("  Extraction mode: %s (quality %s)", CONFIG.streaming.extractionMode, CONFIG.streaming.quality);
  LOG.info("  Extractor: %s, fetcher: %s", CONFIG.streaming.extractor, CONFIG.streaming.fetcher);
  LOG.info("  Transcoding: %s", CONFIG.streaming.transcodeArgs ? CONFIG.streaming.transcodeArgs : "disabled");
  LOG.info("  Subscriptions: %s", getChannelsFilePath(CONFIG));
  LOG.info("  Recording: %s", CONFIG.recording.enabled ?
    [ getRecordingsDir(CONFIG), ", retention ", (CONFIG.recording.retentionDays > 0) ? String(CONFIG.recording.retentionDays) + " days" : "unlimited" ].join("") :
    "disabled");

  if(debugPattern) {

    LOG.info("  Debug categories: %s", debugPattern);

    const unknown = unknownDebugCategories();

    if(unknown.length > 0) {

      LOG.warn("TWITCHTUNER_DEBUG names unknown debug categor%s: %s.", (unknown.length === 1) ? "y" : "ies", unknown.join(", "));
    }
  }

  if(!CONFIG.twitch.clientId || !CONFIG.twitch.clientSecret) {

    LOG.warn("CLIENT_ID and CLIENT_SECRET are not both set. Channel status will not be available.");
  }
}
