/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * subscriptions.ts: Channel subscription file loading for TwitchTuner.
 */
import { LOG, formatError, getErrorCode } from "../utils/index.js";
import { promises as fsPromises } from "node:fs";

/*
 * SUBSCRIPTIONS FILE
 *
 * The subscriptions file lists the Twitch channels the tuner carries, in guide order. It is JSON, and a few shapes are accepted so that a list can be written by
 * hand without ceremony:
 *
 *   [ "alice", "https://www.twitch.tv/bob" ]
 *   { "channels": [ "alice", { "login": "bob", "record": false, "number": 12 } ] }
 *   { "subscriptions": { "Alice": "https://www.twitch.tv/alice" } }
 *
 * The map form (also accepted under "twitch_recorder") matches the layout older tuner setups used, where each friendly name points at a channel URL. Names are
 * ignored; the login is always taken from the URL.
 */

// Twitch login names: 1 to 25 characters of lowercase letters, digits, and underscores.
const LOGIN_PATTERN = /^[a-z0-9_]{1,25}$/;

/**
 * One subscribed channel.
 */
export interface Subscription {

  // Explicit guide number, if the entry sets one.
  channelNumber?: number;

  // Twitch login, lowercase.
  id: string;

  recordingEnabled: boolean;
}

/**
 * Result of parsing subscription data.
 */
export interface SubscriptionParseResult {

  subscriptions: Subscription[];

  // One message per skipped entry.
  warnings: string[];
}

/**
 * Result of loading the subscriptions file.
 */
export interface SubscriptionLoadResult extends SubscriptionParseResult {

  // True if the file exists but could not be parsed.
  parseError: boolean;

  parseErrorMessage?: string;
}

/**
 * Extracts a Twitch login from a login or a channel URL. For URLs, the last non-empty path segment is used.
 * @param value - "alice", "twitch.tv/alice", or "https://www.twitch.tv/alice/".
 * @returns The lowercase login, or null if the value does not contain a valid one.
 */
export function parseLogin(value: string): string | null {

  let candidate = value.trim();

  if(candidate.includes("/")) {

    try {

      const url = new URL(candidate.includes("://") ? candidate : "https://" + candidate);

      candidate = url.pathname.split("/").filter((segment) => segment.length > 0).pop() ?? "";
    } catch {

      return null;
    }
  }

  candidate = candidate.toLowerCase();

  return LOGIN_PATTERN.test(candidate) ? candidate : null;
}

/**
 * Narrows a value to a plain object.
 */
function isRecord(value: unknown): value is Record<string, unknown> {

  return (typeof value === "object") && (value !== null) && !Array.isArray(value);
}

/**
 * Returns the list of raw entries for any of the accepted file shapes.
 * @param data - Parsed JSON.
 * @returns The entries, or null if the shape is not recognized.
 */
function extractEntries(data: unknown): unknown[] | null {

  if(Array.isArray(data)) {

    return data;
  }

  if(!isRecord(data)) {

    return null;
  }

  if(Array.isArray(data.channels)) {

    return data.channels;
  }

  const map = data.subscriptions ?? data.twitch_recorder;

  if(isRecord(map)) {

    return Object.values(map);
  }

  return null;
}

/**
 * Converts parsed subscription data to subscriptions. Invalid entries are skipped with a warning, and when a login appears more than once the first entry wins.
 * @param data - Parsed JSON.
 * @param defaultRecord - Recording flag for entries that do not set one.
 * @returns The subscriptions in file order and any warnings.
 */
export function parseSubscriptions(data: unknown, defaultRecord = true): SubscriptionParseResult {

  const result: SubscriptionParseResult = { subscriptions: [], warnings: [] };
  const entries = extractEntries(data);

  if(!entries) {

    result.warnings.push("Subscriptions must be an array, an object with a \"channels\" array, or an object with a \"subscriptions\" map.");

    return result;
  }

  const seen = new Set<string>();

  for(const [ index, entry ] of entries.entries()) {

    let subscription: Subscription | null = null;

    if(typeof entry === "string") {

      const id = parseLogin(entry);

      subscription = id ? { id, recordingEnabled: defaultRecord } : null;
    } else if(isRecord(entry)) {

      const source = (typeof entry.login === "string") ? entry.login : (typeof entry.url === "string") ? entry.url : null;
      const id = source ? parseLogin(source) : null;
      const numberValid = (entry.number === undefined) || ((typeof entry.number === "number") && Number.isInteger(entry.number) && (entry.number > 0));
      const recordValid = (entry.record === undefined) || (typeof entry.record === "boolean");

      if(id && numberValid && recordValid) {

        subscription = { id, recordingEnabled: (typeof entry.record === "boolean") ? entry.record : defaultRecord };

        if(typeof entry.number === "number") {

          subscription.channelNumber = entry.number;
        }
      }
    }

    if(!subscription) {

      result.warnings.push([ "Skipping invalid subscription entry ", String(index + 1), ": ", JSON.stringify(entry), "." ].join(""));

      continue;
    }

    if(seen.has(subscription.id)) {

      result.warnings.push([ "Skipping duplicate subscription for ", subscription.id, "." ].join(""));

      continue;
    }

    seen.add(subscription.id);
    result.subscriptions.push(subscription);
  }

  return result;
}

/**
 * Loads the subscriptions file. A missing file is not an error and yields no subscriptions.
 * @param filePath - Path to the subscriptions file.
 * @param defaultRecord - Recording flag for entries that do not set one.
 * @returns The subscriptions, warnings, and parse status.
 */
export async function loadSubscriptions(filePath: string, defaultRecord = true): Promise<SubscriptionLoadResult> {

  let content: string;

  try {

    content = await fsPromises.readFile(filePath, "utf-8");
  } catch(error) {

    if(getErrorCode(error) === "ENOENT") {

      LOG.warn("Subscriptions file %s not found. No channels will be available until it is created.", filePath);

      return { parseError: false, subscriptions: [], warnings: [] };
    }

    LOG.warn("Failed to read subscriptions file %s: %s.", filePath, formatError(error));

    return { parseError: true, parseErrorMessage: formatError(error), subscriptions: [], warnings: [] };
  }

  let data: unknown;

  try {

    data = JSON.parse(content);
  } catch(error) {

    LOG.warn("Invalid JSON in subscriptions file %s: %s.", filePath, formatError(error));

    return { parseError: true, parseErrorMessage: formatError(error), subscriptions: [], warnings: [] };
  }

  const result = parseSubscriptions(data, defaultRecord);

  for(const warning of result.warnings) {

    LOG.warn("%s", warning);
  }

  LOG.debug("channels", "Loaded %s subscription%s from %s.", result.subscriptions.length, (result.subscriptions.length === 1) ? "" : "s", filePath);

  return { ...result, parseError: false };
}
