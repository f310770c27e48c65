/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * twitch.ts: Twitch Helix API client for TwitchTuner.
 */
import type { ChannelRecord, Nullable } from "../types/index.js";
import { LOG, formatError } from "../utils/index.js";
import type { Subscription } from "../config/subscriptions.js";

/*
 * TWITCH HELIX CLIENT
 *
 * Channel status comes from two Helix endpoints: /users resolves logins to user ids, display names and profile images, and /streams returns the streams that are
 * currently live for a set of user ids. Both take at most 100 ids per request, so larger subscription lists are split into batches.
 *
 * Authentication uses an app access token from the client credentials flow. The token is cached until a minute before it expires, and dropped early if Helix
 * answers 401 so the next request fetches a new one.
 *
 * Responses are validated field by field. Entries with missing required fields are ignored rather than trusted.
 */

const DEFAULT_API_BASE = "https://api.twitch.tv/helix";
const DEFAULT_AUTH_URL = "https://id.twitch.tv/oauth2/token";

// Helix limit on ids per request.
const BATCH_SIZE = 100;

// Tokens are treated as expired this long before Twitch says they are.
const TOKEN_EXPIRY_MARGIN = 60 * 1000;

// Request timeout.
const REQUEST_TIMEOUT = 15000;

// Preview size substituted into stream thumbnail templates.
const THUMBNAIL_WIDTH = "1280";
const THUMBNAIL_HEIGHT = "720";

export type FetchFunction = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * A Twitch user, as far as we need it.
 */
export interface TwitchUser {

  displayName: string;
  id: string;
  login: string;
  profileImageUrl: string;
}

/**
 * A live Twitch stream.
 */
export interface TwitchStream {

  gameName: string;
  startedAt: Nullable<Date>;
  thumbnailUrl: string;
  title: string;
  userId: string;
  viewerCount: number;
}

/**
 * A non-2xx response from Twitch.
 */
export class TwitchApiError extends Error {

  public readonly status: number;

  constructor(message: string, status: number) {

    super(message);

    this.name = "TwitchApiError";
    this.status = status;
  }
}

export interface TwitchClientOptions {

  apiBase?: string;
  authUrl?: string;
  clientId: string;
  clientSecret: string;

  // Defaults to the global fetch.
  fetch?: FetchFunction;

  // Clock in milliseconds. Defaults to Date.now.
  now?: () => number;
}

/**
 * Narrows a value to a plain object.
 */
function isRecord(value: unknown): value is Record<string, unknown> {

  return (typeof value === "object") && (value !== null) && !Array.isArray(value);
}

/**
 * Returns the "data" array of a Helix response body.
 */
function dataArray(body: unknown): unknown[] {

  return (isRecord(body) && Array.isArray(body.data)) ? body.data : [];
}

function stringField(entry: Record<string, unknown>, key: string): string {

  const value = entry[key];

  return (typeof value === "string") ? value : "";
}

/**
 * Parses the users in a /helix/users response.
 * @param body - The parsed JSON body.
 * @returns The valid users.
 */
export function parseUsers(body: unknown): TwitchUser[] {

  const users: TwitchUser[] = [];

  for(const entry of dataArray(body)) {

    if(!isRecord(entry)) {

      continue;
    }

    const id = stringField(entry, "id");
    const login = stringField(entry, "login").toLowerCase();

    if(!id || !login) {

      continue;
    }

    users.push({ displayName: stringField(entry, "display_name") || login, id, login, profileImageUrl: stringField(entry, "profile_image_url") });
  }

  return users;
}

/**
 * Parses the streams in a /helix/streams response. Only streams of type "live" (or with no type) are kept.
 * @param body - The parsed JSON body.
 * @returns The live streams.
 */
export function parseStreams(body: unknown): TwitchStream[] {

  const streams: TwitchStream[] = [];

  for(const entry of dataArray(body)) {

    if(!isRecord(entry)) {

      continue;
    }

    const userId = stringField(entry, "user_id");
    const type = stringField(entry, "type");

    if(!userId || (type && (type !== "live"))) {

      continue;
    }

    const startedAtText = stringField(entry, "started_at");
    const startedAt = startedAtText ? new Date(startedAtText) : null;

    streams.push({

      gameName: stringField(entry, "game_name"),
      startedAt: (startedAt && !Number.isNaN(startedAt.getTime())) ? startedAt : null,
      thumbnailUrl: stringField(entry, "thumbnail_url").replace("{width}", THUMBNAIL_WIDTH).replace("{height}", THUMBNAIL_HEIGHT),
      title: stringField(entry, "title"),
      userId,
      viewerCount: (typeof entry.viewer_count === "number") ? entry.viewer_count : 0
    });
  }

  return streams;
}

/**
 * Builds the record for a subscribed channel with no Twitch data.
 * @param subscription - The subscription.
 * @returns An offline record named after the login.
 */
export function offlineRecord(subscription: Subscription): ChannelRecord {

  return {

    artworkUrl: "",
    category: "",
    ...((subscription.channelNumber !== undefined) ? { channelNumber: subscription.channelNumber } : {}),
    displayName: subscription.id,
    id: subscription.id,
    live: false,
    recordingEnabled: subscription.recordingEnabled,
    startedAt: null,
    thumbnailUrl: "",
    title: ""
  };
}

/**
 * Joins subscriptions, users, and streams into channel records, in subscription order. Subscriptions Twitch does not know are left out.
 * @param subscriptions - The subscribed channels.
 * @param users - Users returned by Twitch.
 * @param streams - Live streams returned by Twitch.
 * @returns The channel records.
 */
export function buildChannelRecords(subscriptions: readonly Subscription[], users: readonly TwitchUser[], streams: readonly TwitchStream[]): ChannelRecord[] {

  const usersByLogin = new Map(users.map((user): [string, TwitchUser] => [ user.login, user ]));
  const streamsByUser = new Map(streams.map((stream): [string, TwitchStream] => [ stream.userId, stream ]));
  const records: ChannelRecord[] = [];

  for(const subscription of subscriptions) {

    const user = usersByLogin.get(subscription.id);

    if(!user) {

      LOG.warn("Twitch has no user named %s. The channel is skipped.", subscription.id);

      continue;
    }

    const stream = streamsByUser.get(user.id);

    records.push({

      ...offlineRecord(subscription),
      artworkUrl: user.profileImageUrl,
      category: stream?.gameName ?? "",
      displayName: user.displayName,
      live: stream !== undefined,
      startedAt: stream?.startedAt ?? null,
      thumbnailUrl: stream?.thumbnailUrl ?? "",
      title: stream?.title ?? ""
    });
  }

  return records;
}

/**
 * Talks to the Twitch Helix API.
 */
export class TwitchClient {

  private readonly apiBase: string;
  private readonly authUrl: string;
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly fetch: FetchFunction;
  private readonly now: () => number;
  private token: Nullable<{ expiresAt: number; value: string }> = null;

  constructor(options: TwitchClientOptions) {

    this.apiBase = options.apiBase ?? DEFAULT_API_BASE;
    this.authUrl = options.authUrl ?? DEFAULT_AUTH_URL;
    this.clientId = options.clientId;
    this.clientSecret = options.clientSecret;
    this.fetch = options.fetch ?? (async (input, init): Promise<Response> => fetch(input, init));
    this.now = options.now ?? Date.now;
  }

  /**
   * Whether both the client id and the secret are configured.
   */
  public get hasCredentials(): boolean {

    return (this.clientId.length > 0) && (this.clientSecret.length > 0);
  }

  /**
   * Resolves logins to users.
   * @param logins - Lowercase logins.
   * @returns The users Twitch knows, in response order.
   */
  public async getUsers(logins: readonly string[]): Promise<TwitchUser[]> {

    const users: TwitchUser[] = [];

    for(const batch of batches(logins)) {

      // eslint-disable-next-line no-await-in-loop
      users.push(...parseUsers(await this.helix("/users", batch.map((login): [string, string] => [ "login", login ]))));
    }

    return users;
  }

  /**
   * Returns the live streams of a set of users.
   * @param userIds - Twitch user ids.
   * @returns The live streams.
   */
  public async getStreams(userIds: readonly string[]): Promise<TwitchStream[]> {

    const streams: TwitchStream[] = [];

    for(const batch of batches(userIds)) {

      // eslint-disable-next-line no-await-in-loop
      streams.push(...parseStreams(await this.helix("/streams", [ ...batch.map((id): [string, string] => [ "user_id", id ]), [ "first", String(BATCH_SIZE) ] ])));
    }

    return streams;
  }

  /**
   * Fetches the current state of every subscribed channel.
   * @param subscriptions - The subscribed channels.
   * @returns Channel records in subscription order.
   */
  public async fetchChannels(subscriptions: readonly Subscription[]): Promise<ChannelRecord[]> {

    if(subscriptions.length === 0) {

      return [];
    }

    const users = await this.getUsers(subscriptions.map((subscription) => subscription.id));
    const streams = await this.getStreams(users.map((user) => user.id));

    LOG.debug("channels:twitch", "Fetched %s user%s and %s live stream%s.", users.length, (users.length === 1) ? "" : "s", streams.length,
      (streams.length === 1) ? "" : "s");

    return buildChannelRecords(subscriptions, users, streams);
  }

  /**
   * Returns a valid app access token, requesting a new one when the cached token is missing or about to expire.
   */
  private async getToken(): Promise<string> {

    if(this.token && (this.now() < this.token.expiresAt)) {

      return this.token.value;
    }

    const body = new URLSearchParams({ "client_id": this.clientId, "client_secret": this.clientSecret, "grant_type": "client_credentials" });
    const response = await this.fetch(this.authUrl, {

      body: body.toString(),
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      method: "POST",
      signal: AbortSignal.timeout(REQUEST_TIMEOUT)
    });

    if(!response.ok) {

      throw new TwitchApiError("Twitch token request failed with HTTP " + String(response.status) + ".", response.status);
    }

    const json: unknown = await response.json();

    if(!isRecord(json) || (typeof json.access_token !== "string") || (typeof json.expires_in !== "number")) {

      throw new TwitchApiError("Twitch token response is missing access_token or expires_in.", response.status);
    }

    this.token = { expiresAt: this.now() + (json.expires_in * 1000) - TOKEN_EXPIRY_MARGIN, value: json.access_token };

    LOG.debug("channels:twitch", "Obtained a new app access token, valid for %ss.", json.expires_in);

    return json.access_token;
  }

  /**
   * Performs an authenticated Helix GET.
   * @param endpoint - Path below the API base, e.g. "/users".
   * @param params - Query parameters. Keys may repeat.
   * @returns The parsed JSON body.
   */
  private async helix(endpoint: string, params: readonly (readonly [string, string])[]): Promise<unknown> {

    const token = await this.getToken();
    const query = new URLSearchParams(params.map<[ string, string ]>(([ key, value ]) => [ key, value ]));
    const url = [ this.apiBase, endpoint, "?", query.toString() ].join("");
    let response: Response;

    try {

      response = await this.fetch(url, {

        headers: { "Authorization": "Bearer " + token, "Client-ID": this.clientId },
        signal: AbortSignal.timeout(REQUEST_TIMEOUT)
      });
    } catch(error) {

      throw new TwitchApiError("Twitch request to " + endpoint + " failed: " + formatError(error) + ".", 0);
    }

    if(response.status === 401) {

      this.token = null;
    }

    if(!response.ok) {

      throw new TwitchApiError("Twitch request to " + endpoint + " failed with HTTP " + String(response.status) + ".", response.status);
    }

    return response.json();
  }
}

/**
 * Splits a list into Helix-sized batches.
 */
function batches<T>(items: readonly T[]): T[][] {

  const result: T[][] = [];

  for(let i = 0; i < items.length; i += BATCH_SIZE) {

    result.push(items.slice(i, i + BATCH_SIZE));
  }

  return result;
}
