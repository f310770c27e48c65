/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * app.ts: Express application builder for TwitchTuner.
 */
import { CONFIG, displayConfiguration, initializeConfiguration, validateConfiguration } from "./config/index.js";
import type { Config, HttpLogLevel, Nullable } from "./types/index.js";
import type { Express, NextFunction, Request, Response } from "express";
import { LOG, createMorganStream, formatError, isExecutableAvailable, setConsoleLogging } from "./utils/index.js";
import { getChannelsFilePath, getDataDir, getLogFilePath, getRecordingsDir } from "./config/paths.js";
import { initializeFileLogger, shutdownFileLogger } from "./utils/fileLogger.js";
import type { AppContext } from "./context.js";
import { ChannelRefresher } from "./channels/refresher.js";
import { ChannelStore } from "./channels/index.js";
import type { FetchFunction } from "./channels/twitch.js";
import { LiveStreamService } from "./streaming/mpegts.js";
import { PipelineRunner } from "./streaming/pipeline.js";
import { RecordingSupervisor } from "./recording/supervisor.js";
import type { Server } from "http";
import { SessionRegistry } from "./streaming/registry.js";
import type { StageSpawner } from "./streaming/pipeline.js";
import { StreamUrlCache } from "./streaming/urlCache.js";
import { TwitchClient } from "./channels/twitch.js";
import consoleStamp from "console-stamp";
import { ensureDeviceId } from "./hdhr/index.js";
import express from "express";
import fs from "node:fs";
import { loadSubscriptions } from "./config/subscriptions.js";
import morgan from "morgan";
import { setupRoutes } from "./routes/index.js";

/*
 * LOGGING MODE
 *
 * The logging mode is set at startup based on the --console CLI flag. When console logging is enabled, timestamps are added via console-stamp and output goes to
 * stdout/stderr. When file logging is used (the default), output goes to twitchtuner.log in the data directory.
 */

// Track whether console logging is enabled, set during startServer().
let usingConsoleLogging = false;

/*
 * APPLICATION STATE
 *
 * The HTTP server and the services are stored at module level so they can be closed during graceful shutdown.
 */

let server: Nullable<Server> = null;
let services: Nullable<AppContext> = null;

// The URL cache expires entries on read. The sweep only keeps channels nobody tunes from lingering in memory.
const CACHE_SWEEP_INTERVAL = 60 * 1000;

let cacheSweepInterval: Nullable<ReturnType<typeof setInterval>> = null;
let unsubscribeSnapshots: Nullable<() => void> = null;

/**
 * Starts the URL cache sweep.
 * @param cache - The cache to sweep.
 */
function startCacheSweep(cache: StreamUrlCache): void {

  if(cacheSweepInterval) {

    return;
  }

  cacheSweepInterval = setInterval(() => {

    const removed = cache.sweep();

    if(removed > 0) {

      LOG.debug("streaming:cache", "Swept %s expired stream URL%s.", removed, (removed === 1) ? "" : "s");
    }
  }, CACHE_SWEEP_INTERVAL);
}

/**
 * Stops the URL cache sweep.
 */
function stopCacheSweep(): void {

  if(cacheSweepInterval) {

    clearInterval(cacheSweepInterval);
    cacheSweepInterval = null;
  }
}

/*
 * SERVICES
 *
 * One instance of each service is created at startup and shared through the AppContext. The URL cache is shared by live viewing and recording, and the channel
 * store is written only by the refresher.
 */

/**
 * Optional overrides for createServices(), used by tests.
 */
export interface ServiceOverrides {

  fetch?: FetchFunction;
  spawn?: StageSpawner;
}

/**
 * Creates the application services from a configuration. Nothing is started.
 * @param config - The application configuration.
 * @param overrides - Optional process and HTTP seams.
 * @returns The services.
 */
export function createServices(config: Config, overrides: ServiceOverrides = {}): AppContext {

  const urlCache = new StreamUrlCache();
  const runner = new PipelineRunner({ killGracePeriod: config.streaming.killGracePeriod, spawn: overrides.spawn });
  const store = new ChannelStore();
  const client = new TwitchClient({ clientId: config.twitch.clientId, clientSecret: config.twitch.clientSecret, fetch: overrides.fetch });
  const channelsFile = getChannelsFilePath(config);

  const refresher = new ChannelRefresher({

    client,
    interval: config.twitch.updateInterval,
    loadSubscriptions: async () => loadSubscriptions(channelsFile, config.recording.enabled),
    store
  });

  const supervisor = config.recording.enabled ? new RecordingSupervisor({

    channels: store,
    root: getRecordingsDir(config),
    runner,
    settings: config.recording,
    streaming: config.streaming,
    urlCache
  }) : null;

  return {

    config,
    liveService: new LiveStreamService({ runner, settings: config.streaming, urlCache }),
    refresher,
    registry: new SessionRegistry(),
    store,
    supervisor,
    urlCache
  };
}

/*
 * HTTP REQUEST LOGGING
 */

// Browser-initiated asset requests that return 404. These are noise from browsers automatically requesting files that don't exist.
const BROWSER_ASSET_PATTERNS = [ "/apple-touch-icon", "/favicon", "/robots.txt", "/site.webmanifest" ];

// Endpoints that clients poll. Successful requests to these are skipped at the "filtered" level.
const POLLING_PATTERNS = [ "/discover.json", "/health", "/lineup_status.json", "/status.json" ];

/**
 * Decides whether morgan should skip a request at the configured HTTP log level.
 * @param level - The configured level. "none" never reaches here since morgan is not installed.
 * @param url - The request URL.
 * @param statusCode - The response status.
 * @returns True if the request should not be logged.
 */
export function shouldSkipRequestLog(level: HttpLogLevel, url: string, statusCode: number): boolean {

  switch(level) {

    case "all":

      return false;

    case "errors":

      if(statusCode < 400) {

        return true;
      }

      return (statusCode === 404) && BROWSER_ASSET_PATTERNS.some((pattern) => url.startsWith(pattern));

    case "filtered":

      if(statusCode >= 400) {

        return false;
      }

      return POLLING_PATTERNS.some((pattern) => url.startsWith(pattern));

    default:

      return true;
  }
}

/*
 * APPLICATION BUILDER
 *
 * The buildApp function creates and configures the Express application with all middleware and routes. This is separated from the server startup to allow for
 * testing and flexibility in deployment.
 */

/**
 * Creates and configures the Express application with all middleware and routes.
 * @param ctx - Application services.
 * @returns The configured Express application.
 */
export function buildApp(ctx: AppContext): Express {

  const app = express();

  // Trust proxy headers (X-Forwarded-Proto, X-Forwarded-Host) so that req.protocol reflects what the client actually used when accessing through a reverse proxy.
  // This keeps lineup and playlist URLs reachable from the client's side.
  app.set("trust proxy", true);

  // Configure Morgan for HTTP request logging. Morgan output goes through morganStream which handles timestamp formatting for both console and file logging modes.
  const httpLogLevel = ctx.config.logging.httpLogLevel;

  if(httpLogLevel !== "none") {

    app.use(morgan(":method :url from :remote-addr responded :status in :response-time ms.", {

      skip: (req, res): boolean => shouldSkipRequestLog(httpLogLevel, req.originalUrl || req.url, res.statusCode),
      stream: createMorganStream()
    }));
  }

  setupRoutes(app, ctx);

  // Global error handler. Express error handlers require 4 parameters even if unused.
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction): void => {

    LOG.error("Unhandled error in request: %s.", formatError(err));

    if(!res.headersSent) {

      res.status(500).send("Internal server error");
    }
  });

  return app;
}

/*
 * GRACEFUL SHUTDOWN
 *
 * When the process receives a termination signal, we stop polling, end every viewer session, stop every recorder, and close the HTTP server before exiting. No
 * child process outlives the server.
 */

/**
 * Stops every service. Viewer pipelines and recorders are torn down side by side, and this resolves once none of their processes is left.
 * @param ctx - Application services.
 */
export async function stopServices(ctx: AppContext): Promise<void> {

  unsubscribeSnapshots?.();
  unsubscribeSnapshots = null;

  ctx.refresher.stop();
  stopCacheSweep();
  await Promise.all([ ctx.registry.terminateAll("server shutdown"), ctx.supervisor?.stop() ]);
}

/**
 * Sets up signal handlers for graceful shutdown.
 */
function setupGracefulShutdown(): void {

  let shutdownInProgress = false;

  async function shutdown(): Promise<void> {

    // Prevent multiple shutdown attempts if multiple signals are received.
    if(shutdownInProgress) {

      return;
    }

    shutdownInProgress = true;

    LOG.info("Shutting down.");

    if(services) {

      try {

        await stopServices(services);
      } catch(error) {

        LOG.error("Error stopping services during shutdown: %s.", formatError(error));
      }
    }

    if(server) {

      server.close((): void => {

        LOG.info("HTTP server closed successfully.");
      });
    }

    // Shut down file logger if in use.
    if(!usingConsoleLogging) {

      shutdownFileLogger();
    }

    process.exit(0);
  }

  process.on("SIGINT", (): void => {

    void shutdown();
  });

  process.on("SIGTERM", (): void => {

    void shutdown();
  });
}

/*
 * SERVER STARTUP
 */

/**
 * Probes the external executables once and logs what is missing. A missing extractor does not stop startup; the health endpoint reports it.
 * @param config - The application configuration.
 */
async function checkTools(config: Config): Promise<void> {

  if(!(await isExecutableAvailable(config.streaming.extractor))) {

    LOG.error("The extractor %s could not be run. Install streamlink or set STREAMLINK_BIN. Streaming and recording will fail until it is available.",
      config.streaming.extractor);
  }

  if((config.streaming.extractionMode === "discover") || config.streaming.transcodeArgs) {

    if(!(await isExecutableAvailable(config.streaming.fetcher, ["-version"]))) {

      LOG.error("ffmpeg (%s) could not be run. It is required for discover mode and for transcoding.", config.streaming.fetcher);
    }
  }
}

/**
 * Startup options from the command line. CLI flags have the highest priority in the configuration merge order.
 */
export interface StartupOptions {

  consoleLogging: boolean;
  logFile?: string;
  port?: number;
}

/**
 * Initializes and starts the HTTP server and the background services.
 * @param options - Startup options from the command line.
 */
export async function startServer(options: StartupOptions): Promise<void> {

  // Set logging mode early before any log calls.
  usingConsoleLogging = options.consoleLogging;
  setConsoleLogging(options.consoleLogging);

  // Apply console-stamp for timestamps only when using console logging.
  if(options.consoleLogging) {

    consoleStamp(console, { format: ":date(yyyy/mm/dd HH:MM:ss.l)" });
  }

  // Initialize configuration from file and environment variables, apply CLI overrides, then validate.
  try {

    await initializeConfiguration();

    if(options.port !== undefined) {

      CONFIG.server.port = options.port;
    }

    if(options.logFile) {

      CONFIG.paths.logFile = options.logFile;
    }

    validateConfiguration();
  } catch(error) {

    LOG.error(formatError(error));

    process.exit(1);
  }

  await fs.promises.mkdir(getDataDir(), { recursive: true });

  if(!options.consoleLogging) {

    await initializeFileLogger(getLogFilePath(CONFIG), CONFIG.logging.maxSize);
  }

  await ensureDeviceId(CONFIG.hdhr);

  displayConfiguration();
  setupGracefulShutdown();

  await checkTools(CONFIG);

  const ctx = createServices(CONFIG);

  services = ctx;

  const app = buildApp(ctx);

  server = app.listen(CONFIG.server.port, CONFIG.server.host, (): void => {

    LOG.info("TwitchTuner is now listening on %s:%s.", CONFIG.server.host, CONFIG.server.port);
  });

  server.on("error", (error: Error): void => {

    LOG.error("HTTP server error: %s.", formatError(error));

    process.exit(1);
  });

  startCacheSweep(ctx.urlCache);

  // Every new snapshot wakes the supervisor, so recordings start and stop as soon as the refresher sees a change.
  const supervisor = ctx.supervisor;

  if(supervisor) {

    unsubscribeSnapshots = ctx.store.onUpdate(() => {

      supervisor.notify();
    });

    supervisor.start();
  }

  ctx.refresher.start();
}
