/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * mpegts.ts: Live MPEG-TS streaming service for TwitchTuner.
 */
import { ClientCancelledError, LOG, LaunchFailedError, PipelineError, StreamIOError, UpstreamEndedError, formatError, startTimer } from "../utils/index.js";
import type { ExtractionMode, Nullable, StreamingConfig } from "../types/index.js";
import type { PipelineHandle, PipelineRunner } from "./pipeline.js";
import { type StreamSource, buildChannelUrl, buildLiveSpec, discoverStreamUrl, selectExtractionMode } from "./extractors.js";
import type { StreamUrlCache } from "./urlCache.js";

/* This module turns one viewer request into one pipeline and copies its output to the viewer until one side goes away. Each viewer gets a private pipeline; nothing
 * is shared between sessions except the discovered URL cache.
 *
 * Session flow:
 * 1. Pick the extraction mode.
 * 2. Resolve the source. In discover mode, a cached URL is used if one is fresh, otherwise the extractor is run once in URL mode and the result cached.
 * 3. Start the pipeline.
 * 4. Commit the response headers as soon as the pipeline is running. Only a failure before this point can still be reported with a status code.
 * 5. Copy the output to the client in bounded chunks. Each write is raced against the abort signal so that a stalled client cannot hold the pipeline open.
 * 6. On the way out, whatever the reason, tear the pipeline down and, in discover mode, drop the cached URL so the next tune gets a fresh one.
 *
 * The abort signal is the only cancellation input. The HTTP layer aborts it when the response closes, and the session registry aborts it when an operator ends a
 * session or the server shuts down.
 */

/**
 * The slice of an HTTP response the service writes to. The Express adapter lives with the route; tests substitute a recording fake.
 */
export interface StreamClient {

  // True once the status line and headers have been committed.
  readonly headersSent: boolean;

  // Commits a 200 response with streaming headers.
  commitHeaders(): void;

  // Ends the response. Safe to call more than once.
  end(): void;

  // Sends an error response if headers are unsent, otherwise just ends the response.
  fail(status: number, message: string): void;

  // Writes one chunk. Resolves once the chunk has been handed to the transport, rejects if the transport failed.
  write(chunk: Buffer): Promise<void>;
}

/**
 * Why a session ended.
 */
export type StreamOutcomeReason = "client-cancelled" | "io-error" | "launch-failed" | "upstream-ended";

/**
 * The result of serving one session.
 */
export interface StreamOutcome {

  // Bytes delivered to the client.
  readonly bytes: number;

  readonly error: Nullable<PipelineError>;
  readonly mode: ExtractionMode;
  readonly reason: StreamOutcomeReason;
}

/**
 * Dependencies of the live stream service.
 */
export interface LiveStreamServiceOptions {

  runner: PipelineRunner;
  settings: StreamingConfig;
  urlCache: StreamUrlCache;
}

// Result of one raced write.
type WriteResult = { readonly error: unknown; readonly kind: "failed" } | { readonly kind: "aborted" } | { readonly kind: "written" };

/**
 * Serves live viewer sessions.
 */
export class LiveStreamService {

  private readonly runner: PipelineRunner;
  private readonly settings: StreamingConfig;
  private readonly urlCache: StreamUrlCache;

  constructor(options: LiveStreamServiceOptions) {

    this.runner = options.runner;
    this.settings = options.settings;
    this.urlCache = options.urlCache;
  }

  /**
   * Streams a channel to a client until the upstream ends, the client goes away, or the signal aborts. Never rejects; every failure is reported through the outcome
   * and, where headers are still unsent, through client.fail().
   * @param channelId - The channel login.
   * @param client - Where to write.
   * @param signal - Aborted when the client disconnects or the session is terminated.
   * @param onBytes - Optional progress callback, called with the running byte total after each write.
   * @returns How the session ended.
   */
  public async serve(channelId: string, client: StreamClient, signal: AbortSignal, onBytes?: (total: number) => void): Promise<StreamOutcome> {

    const mode = selectExtractionMode(this.settings);
    const elapsed = startTimer();
    let handle: PipelineHandle;

    try {

      const source = await this.resolveSource(channelId, mode, signal);

      handle = await this.runner.start(buildLiveSpec(channelId, source, this.settings));
    } catch(error) {

      if(mode === "discover") {

        this.urlCache.invalidate(channelId);
      }

      if(signal.aborted) {

        LOG.info("Viewer left %s before the stream started.", channelId);

        return { bytes: 0, error: new ClientCancelledError(), mode, reason: "client-cancelled" };
      }

      const launchError = (error instanceof PipelineError) ? error : new LaunchFailedError(formatError(error), null, { cause: error });

      LOG.warn("Unable to start streaming %s: %s.", channelId, launchError.message);
      client.fail(500, launchError.message);

      return { bytes: 0, error: launchError, mode, reason: "launch-failed" };
    }

    // Headers go out as soon as the pipeline is running, before the extractor has produced anything.
    if(!signal.aborted) {

      client.commitHeaders();
      LOG.debug("timing:startup", "Pipeline for %s launched after %sms.", channelId, elapsed());
    }

    let teardownReason: StreamOutcomeReason = "io-error";
    let outcome: StreamOutcome;

    try {

      outcome = await this.copy(channelId, handle, client, signal, elapsed, onBytes);
      teardownReason = outcome.reason;
    } finally {

      await handle.teardown(teardownReason);

      if(mode === "discover") {

        this.urlCache.invalidate(channelId);
      }
    }

    switch(outcome.reason) {

      case "client-cancelled":

        LOG.info("Viewer disconnected from %s after %s bytes.", channelId, outcome.bytes);

        break;

      case "io-error":

        LOG.warn("Streaming %s failed after %s bytes: %s.", channelId, outcome.bytes, outcome.error?.message ?? "unknown error");
        client.end();

        break;

      case "upstream-ended":

        if(outcome.bytes === 0) {

          const diagnostics = handle.diagnostics();

          LOG.warn("The stream for %s ended before any data was received%s", channelId, diagnostics ? ": " + diagnostics : ".");
        } else {

          LOG.info("Stream for %s ended after %s bytes.", channelId, outcome.bytes);
        }

        client.end();

        break;

      default:

        client.end();

        break;
    }

    return outcome;
  }

  /**
   * Works out where the pipeline reads from.
   * @param channelId - The channel login.
   * @param mode - The extraction mode.
   * @param signal - Abort signal, passed to discovery.
   * @returns The source.
   */
  private async resolveSource(channelId: string, mode: ExtractionMode, signal: AbortSignal): Promise<StreamSource> {

    if(mode === "direct") {

      return { channelUrl: buildChannelUrl(this.settings.channelUrlTemplate, channelId), kind: "direct" };
    }

    const cached = this.urlCache.get(channelId);

    if(cached) {

      LOG.debug("streaming:cache", "Using cached stream URL for %s.", channelId);

      return { kind: "discovered", mediaUrl: cached };
    }

    LOG.debug("streaming:cache", "No cached stream URL for %s. Discovering.", channelId);

    const mediaUrl = await discoverStreamUrl(this.runner, channelId, this.settings, signal);

    this.urlCache.put(channelId, mediaUrl);

    return { kind: "discovered", mediaUrl };
  }

  /**
   * The copy loop. Reads pipeline output and writes it in chunks of at most the configured size.
   * @returns The outcome, before teardown.
   */
  private async copy(channelId: string, handle: PipelineHandle, client: StreamClient, signal: AbortSignal, elapsed: () => number,
    onBytes?: (total: number) => void): Promise<StreamOutcome> {

    const mode = selectExtractionMode(this.settings);
    const chunkSize = Math.max(1, this.settings.chunkSize);
    let bytes = 0;
    let ioError: Nullable<StreamIOError> = null;
    let resolveAborted: (result: WriteResult) => void = () => { /* Replaced below. */ };

    const aborted = new Promise<WriteResult>((resolve) => {

      resolveAborted = resolve;
    });

    // Ending the output stream is what gets the for-await loop out of a pending read when the viewer leaves.
    const onAbort = (): void => {

      resolveAborted({ kind: "aborted" });
      handle.output.destroy();
    };

    if(signal.aborted) {

      onAbort();
    } else {

      signal.addEventListener("abort", onAbort, { once: true });
    }

    try {

      copy: for await (const data of handle.output) {

        const buffer = Buffer.isBuffer(data) ? data : Buffer.from(String(data));

        if(bytes === 0) {

          LOG.debug("timing:startup", "First bytes for %s after %sms.", channelId, elapsed());
        }

        for(let offset = 0; offset < buffer.length; offset += chunkSize) {

          if(signal.aborted) {

            break copy;
          }

          // eslint-disable-next-line no-await-in-loop
          const result = await Promise.race([ this.write(client, buffer.subarray(offset, offset + chunkSize)), aborted ]);

          if(result.kind === "aborted") {

            break copy;
          }

          if(result.kind === "failed") {

            ioError = new StreamIOError("Writing to the client failed: " + formatError(result.error) + ".", { cause: result.error });

            break copy;
          }

          bytes += Math.min(chunkSize, buffer.length - offset);
          onBytes?.(bytes);
        }
      }
    } catch(error) {

      if(!signal.aborted) {

        ioError = new StreamIOError("Reading from the pipeline failed: " + formatError(error) + ".", { cause: error });
      }
    } finally {

      signal.removeEventListener("abort", onAbort);
    }

    LOG.debug("streaming:mpegts", "Copy loop for %s finished after %s bytes.", channelId, bytes);

    if(signal.aborted) {

      return { bytes, error: new ClientCancelledError(), mode, reason: "client-cancelled" };
    }

    if(ioError) {

      return { bytes, error: ioError, mode, reason: "io-error" };
    }

    return { bytes, error: new UpstreamEndedError(), mode, reason: "upstream-ended" };
  }

  /**
   * Writes one chunk and folds the result into a value, so a write that loses the race against the abort signal never becomes an unhandled rejection.
   */
  private async write(client: StreamClient, chunk: Buffer): Promise<WriteResult> {

    return client.write(chunk).then((): WriteResult => ({ kind: "written" }), (error: unknown): WriteResult => ({ error, kind: "failed" }));
  }
}
