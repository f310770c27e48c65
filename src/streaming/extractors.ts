/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * extractors.ts: Pipeline specs for the extractor, fetch, and transcode stages.
 */
import type { ExtractionMode, RecordingConfig, StreamingConfig } from "../types/index.js";
import { LOG, LaunchFailedError, formatError, splitArgs } from "../utils/index.js";
import type { PipelineRunner, PipelineSpec, StageSpec } from "./pipeline.js";

/*
 * PIPELINE SPECS
 *
 * Live viewing supports two ways of getting bytes out of Twitch:
 *
 * - direct: streamlink writes the stream to stdout. One process per viewer, nothing cached.
 * - discover: streamlink only prints the direct HLS URL (--stream-url). We cache that URL and hand it to ffmpeg, which fetches and remuxes to MPEG-TS. Repeated
 *   tunes of the same channel within the cache lifetime skip the extractor entirely.
 *
 * When transcode arguments are configured, a transcode stage is added: a second ffmpeg after the extractor in direct mode, or the same arguments folded into the
 * fetch stage in discover mode. Either way a pipeline never exceeds two stages.
 *
 * Recording always uses direct extraction with its own quality and arguments, and writes the extractor output to disk unchanged.
 */

// Bytes of discovery output we are willing to read. A URL is a few hundred bytes; anything past this is not a URL.
const DISCOVERY_OUTPUT_LIMIT = 65536;

/**
 * Where the first stage of a live pipeline gets its media. Built once per session, after the cache lookup in discover mode.
 */
export type StreamSource =
  | { readonly kind: "direct"; readonly channelUrl: string }
  | { readonly kind: "discovered"; readonly mediaUrl: string };

/**
 * Builds the Twitch URL for a channel from the configured template.
 * @param template - URL template containing "{channel}".
 * @param channelId - The channel login.
 * @returns The channel URL.
 */
export function buildChannelUrl(template: string, channelId: string): string {

  return template.split("{channel}").join(encodeURIComponent(channelId));
}

/**
 * Returns the extraction mode for a live session. A single dispatch point keeps the mode out of the copy loop.
 * @param settings - Streaming settings.
 * @returns The mode.
 */
export function selectExtractionMode(settings: StreamingConfig): ExtractionMode {

  return settings.extractionMode;
}

/**
 * Builds the extractor stage that writes the stream to stdout.
 * @param settings - Streaming settings.
 * @param channelUrl - The Twitch channel URL.
 * @param quality - Quality selector.
 * @param extraArgs - Extra extractor arguments, whitespace separated.
 * @returns The stage.
 */
function extractorStage(settings: StreamingConfig, channelUrl: string, quality: string, extraArgs: string): StageSpec {

  return {

    args: [ channelUrl, quality, "--stdout", "--quiet", ...splitArgs(extraArgs) ],
    command: settings.extractor,
    label: "extractor"
  };
}

/**
 * Builds the ffmpeg stage that fetches a discovered media URL. With transcode arguments it re-encodes, otherwise it copies codecs.
 * @param settings - Streaming settings.
 * @param mediaUrl - The direct HLS URL.
 * @returns The stage.
 */
function fetchStage(settings: StreamingConfig, mediaUrl: string): StageSpec {

  const transcodeArgs = splitArgs(settings.transcodeArgs);
  const codecArgs = (transcodeArgs.length > 0) ? transcodeArgs : [ "-c", "copy" ];

  return {

    args: [ "-hide_banner", "-nostdin", "-loglevel", "warning", "-i", mediaUrl, ...codecArgs, "-f", "mpegts", "pipe:1" ],
    command: settings.fetcher,
    label: "fetcher"
  };
}

/**
 * Builds the ffmpeg stage that re-encodes MPEG-TS read from stdin.
 * @param settings - Streaming settings.
 * @param transcodeArgs - Parsed transcode arguments.
 * @returns The stage.
 */
function transcodeStage(settings: StreamingConfig, transcodeArgs: string[]): StageSpec {

  return {

    args: [ "-hide_banner", "-loglevel", "warning", "-i", "pipe:0", ...transcodeArgs, "-f", "mpegts", "pipe:1" ],
    command: settings.fetcher,
    label: "transcoder"
  };
}

/**
 * Builds the pipeline spec for a live viewer session.
 * @param channelId - The channel login.
 * @param source - Where the media comes from.
 * @param settings - Streaming settings.
 * @returns The pipeline spec.
 */
export function buildLiveSpec(channelId: string, source: StreamSource, settings: StreamingConfig): PipelineSpec {

  const name = "live:" + channelId;

  switch(source.kind) {

    case "direct": {

      const extractor = extractorStage(settings, source.channelUrl, settings.quality, settings.extractorArgs);
      const transcodeArgs = splitArgs(settings.transcodeArgs);

      return (transcodeArgs.length > 0) ? { name, stages: [ extractor, transcodeStage(settings, transcodeArgs) ] } : { name, stages: [extractor] };
    }

    case "discovered": {

      return { name, stages: [fetchStage(settings, source.mediaUrl)] };
    }

    default: {

      const unreachable: never = source;

      throw new Error("Unknown stream source: " + JSON.stringify(unreachable));
    }
  }
}

/**
 * Builds the pipeline spec that resolves a channel's direct media URL.
 * @param channelId - The channel login.
 * @param settings - Streaming settings.
 * @returns The pipeline spec.
 */
export function buildDiscoverySpec(channelId: string, settings: StreamingConfig): PipelineSpec {

  const channelUrl = buildChannelUrl(settings.channelUrlTemplate, channelId);

  return {

    name: "discover:" + channelId,
    stages: [{ args: [ "--stream-url", channelUrl, settings.quality ], command: settings.extractor, label: "extractor" }]
  };
}

/**
 * Builds the pipeline spec for a background recorder.
 * @param channelId - The channel login.
 * @param settings - Streaming settings, for the extractor and URL template.
 * @param recording - Recording settings, for quality and extra arguments.
 * @returns The pipeline spec.
 */
export function buildRecorderSpec(channelId: string, settings: StreamingConfig, recording: RecordingConfig): PipelineSpec {

  const channelUrl = buildChannelUrl(settings.channelUrlTemplate, channelId);

  return { name: "record:" + channelId, stages: [extractorStage(settings, channelUrl, recording.quality, recording.recorderArgs)] };
}

/**
 * Extracts a media URL from extractor output: the first non-empty line, if it is an http(s) URL.
 * @param output - The extractor's stdout.
 * @returns The URL, or null if the output is not a URL.
 */
export function parseDiscoveredUrl(output: string): string | null {

  const line = output.split(/\r?\n/).map((entry) => entry.trim()).find((entry) => entry.length > 0);

  if(!line || !/^https?:\/\//i.test(line)) {

    return null;
  }

  return line;
}

/**
 * Runs the extractor in URL discovery mode and returns the direct media URL.
 * @param runner - The pipeline runner.
 * @param channelId - The channel login.
 * @param settings - Streaming settings.
 * @param signal - Optional abort signal. Aborting tears the extractor down.
 * @returns The media URL.
 * @throws LaunchFailedError if the extractor cannot start, exits without printing a URL, or is aborted.
 */
export async function discoverStreamUrl(runner: PipelineRunner, channelId: string, settings: StreamingConfig, signal?: AbortSignal): Promise<string> {

  const handle = await runner.start(buildDiscoverySpec(channelId, settings));
  const onAbort = (): void => void handle.teardown("discovery aborted");

  signal?.addEventListener("abort", onAbort, { once: true });

  let output = "";

  try {

    handle.output.setEncoding("utf8");

    for await (const chunk of handle.output) {

      if(typeof chunk === "string") {

        output += chunk;
      }

      if(output.length > DISCOVERY_OUTPUT_LIMIT) {

        break;
      }
    }
  } catch(error) {

    LOG.debug("pipeline", "Reading discovery output for %s failed: %s.", channelId, formatError(error));
  } finally {

    signal?.removeEventListener("abort", onAbort);
    await handle.teardown("discovery complete");
  }

  if(signal?.aborted) {

    throw new LaunchFailedError("Stream URL discovery for " + channelId + " was cancelled.", "extractor");
  }

  const url = parseDiscoveredUrl(output);

  if(!url) {

    const diagnostics = handle.diagnostics() || output.trim();

    throw new LaunchFailedError([ "No stream URL found for ", channelId, diagnostics ? ": " + diagnostics : "", "." ].join(""), "extractor");
  }

  return url;
}
