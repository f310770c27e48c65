/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * extractors.test.ts: Tests for extractor, fetch, and transcode pipeline specs.
 */
import { FakeSpawner, flush } from "../helpers/fakeProcess.js";
import { buildChannelUrl, buildDiscoverySpec, buildLiveSpec, buildRecorderSpec, discoverStreamUrl, parseDiscoveredUrl } from "../../streaming/extractors.js";
import { describe, expect, test } from "@jest/globals";
import { LaunchFailedError } from "../../utils/index.js";
import { PipelineRunner } from "../../streaming/pipeline.js";
import type { StreamingConfig } from "../../types/index.js";
import { cloneDefaults } from "../../config/userConfig.js";

function streamingSettings(overrides: Partial<StreamingConfig> = {}): StreamingConfig {

  return { ...cloneDefaults().streaming, ...overrides };
}

describe("buildChannelUrl", () => {

  test("substitutes and encodes the channel", () => {

    expect(buildChannelUrl("https://www.twitch.tv/{channel}", "alice")).toBe("https://www.twitch.tv/alice");
    expect(buildChannelUrl("https://example.test/{channel}?ref={channel}", "a b")).toBe("https://example.test/a%20b?ref=a%20b");
  });
});

describe("buildLiveSpec", () => {

  test("direct mode runs the extractor alone", () => {

    const spec = buildLiveSpec("alice", { channelUrl: "https://www.twitch.tv/alice", kind: "direct" }, streamingSettings());

    expect(spec).toEqual({

      name: "live:alice",
      stages: [{

        args: [ "https://www.twitch.tv/alice", "1080p60,1080p,720p60,720p,best", "--stdout", "--quiet", "--hls-live-edge", "3", "--stream-segment-threads", "2" ],
        command: "streamlink",
        label: "extractor"
      }]
    });
  });

  test("direct mode adds a transcode stage when transcode arguments are set", () => {

    const settings = streamingSettings({ extractorArgs: "", transcodeArgs: "-c:v libx264 -vf \"scale=1280:720\"" });
    const spec = buildLiveSpec("alice", { channelUrl: "https://www.twitch.tv/alice", kind: "direct" }, settings);

    expect(spec.stages).toHaveLength(2);
    expect(spec.stages[1]).toEqual({

      args: [ "-hide_banner", "-loglevel", "warning", "-i", "pipe:0", "-c:v", "libx264", "-vf", "scale=1280:720", "-f", "mpegts", "pipe:1" ],
      command: "ffmpeg",
      label: "transcoder"
    });
  });

  test("a discovered source is fetched by ffmpeg with codecs copied", () => {

    const spec = buildLiveSpec("bob", { kind: "discovered", mediaUrl: "https://video.example/bob.m3u8" }, streamingSettings({ fetcher: "/usr/bin/ffmpeg" }));

    expect(spec).toEqual({

      name: "live:bob",
      stages: [{

        args: [ "-hide_banner", "-nostdin", "-loglevel", "warning", "-i", "https://video.example/bob.m3u8", "-c", "copy", "-f", "mpegts", "pipe:1" ],
        command: "/usr/bin/ffmpeg",
        label: "fetcher"
      }]
    });
  });

  test("a discovered source folds transcode arguments into the fetch stage", () => {

    const spec = buildLiveSpec("bob", { kind: "discovered", mediaUrl: "https://video.example/bob.m3u8" }, streamingSettings({ transcodeArgs: "-c:v libx264" }));

    expect(spec.stages).toHaveLength(1);
    expect(spec.stages[0].args).toEqual([ "-hide_banner", "-nostdin", "-loglevel", "warning", "-i", "https://video.example/bob.m3u8", "-c:v", "libx264", "-f",
      "mpegts", "pipe:1" ]);
  });
});

describe("buildDiscoverySpec and buildRecorderSpec", () => {

  test("discovery asks the extractor for the stream URL only", () => {

    expect(buildDiscoverySpec("bob", streamingSettings({ quality: "best" }))).toEqual({

      name: "discover:bob",
      stages: [{ args: [ "--stream-url", "https://www.twitch.tv/bob", "best" ], command: "streamlink", label: "extractor" }]
    });
  });

  test("the recorder uses the recording quality and arguments", () => {

    const config = cloneDefaults();

    expect(buildRecorderSpec("alice", config.streaming, config.recording)).toEqual({

      name: "record:alice",
      stages: [{

        args: [ "https://www.twitch.tv/alice", "best", "--stdout", "--quiet", "--retry-streams", "10", "--retry-max", "5" ],
        command: "streamlink",
        label: "extractor"
      }]
    });
  });
});

describe("parseDiscoveredUrl", () => {

  test("takes the first non-empty line when it is an http(s) URL", () => {

    expect(parseDiscoveredUrl("\n  https://video.example/bob.m3u8?sig=abc  \nignored\n")).toBe("https://video.example/bob.m3u8?sig=abc");
    expect(parseDiscoveredUrl("HTTP://VIDEO.EXAMPLE/x.m3u8")).toBe("HTTP://VIDEO.EXAMPLE/x.m3u8");
  });

  test("rejects anything else", () => {

    expect(parseDiscoveredUrl("")).toBeNull();
    expect(parseDiscoveredUrl("error: No playable streams found on this URL")).toBeNull();
    expect(parseDiscoveredUrl("ftp://video.example/bob.m3u8")).toBeNull();
  });
});

describe("discoverStreamUrl", () => {

  test("returns the URL the extractor prints", async () => {

    const spawner = new FakeSpawner({ behavior: (child) => {

      child.stdout.write("https://video.example/bob/index.m3u8\n");
      child.finish(0);
    } });
    const runner = new PipelineRunner({ killGracePeriod: 50, spawn: spawner.spawn });

    await expect(discoverStreamUrl(runner, "bob", streamingSettings())).resolves.toBe("https://video.example/bob/index.m3u8");
    expect(spawner.processes[0].args).toEqual([ "--stream-url", "https://www.twitch.tv/bob", "1080p60,1080p,720p60,720p,best" ]);
  });

  test("reports the extractor's stderr when no URL is printed", async () => {

    const spawner = new FakeSpawner({ behavior: (child) => {

      child.stderr.write("error: No playable streams found\n");
      setImmediate(() => child.finish(1));
    } });
    const runner = new PipelineRunner({ killGracePeriod: 50, spawn: spawner.spawn });
    const error = await discoverStreamUrl(runner, "bob", streamingSettings()).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(LaunchFailedError);
    expect(error instanceof Error ? error.message : "").toBe("No stream URL found for bob: error: No playable streams found.");
  });

  test("tears the extractor down when aborted", async () => {

    const spawner = new FakeSpawner();
    const runner = new PipelineRunner({ killGracePeriod: 50, spawn: spawner.spawn });
    const controller = new AbortController();
    const pending = discoverStreamUrl(runner, "bob", streamingSettings(), controller.signal).catch((caught: unknown) => caught);

    await flush();
    await flush();
    controller.abort();

    const error = await pending;

    expect(error instanceof Error ? error.message : "").toBe("Stream URL discovery for bob was cancelled.");
    expect(spawner.processes[0].signals).toEqual(["SIGTERM"]);
  });
});
