/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * mpegts.test.ts: Tests for the live MPEG-TS streaming service.
 */
import { FakeSpawner, createDeferred, sleep } from "../helpers/fakeProcess.js";
import { describe, expect, test } from "@jest/globals";
import { LiveStreamService } from "../../streaming/mpegts.js";
import { PipelineRunner } from "../../streaming/pipeline.js";
import type { StreamClient } from "../../streaming/mpegts.js";
import { StreamUrlCache } from "../../streaming/urlCache.js";
import type { StreamingConfig } from "../../types/index.js";
import { cloneDefaults } from "../../config/userConfig.js";

/**
 * Records everything the service does to a response.
 */
class FakeClient implements StreamClient {

  public readonly chunks: Buffer[] = [];
  public commits = 0;
  public ends = 0;
  public readonly failures: { message: string; status: number }[] = [];
  public headersSent = false;

  // Called with each chunk before the write resolves.
  public onWrite: (chunk: Buffer) => void = () => { /* Nothing by default. */ };

  public commitHeaders(): void {

    this.commits++;
    this.headersSent = true;
  }

  public end(): void {

    this.ends++;
  }

  public fail(status: number, message: string): void {

    this.failures.push({ message, status });
  }

  public async write(chunk: Buffer): Promise<void> {

    if(!this.headersSent) {

      throw new Error("write before headers");
    }

    this.chunks.push(Buffer.from(chunk));
    this.onWrite(chunk);

    return Promise.resolve();
  }

  public get text(): string {

    return Buffer.concat(this.chunks).toString();
  }
}

function setup(overrides: Partial<StreamingConfig>, spawner: FakeSpawner): { cache: StreamUrlCache; service: LiveStreamService } {

  const settings: StreamingConfig = { ...cloneDefaults().streaming, extractorArgs: "", ...overrides };
  const cache = new StreamUrlCache();
  const runner = new PipelineRunner({ killGracePeriod: 50, spawn: spawner.spawn });

  return { cache, service: new LiveStreamService({ runner, settings, urlCache: cache }) };
}

describe("LiveStreamService", () => {

  test("direct mode streams extractor output and ends the response when the broadcast ends", async () => {

    const spawner = new FakeSpawner({ behavior: (child) => {

      child.stdout.write("0123456789");
      setImmediate(() => child.finish(0));
    } });
    const { service } = setup({ chunkSize: 4 }, spawner);
    const client = new FakeClient();
    const totals: number[] = [];

    const outcome = await service.serve("alice", client, new AbortController().signal, (total) => totals.push(total));

    expect(outcome.reason).toBe("upstream-ended");
    expect(outcome.bytes).toBe(10);
    expect(outcome.mode).toBe("direct");
    expect(client.commits).toBe(1);
    expect(client.chunks.map((chunk) => chunk.length)).toEqual([ 4, 4, 2 ]);
    expect(client.text).toBe("0123456789");
    expect(client.ends).toBe(1);
    expect(client.failures).toEqual([]);
    expect(totals).toEqual([ 4, 8, 10 ]);
    expect(spawner.processes[0].args).toEqual([ "https://www.twitch.tv/alice", "1080p60,1080p,720p60,720p,best", "--stdout", "--quiet" ]);
  });

  test("discover mode caches the URL so a second viewer skips discovery", async () => {

    const spawner = new FakeSpawner({ behavior: (child) => {

      if(child.args[0] === "--stream-url") {

        child.stdout.write("https://video.example/bob/index.m3u8\n");
        child.finish(0);

        return;
      }

      child.stdout.write("TS-DATA");
    } });
    const { cache, service } = setup({ extractionMode: "discover" }, spawner);
    const first = new FakeClient();
    const second = new FakeClient();
    const firstWrite = createDeferred();
    const secondWrite = createDeferred();

    first.onWrite = (): void => firstWrite.resolve();
    second.onWrite = (): void => secondWrite.resolve();

    const firstSession = service.serve("bob", first, new AbortController().signal);

    await firstWrite.promise;
    expect(cache.get("bob")).toBe("https://video.example/bob/index.m3u8");

    const secondSession = service.serve("bob", second, new AbortController().signal);

    await secondWrite.promise;

    expect(spawner.commands).toEqual([ "streamlink", "ffmpeg", "ffmpeg" ]);
    expect(spawner.processes[1].args).toContain("https://video.example/bob/index.m3u8");
    expect(spawner.processes[2].args).toContain("https://video.example/bob/index.m3u8");

    spawner.processes[1].finish(0);
    spawner.processes[2].finish(0);

    const outcomes = await Promise.all([ firstSession, secondSession ]);

    expect(outcomes.map((outcome) => [ outcome.reason, outcome.bytes, outcome.mode ])).toEqual([ [ "upstream-ended", 7, "discover" ],
      [ "upstream-ended", 7, "discover" ] ]);
    expect(first.text).toBe("TS-DATA");
    expect(second.text).toBe("TS-DATA");

    // The session teardown drops the URL so the next tune discovers a fresh one.
    expect(cache.get("bob")).toBeUndefined();
  });

  test("a client that disconnects mid-stream gets no further writes and the pipeline is torn down once", async () => {

    const spawner = new FakeSpawner({ behavior: (child) => {

      child.stdout.write(Buffer.alloc(30, 0x47));
    } });
    const { service } = setup({ chunkSize: 10 }, spawner);
    const client = new FakeClient();
    const controller = new AbortController();

    client.onWrite = (): void => controller.abort();

    const outcome = await service.serve("alice", client, controller.signal);

    expect(outcome.reason).toBe("client-cancelled");
    expect(outcome.error?.kind).toBe("ClientCancelled");
    expect(client.chunks).toHaveLength(1);
    expect(client.failures).toEqual([]);
    expect(client.ends).toBe(0);
    expect(spawner.processes[0].signals).toEqual(["SIGTERM"]);
    expect(spawner.processes[0].exited).toBe(true);
  });

  test("a failed launch is reported with a 500 before any header is sent", async () => {

    const spawner = new FakeSpawner({ fail: () => true });
    const { service } = setup({}, spawner);
    const client = new FakeClient();

    const outcome = await service.serve("alice", client, new AbortController().signal);

    expect(outcome.reason).toBe("launch-failed");
    expect(outcome.error?.kind).toBe("LaunchFailed");
    expect(client.commits).toBe(0);
    expect(client.failures).toEqual([{ message: "Unable to start extractor (streamlink): spawn streamlink ENOENT.", status: 500 }]);
  });

  test("a failed discovery drops any cached URL and answers 500", async () => {

    const spawner = new FakeSpawner({ behavior: (child) => {

      child.finish(1);
    } });
    const { service } = setup({ extractionMode: "discover" }, spawner);
    const client = new FakeClient();

    const outcome = await service.serve("bob", client, new AbortController().signal);

    expect(outcome.reason).toBe("launch-failed");
    expect(client.failures).toEqual([{ message: "No stream URL found for bob.", status: 500 }]);
    expect(spawner.commands).toEqual(["streamlink"]);
  });

  test("an upstream that ends before any data ends the already committed response", async () => {

    const spawner = new FakeSpawner({ behavior: (child) => {

      child.stderr.write("error: No playable streams found on this URL: https://www.twitch.tv/alice\n");
      setImmediate(() => child.finish(1));
    } });
    const { service } = setup({}, spawner);
    const client = new FakeClient();

    const outcome = await service.serve("alice", client, new AbortController().signal);

    expect(outcome.reason).toBe("upstream-ended");
    expect(outcome.bytes).toBe(0);
    expect(client.commits).toBe(1);
    expect(client.chunks).toEqual([]);
    expect(client.ends).toBe(1);
    expect(client.failures).toEqual([]);
  });

  test("headers are committed once the pipeline launches, before the extractor produces output", async () => {

    const spawner = new FakeSpawner();
    const { service } = setup({}, spawner);
    const client = new FakeClient();
    const controller = new AbortController();
    const pending = service.serve("alice", client, controller.signal);

    await sleep(50);

    expect(spawner.processes).toHaveLength(1);
    expect(spawner.processes[0].exited).toBe(false);
    expect(client.headersSent).toBe(true);
    expect(client.commits).toBe(1);
    expect(client.chunks).toEqual([]);

    controller.abort();

    const outcome = await pending;

    expect(outcome.reason).toBe("client-cancelled");
    expect(spawner.processes[0].signals).toEqual(["SIGTERM"]);
  });

  test("a failing client write ends the session as an I/O error", async () => {

    const spawner = new FakeSpawner({ behavior: (child) => {

      child.stdout.write("abc");
    } });
    const { service } = setup({}, spawner);
    const client = new FakeClient();

    client.onWrite = (): void => {

      throw new Error("EPIPE");
    };

    const outcome = await service.serve("alice", client, new AbortController().signal);

    expect(outcome.reason).toBe("io-error");
    expect(outcome.error?.message).toBe("Writing to the client failed: EPIPE.");
    expect(client.ends).toBe(1);
    expect(spawner.processes[0].signals).toEqual(["SIGTERM"]);
  });

  test("a session aborted before launch never writes", async () => {

    const spawner = new FakeSpawner();
    const { service } = setup({ extractionMode: "discover" }, spawner);
    const client = new FakeClient();
    const controller = new AbortController();
    const pending = service.serve("bob", client, controller.signal);

    await new Promise<void>((resolve) => setImmediate(resolve));
    await new Promise<void>((resolve) => setImmediate(resolve));
    controller.abort();

    const outcome = await pending;

    expect(outcome.reason).toBe("client-cancelled");
    expect(client.failures).toEqual([]);
    expect(client.commits).toBe(0);
  });
});
