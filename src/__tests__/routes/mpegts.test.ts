/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * mpegts.test.ts: Tests for the MPEG-TS stream routes and their response adapter.
 */
import { FakeSpawner, sleep } from "../helpers/fakeProcess.js";
import { type StreamResponse, streamChannel, streamGuideNumber } from "../../routes/mpegts.js";
import { createServices, stopServices } from "../../app.js";
import { describe, expect, test } from "@jest/globals";
import type { AppContext } from "../../context.js";
import { EventEmitter } from "node:events";
import type { StreamingConfig } from "../../types/index.js";
import { cloneDefaults } from "../../config/userConfig.js";
import { makeChannel } from "../helpers/channels.js";

/**
 * An in-memory HTTP response. Writes complete on the next turn of the event loop, like a socket flush.
 */
class FakeResponse extends EventEmitter implements StreamResponse {

  public body = "";
  public readonly chunks: Buffer[] = [];
  public contentType = "";
  public destroyed = false;
  public readonly headers: Record<string, string> = {};
  public headersSent = false;

  // Called with each accepted chunk, before its write completes.
  public onWrite: () => void = () => { /* Nothing by default. */ };

  public statusCode = 200;
  public writableEnded = false;
  public writesAfterClose = 0;

  public destroy(): this {

    if(!this.destroyed) {

      this.destroyed = true;
      this.emit("close");
    }

    return this;
  }

  public end(): this {

    this.writableEnded = true;

    return this;
  }

  public flushHeaders(): void {

    this.headersSent = true;
  }

  public json(body: unknown): this {

    this.contentType = "application/json";

    return this.send(JSON.stringify(body));
  }

  public send(body: string): this {

    this.body = body;
    this.headersSent = true;
    this.writableEnded = true;

    return this;
  }

  public setHeader(name: string, value: string): this {

    this.headers[name.toLowerCase()] = value;

    return this;
  }

  public status(code: number): this {

    this.statusCode = code;

    return this;
  }

  public type(type: string): this {

    this.contentType = type;

    return this;
  }

  public write(chunk: Buffer, callback: (error?: Error | null) => void): boolean {

    if(this.destroyed || this.writableEnded) {

      this.writesAfterClose++;
      setImmediate(() => callback(new Error("write after close")));

      return false;
    }

    this.chunks.push(Buffer.from(chunk));
    this.onWrite();
    setImmediate(() => callback(null));

    return true;
  }

  public get text(): string {

    return Buffer.concat(this.chunks).toString();
  }
}

function createContext(spawner: FakeSpawner, streaming: Partial<StreamingConfig> = {}): AppContext {

  const config = cloneDefaults();

  config.recording.enabled = false;
  config.streaming = { ...config.streaming, ...streaming };

  const ctx = createServices(config, { spawn: spawner.spawn });

  ctx.store.replace([ makeChannel("alice", true), makeChannel("bob", false) ]);

  return ctx;
}

describe("stream routes", () => {

  test("an unknown channel is answered with 404 and starts nothing", async () => {

    const spawner = new FakeSpawner();
    const ctx = createContext(spawner);
    const res = new FakeResponse();

    await streamChannel(ctx, { params: { channel: "Zed" } }, res);

    expect(res.statusCode).toBe(404);
    expect(res.contentType).toBe("application/json");
    expect(JSON.parse(res.body)).toEqual({ error: "Channel zed is not in the lineup." });
    expect(spawner.processes).toHaveLength(0);
    expect(ctx.registry.count).toBe(0);
  });

  test("an unknown guide number is answered with 404", async () => {

    const spawner = new FakeSpawner();
    const ctx = createContext(spawner);
    const res = new FakeResponse();

    await streamGuideNumber(ctx, { params: { number: "9" } }, res);

    expect(res.statusCode).toBe(404);
    expect(JSON.parse(res.body)).toEqual({ error: "No channel has guide number 9." });
    expect(spawner.processes).toHaveLength(0);
  });

  test("a guide number tunes the channel that carries it", async () => {

    const spawner = new FakeSpawner({ behavior: (child) => {

      child.finish(0);
    } });
    const ctx = createContext(spawner);
    const res = new FakeResponse();

    await streamGuideNumber(ctx, { params: { number: "1" } }, res);

    expect(spawner.processes[0].args[0]).toBe("https://www.twitch.tv/alice");
  });

  test("a launch failure is answered with a plain-text 500 and no stream headers", async () => {

    const spawner = new FakeSpawner({ fail: () => true });
    const ctx = createContext(spawner);
    const res = new FakeResponse();

    await streamChannel(ctx, { ip: "192.168.1.20", params: { channel: "alice" } }, res);

    expect(res.statusCode).toBe(500);
    expect(res.contentType).toBe("text/plain");
    expect(res.body).toBe("Unable to start extractor (streamlink): spawn streamlink ENOENT.");
    expect(res.headers).toEqual({});
    expect(ctx.registry.count).toBe(0);
  });

  test("a live channel is streamed as MPEG-TS with no-cache headers", async () => {

    const spawner = new FakeSpawner({ behavior: (child) => {

      child.stdout.write("TS-DATA");
      setImmediate(() => child.finish(0));
    } });
    const ctx = createContext(spawner);
    const res = new FakeResponse();

    await streamChannel(ctx, { ip: "192.168.1.20", params: { channel: "Alice" } }, res);

    expect(res.statusCode).toBe(200);
    expect(res.headers).toEqual({

      "cache-control": "no-cache",
      "connection": "close",
      "content-type": "video/mp2t",
      "transfermode.dlna.org": "Streaming"
    });
    expect(res.text).toBe("TS-DATA");
    expect(res.writableEnded).toBe(true);
    expect(res.destroyed).toBe(false);
    expect(ctx.registry.count).toBe(0);
  });

  test("nothing is written once the response has closed", async () => {

    const spawner = new FakeSpawner({ behavior: (child) => {

      child.stdout.write("AAAA");
    } });
    const ctx = createContext(spawner, { chunkSize: 2 });
    const res = new FakeResponse();

    res.onWrite = (): void => {

      res.destroy();
    };

    await streamChannel(ctx, { params: { channel: "alice" } }, res);

    expect(res.text).toBe("AA");
    expect(res.writesAfterClose).toBe(0);
    expect(spawner.processes[0].signals).toEqual(["SIGTERM"]);
    expect(ctx.registry.count).toBe(0);
  });

  test("shutdown waits until every viewer pipeline has exited", async () => {

    const spawner = new FakeSpawner();
    const ctx = createContext(spawner);
    const res = new FakeResponse();
    const pending = streamChannel(ctx, { params: { channel: "alice" } }, res);

    for(let i = 0; (i < 50) && !res.headersSent; i++) {

      // eslint-disable-next-line no-await-in-loop
      await sleep(10);
    }

    expect(ctx.registry.count).toBe(1);

    await stopServices(ctx);

    expect(spawner.processes[0].exited).toBe(true);
    expect(spawner.processes[0].signals).toEqual(["SIGTERM"]);
    expect(res.destroyed).toBe(true);

    await pending;

    expect(ctx.registry.count).toBe(0);
  });
});
