/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * supervisor.ts: Background recording supervisor for TwitchTuner.
 */
import type { ChannelRecord, Nullable, RecordingConfig, StreamingConfig } from "../types/index.js";
import { LOG, WakeSignal, formatDuration, formatError } from "../utils/index.js";
import type { PipelineHandle, PipelineRunner, StageExit } from "../streaming/pipeline.js";
import { createWriteStream, promises as fsPromises } from "node:fs";
import type { StreamUrlCache } from "../streaming/urlCache.js";
import type { Writable } from "node:stream";
import { buildRecorderSpec } from "../streaming/extractors.js";
import { buildRecordingPath } from "./filenames.js";
import { cleanupRecordings } from "./retention.js";
import path from "node:path";
import { pipeline } from "node:stream/promises";

/*
 * RECORDING SUPERVISOR
 *
 * The supervisor keeps one recorder running for every channel that is live and has recording enabled, and none for any other channel. It does this by
 * reconciliation rather than by reacting to individual events: each tick compares the desired set against the job table and corrects the difference.
 *
 * Job states:
 *
 *   starting --> recording --> stopping --> (removed)
 *                          \-> crashed  --> (removed, restarted next tick if still desired)
 *
 * A tick runs in three passes:
 *
 * 1. Reap. Jobs whose recorder exited on its own are logged and removed.
 * 2. Stop. Jobs for channels no longer desired are torn down and removed.
 * 3. Start. Desired channels without a job get one.
 *
 * Because reaping comes first, a crashed recorder for a still-live channel is restarted in the same tick, and at most once per tick. There is no other retry
 * mechanism. Recorders that keep dying within a minute of starting are counted, and a warning is logged once the count reaches three so that an operator notices
 * the loop.
 *
 * Ticks are triggered by notify() after each channel refresh, with the fallback interval as an upper bound on the wait. Retention cleanup piggybacks on the tick
 * once an hour.
 *
 * An error while reconciling one channel is logged and never affects the others or the loop.
 */

// How often retention cleanup runs.
const RETENTION_INTERVAL = 60 * 60 * 1000;

// A recorder that exits sooner than this after starting counts as a short run.
const SHORT_RUN_THRESHOLD = 60 * 1000;

// Consecutive short runs before we warn about a crash loop.
const CRASH_LOOP_WARNING = 3;

/**
 * Anything that can hand out the current channel list. The channel store satisfies this.
 */
export interface ChannelSource {

  getChannels(): readonly ChannelRecord[];
}

/**
 * Opens the file a recorder writes to.
 */
export type SinkOpener = (outputPath: string) => Promise<Writable>;

export type RecordingJobState = "crashed" | "recording" | "starting" | "stopping";

/**
 * Read-only view of a recording job, for the API.
 */
export interface RecordingJobInfo {

  readonly channelId: string;
  readonly displayName: string;
  readonly outputPath: string;
  readonly startedAt: Date;
  readonly state: RecordingJobState;

  // Last-known stream title.
  readonly title: string;
}

/**
 * Internal job record.
 */
interface RecordingJob {

  readonly channelId: string;
  readonly displayName: string;

  // Exit results once the recorder has exited on its own.
  exits: Nullable<readonly StageExit[]>;

  handle: Nullable<PipelineHandle>;
  readonly outputPath: string;

  // Settles when the recorder output has been fully written and the file closed.
  written: Promise<void>;

  readonly startedAt: Date;
  state: RecordingJobState;

  // Last-known stream title. Refreshed every tick while the channel stays live.
  title: string;
}

/**
 * Dependencies and settings of the supervisor.
 */
export interface RecordingSupervisorOptions {

  channels: ChannelSource;

  // Clock in milliseconds. Defaults to Date.now.
  now?: () => number;

  // Output file factory. Defaults to creating the directory and opening a write stream.
  openSink?: SinkOpener;

  // Recording root directory.
  root: string;

  runner: PipelineRunner;
  settings: RecordingConfig;
  streaming: StreamingConfig;
  urlCache: StreamUrlCache;
}

/**
 * The default sink: a file write stream, with its directory created on demand.
 * @param outputPath - The file to write.
 * @returns The write stream.
 */
export async function openFileSink(outputPath: string): Promise<Writable> {

  await fsPromises.mkdir(path.dirname(outputPath), { recursive: true });

  return createWriteStream(outputPath);
}

/**
 * Reconciles running recorders against the channel snapshot.
 */
export class RecordingSupervisor {

  private abortController: Nullable<AbortController> = null;
  private readonly channels: ChannelSource;
  private readonly jobs = new Map<string, RecordingJob>();
  private lastRetention: Nullable<number> = null;
  private loop: Nullable<Promise<void>> = null;
  private readonly now: () => number;
  private readonly openSink: SinkOpener;
  private readonly root: string;
  private readonly runner: PipelineRunner;
  private readonly settings: RecordingConfig;
  private readonly shortRuns = new Map<string, number>();
  private readonly streaming: StreamingConfig;
  private tick: Nullable<Promise<void>> = null;
  private readonly urlCache: StreamUrlCache;
  private readonly wake = new WakeSignal();

  constructor(options: RecordingSupervisorOptions) {

    this.channels = options.channels;
    this.now = options.now ?? Date.now;
    this.openSink = options.openSink ?? openFileSink;
    this.root = options.root;
    this.runner = options.runner;
    this.settings = options.settings;
    this.streaming = options.streaming;
    this.urlCache = options.urlCache;
  }

  /**
   * Starts the background loop. The first tick runs immediately.
   */
  public start(): void {

    if(this.loop) {

      return;
    }

    this.abortController = new AbortController();
    this.loop = this.run(this.abortController.signal);

    LOG.info("Recording supervisor started. Recordings are written to %s.", this.root);
  }

  /**
   * Requests a tick. Several requests before the loop wakes collapse into one.
   */
  public notify(): void {

    this.wake.notify();
  }

  /**
   * Runs one reconciliation tick. A call made while a tick is in progress joins that tick.
   */
  public async reconcile(): Promise<void> {

    this.tick ??= this.runTick().finally(() => {

      this.tick = null;
    });

    return this.tick;
  }

  /**
   * Stops the loop and tears down every recorder. Resolves once no recorder process is left.
   */
  public async stop(): Promise<void> {

    this.abortController?.abort();

    if(this.loop) {

      await this.loop;
    }

    this.loop = null;
    this.abortController = null;

    if(this.tick) {

      await this.tick;
    }

    const jobs = [...this.jobs.values()];

    await Promise.all(jobs.map(async (job) => this.stopJob(job, "supervisor shutting down")));

    if(jobs.length > 0) {

      LOG.info("Stopped %s active recording%s.", jobs.length, (jobs.length === 1) ? "" : "s");
    }
  }

  /**
   * @returns A view of every job, ordered by channel id.
   */
  public getJobs(): RecordingJobInfo[] {

    return [...this.jobs.values()].sort((a, b) => a.channelId.localeCompare(b.channelId)).map((job) => ({

      channelId: job.channelId,
      displayName: job.displayName,
      outputPath: job.outputPath,
      startedAt: job.startedAt,
      state: job.state,
      title: job.title
    }));
  }

  /**
   * @param channelId - The channel id.
   * @returns True if a job exists for the channel, in any state.
   */
  public hasJob(channelId: string): boolean {

    return this.jobs.has(channelId);
  }

  /**
   * Number of jobs currently held.
   */
  public get activeCount(): number {

    return this.jobs.size;
  }

  /**
   * Whether the background loop is running.
   */
  public get running(): boolean {

    return this.loop !== null;
  }

  private async run(signal: AbortSignal): Promise<void> {

    while(!signal.aborted) {

      // eslint-disable-next-line no-await-in-loop
      await this.reconcile();

      // eslint-disable-next-line no-await-in-loop
      const reason = await this.wake.wait(this.settings.fallbackInterval, signal);

      LOG.debug("recording", "Supervisor woke: %s.", reason);
    }
  }

  private async runTick(): Promise<void> {

    const channels = this.channels.getChannels();
    const desired = new Map<string, ChannelRecord>();

    for(const channel of channels) {

      if(channel.live && channel.recordingEnabled) {

        desired.set(channel.id, channel);

        const job = this.jobs.get(channel.id);

        if(job && channel.title) {

          job.title = channel.title;
        }
      } else if(!channel.live) {

        // A URL discovered while the channel was live is useless now.
        this.urlCache.invalidate(channel.id);
      }
    }

    LOG.debug("recording", "Reconciling: %s desired, %s job%s.", desired.size, this.jobs.size, (this.jobs.size === 1) ? "" : "s");

    for(const job of [...this.jobs.values()]) {

      if(job.state === "crashed") {

        this.reap(job);
      }
    }

    await Promise.all([...this.jobs.values()].filter((job) => !desired.has(job.channelId) && (job.state === "recording")).map(async (job) => {

      try {

        await this.stopJob(job, "channel no longer live or recording disabled");
      } catch(error) {

        LOG.error("Unable to stop the recording of %s: %s.", job.channelId, formatError(error));
      }
    }));

    for(const channel of desired.values()) {

      if(this.jobs.has(channel.id)) {

        continue;
      }

      try {

        // eslint-disable-next-line no-await-in-loop
        await this.startJob(channel);
      } catch(error) {

        LOG.error("Unable to start recording %s: %s.", channel.id, formatError(error));
      }
    }

    await this.runRetention();
  }

  /**
   * Removes a job whose recorder exited on its own and tracks short runs.
   * @param job - The crashed job.
   */
  private reap(job: RecordingJob): void {

    this.jobs.delete(job.channelId);

    const runtime = this.now() - job.startedAt.getTime();
    const exit = job.exits?.find((entry) => (entry.code !== 0) || (entry.signal !== null)) ?? job.exits?.[0];
    const exitText = exit ? (exit.signal ? "signal " + exit.signal : "code " + String(exit.code)) : "unknown status";

    const diagnostics = job.handle?.diagnostics() ?? "";

    LOG.warn("Recorder for %s exited with %s after %s%s", job.channelId, exitText, formatDuration(runtime), diagnostics ? ": " + diagnostics : ".");

    if(runtime < SHORT_RUN_THRESHOLD) {

      const count = (this.shortRuns.get(job.channelId) ?? 0) + 1;

      this.shortRuns.set(job.channelId, count);

      if(count >= CRASH_LOOP_WARNING) {

        LOG.warn("Recorder for %s has exited within a minute of starting %s times in a row.", job.channelId, count);
      }
    } else {

      this.shortRuns.delete(job.channelId);
    }
  }

  private async startJob(channel: ChannelRecord): Promise<void> {

    const startedAt = new Date(this.now());
    const outputPath = buildRecordingPath(this.root, channel, startedAt);
    const job: RecordingJob = {

      channelId: channel.id,
      displayName: channel.displayName,
      exits: null,
      handle: null,
      outputPath,
      startedAt,
      state: "starting",
      title: channel.title,
      written: Promise.resolve()
    };

    // The job is in the table before the first await, so a concurrent tick cannot start a second recorder for the channel.
    this.jobs.set(channel.id, job);

    let handle: Nullable<PipelineHandle> = null;

    // The recorder is started before the file is opened, so a recorder that cannot launch leaves nothing behind.
    try {

      handle = await this.runner.start(buildRecorderSpec(channel.id, this.streaming, this.settings));

      const sink = await this.openSink(outputPath);

      job.handle = handle;
      job.state = "recording";
      job.written = this.writeOutput(job, handle, sink);

      void handle.exited.then((exits) => {

        job.exits = exits;

        if(job.state === "recording") {

          job.state = "crashed";
        }
      });
    } catch(error) {

      this.jobs.delete(channel.id);
      await handle?.teardown("recording output could not be opened");

      throw error;
    }

    LOG.info("Recording %s to %s.", channel.id, outputPath);
  }

  /**
   * Copies recorder output into the sink. A write failure stops the recorder, and the next tick starts over with a new file.
   */
  private async writeOutput(job: RecordingJob, handle: PipelineHandle, sink: Writable): Promise<void> {

    try {

      await pipeline(handle.output, sink);
    } catch(error) {

      if(job.state !== "stopping") {

        LOG.error("Writing the recording of %s to %s failed: %s.", job.channelId, job.outputPath, formatError(error));
      }

      await handle.teardown("recording output failed");
    }
  }

  private async stopJob(job: RecordingJob, reason: string): Promise<void> {

    job.state = "stopping";

    try {

      await job.handle?.teardown(reason);
      await job.written;
    } finally {

      // Only remove the job if a newer one has not already replaced it.
      if(this.jobs.get(job.channelId) === job) {

        this.jobs.delete(job.channelId);
      }
    }

    this.shortRuns.delete(job.channelId);
    LOG.info("Stopped recording %s: %s.", job.channelId, reason);
  }

  private async runRetention(): Promise<void> {

    const now = this.now();

    if((this.lastRetention !== null) && ((now - this.lastRetention) < RETENTION_INTERVAL)) {

      return;
    }

    this.lastRetention = now;

    try {

      const active = new Set([...this.jobs.values()].map((job) => job.outputPath));

      await cleanupRecordings(this.root, this.settings.retentionDays, new Date(now), active);
    } catch(error) {

      LOG.error("Retention cleanup of %s failed: %s.", this.root, formatError(error));
    }
  }
}
