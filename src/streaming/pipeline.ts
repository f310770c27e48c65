/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * pipeline.ts: Child process pipeline runner for TwitchTuner.
 */
import { LOG, LaunchFailedError, delay, formatError } from "../utils/index.js";
import type { Readable, Writable } from "node:stream";
import type { EventEmitter } from "node:events";
import { spawn } from "node:child_process";

/*
 * PROCESS PIPELINE
 *
 * Every byte TwitchTuner serves or records comes out of a chain of one or two child processes: an extractor (streamlink) that talks to Twitch, optionally followed by
 * ffmpeg as a fetch or transcode stage. This module starts such a chain, wires each stage's stdout into the next stage's stdin, and hands the caller a handle whose
 * output is the last stage's stdout.
 *
 * Data flow:
 *
 *   stage[0].stdout --pipe--> stage[1].stdin
 *   stage[n-1].stdout ------> handle.output (consumed by the caller)
 *   stage[i].stderr --------> bounded tail buffer + debug log
 *
 * pipe() gives us back-pressure for free: when the caller stops reading output, the last stage blocks on its stdout, which stops it reading stdin, which blocks the
 * stage before it. Nothing in this process buffers the whole stream.
 *
 * Lifecycle rules:
 *
 * 1. A stage is launched when its process emits "spawn". If any stage emits "error" instead, the stages already started are torn down and start() rejects with
 *    LaunchFailedError.
 * 2. When a stage exits on its own, every upstream stage still running is sent SIGTERM, since nothing reads its output anymore. Downstream stages see EOF on stdin
 *    and finish by themselves.
 * 3. teardown() is idempotent. It sends SIGTERM to every running stage, escalates to SIGKILL after the grace period, and resolves once every stage has exited. Every
 *    call returns the same promise.
 */

// Child process stderr lines that carry no diagnostic value.
const STDERR_NOISE_PATTERNS = [ "Press [q] to stop", "frame=", "size=", "time=", "bitrate=", "speed=" ];

// Characters of stderr text retained per stage for diagnostics.
const STDERR_TAIL_CHARS = 8192;

/**
 * The slice of a child process that the runner depends on. Node's ChildProcess satisfies it, and tests substitute in-process fakes.
 */
export interface StageProcess extends EventEmitter {

  readonly exitCode: number | null;
  readonly pid?: number | undefined;
  readonly signalCode: NodeJS.Signals | null;
  readonly stderr: Readable | null;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;

  kill(signal?: NodeJS.Signals): boolean;
}

/**
 * Starts one stage process. The returned process must emit "spawn" or "error" exactly once.
 */
export type StageSpawner = (command: string, args: readonly string[]) => StageProcess;

/**
 * One child process in a pipeline.
 */
export interface StageSpec {

  readonly args: readonly string[];
  readonly command: string;

  // Short name used in logs and error messages (e.g., "extractor", "transcoder").
  readonly label: string;
}

/**
 * An ordered chain of one or two stages.
 */
export interface PipelineSpec {

  // Identifies the pipeline in logs (e.g., "live:alice", "record:alice").
  readonly name: string;
  readonly stages: readonly [StageSpec] | readonly [StageSpec, StageSpec];
}

/**
 * How a single stage ended.
 */
export interface StageExit {

  readonly code: number | null;
  readonly label: string;
  readonly signal: NodeJS.Signals | null;
}

/**
 * A running pipeline.
 */
export interface PipelineHandle {

  // Settles once every stage has exited. Never rejects.
  readonly exited: Promise<readonly StageExit[]>;

  readonly id: number;
  readonly name: string;

  // The last stage's stdout.
  readonly output: Readable;

  // True while at least one stage is still running.
  readonly running: boolean;

  readonly startedAt: Date;

  // True once teardown() has been called.
  readonly tornDown: boolean;

  /**
   * Returns the captured stderr tail of the first stage, which is where the extractor reports why a channel could not be opened.
   */
  diagnostics(): string;

  /**
   * Stops every running stage. Idempotent; safe after the pipeline has already exited on its own.
   */
  teardown(reason?: string): Promise<void>;
}

/**
 * Options for the runner.
 */
export interface PipelineRunnerOptions {

  // Milliseconds between SIGTERM and SIGKILL during teardown.
  killGracePeriod: number;

  // Process factory. Defaults to child_process.spawn with piped stdio.
  spawn?: StageSpawner;
}

/**
 * The default spawner: a real child process with all three stdio streams piped.
 * @param command - Executable to run.
 * @param args - Its arguments.
 * @returns The child process.
 */
export const spawnStage: StageSpawner = (command, args) => spawn(command, [...args], { stdio: [ "pipe", "pipe", "pipe" ] });

/**
 * Keeps the last few thousand characters written to a stage's stderr.
 */
class StderrTail {

  private buffer = "";

  public append(text: string): void {

    this.buffer += text;

    if(this.buffer.length > STDERR_TAIL_CHARS) {

      this.buffer = this.buffer.slice(this.buffer.length - STDERR_TAIL_CHARS);
    }
  }

  public text(): string {

    return this.buffer.trim();
  }
}

/**
 * Internal bookkeeping for one launched stage.
 */
interface LaunchedStage {

  done: boolean;
  readonly exited: Promise<StageExit>;
  readonly process: StageProcess;
  readonly spec: StageSpec;
  readonly stderr: Readable;
  readonly stderrTail: StderrTail;
  readonly stdin: Writable;
  readonly stdout: Readable;
}

// Monotonic pipeline identifier for log correlation.
let nextPipelineId = 1;

/**
 * Waits for a freshly spawned process to report either "spawn" or "error".
 * @param child - The process.
 * @param spec - Its stage spec, for error messages.
 * @returns Resolves on "spawn", rejects with LaunchFailedError on "error".
 */
async function awaitSpawn(child: StageProcess, spec: StageSpec): Promise<void> {

  return new Promise<void>((resolve, reject) => {

    const onSpawn = (): void => {

      child.off("error", onError);
      resolve();
    };

    const onError = (error: Error): void => {

      child.off("spawn", onSpawn);
      reject(new LaunchFailedError([ "Unable to start ", spec.label, " (", spec.command, "): ", formatError(error), "." ].join(""), spec.label, { cause: error }));
    };

    child.once("spawn", onSpawn);
    child.once("error", onError);
  });
}

/**
 * Spawns one stage and waits for it to launch. The exit watcher and stderr drain are attached before this function returns so no event can be missed.
 * @param spawner - The process factory.
 * @param spec - The stage to start.
 * @param pipelineName - The pipeline name, for logging.
 * @returns The launched stage.
 */
async function launchStage(spawner: StageSpawner, spec: StageSpec, pipelineName: string): Promise<LaunchedStage> {

  let child: StageProcess;

  try {

    child = spawner(spec.command, spec.args);
  } catch(error) {

    throw new LaunchFailedError([ "Unable to start ", spec.label, " (", spec.command, "): ", formatError(error), "." ].join(""), spec.label, { cause: error });
  }

  // Register the exit watcher before anything can await, so a process that dies immediately after spawning is still observed.
  const exited = new Promise<StageExit>((resolve) => {

    child.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {

      resolve({ code, label: spec.label, signal });
    });
  });

  await awaitSpawn(child, spec);

  const { stderr, stdin, stdout } = child;

  if(!stderr || !stdin || !stdout) {

    child.kill("SIGKILL");

    throw new LaunchFailedError([ "The ", spec.label, " was started without piped stdio." ].join(""), spec.label);
  }

  const stage: LaunchedStage = { done: false, exited, process: child, spec, stderr, stderrTail: new StderrTail(), stdin, stdout };

  void exited.then(() => {

    stage.done = true;
  });

  // Errors emitted after a successful spawn (a failed kill, for instance) must have a listener or Node treats them as fatal.
  child.on("error", (error: Error) => {

    LOG.debug("pipeline", "%s %s process error: %s.", pipelineName, spec.label, formatError(error));
  });

  // Drain stderr concurrently. Undrained stderr fills the OS pipe buffer and stalls the process.
  stderr.setEncoding("utf8");

  stderr.on("data", (data: string) => {

    stage.stderrTail.append(data);

    for(const rawLine of data.split(/\r?\n|\r/)) {

      const line = rawLine.trim();

      if((line.length === 0) || STDERR_NOISE_PATTERNS.some((pattern) => line.includes(pattern))) {

        continue;
      }

      LOG.debug("pipeline:stderr", "%s %s: %s", pipelineName, spec.label, line);
    }
  });

  stderr.on("error", (error: Error) => {

    LOG.debug("pipeline", "%s %s stderr error: %s.", pipelineName, spec.label, formatError(error));
  });

  return stage;
}

/**
 * A launched pipeline. Created only by PipelineRunner.start().
 */
class RunningPipeline implements PipelineHandle {

  public readonly exited: Promise<readonly StageExit[]>;
  public readonly id: number;
  public readonly name: string;
  public readonly output: Readable;
  public readonly startedAt = new Date();

  private readonly killGracePeriod: number;
  private readonly stages: readonly LaunchedStage[];
  private teardownPromise: Promise<void> | null = null;

  constructor(name: string, stages: readonly LaunchedStage[], killGracePeriod: number) {

    this.id = nextPipelineId++;
    this.killGracePeriod = killGracePeriod;
    this.name = name;
    this.stages = stages;
    this.output = stages[stages.length - 1].stdout;
    this.exited = Promise.all(stages.map(async (stage) => stage.exited));

    // Nothing writes to the first stage's stdin. Closing it lets tools that poll stdin for commands run unattended.
    const firstStdin = stages[0].stdin;

    firstStdin.on("error", () => { /* The process may already have closed its end. */ });
    firstStdin.end();

    for(let i = 0; i < stages.length; i++) {

      const stage = stages[i];

      if(i > 0) {

        const upstream = stages[i - 1];

        // A downstream stage that exits early turns writes into its stdin into EPIPE errors. The exit itself is what we report, so the write error is only logged.
        stage.stdin.on("error", (error: Error) => {

          LOG.debug("pipeline", "%s %s stdin closed: %s.", this.name, stage.spec.label, formatError(error));
        });

        upstream.stdout.pipe(stage.stdin);
      }

      void stage.exited.then((exit) => this.onStageExit(i, exit));
    }
  }

  public get running(): boolean {

    return this.stages.some((stage) => !stage.done);
  }

  public get tornDown(): boolean {

    return this.teardownPromise !== null;
  }

  public diagnostics(): string {

    return this.stages[0].stderrTail.text();
  }

  public async teardown(reason = "teardown"): Promise<void> {

    this.teardownPromise ??= this.performTeardown(reason);

    return this.teardownPromise;
  }

  /**
   * Reacts to a stage exiting. Outside of teardown, upstream stages lose their consumer and are stopped.
   * @param index - Position of the stage in the pipeline.
   * @param exit - How it ended.
   */
  private onStageExit(index: number, exit: StageExit): void {

    LOG.debug("pipeline", "%s %s exited with %s.", this.name, exit.label, exit.signal ? "signal " + exit.signal : "code " + String(exit.code));

    if(this.teardownPromise) {

      return;
    }

    for(let i = 0; i < index; i++) {

      const upstream = this.stages[i];

      if(!upstream.done) {

        upstream.process.kill("SIGTERM");
      }
    }
  }

  private async performTeardown(reason: string): Promise<void> {

    const running = this.stages.filter((stage) => !stage.done);

    if(running.length === 0) {

      return;
    }

    LOG.debug("pipeline", "Tearing down %s: %s.", this.name, reason);

    for(const stage of running) {

      stage.process.kill("SIGTERM");
    }

    // Race the exits against the grace period. The abort controller cancels the timer once the race is decided.
    const graceTimer = new AbortController();
    const exitedInTime = await Promise.race([ this.exited.then(() => true), delay(this.killGracePeriod, graceTimer.signal).then(() => false) ]);

    graceTimer.abort();

    if(!exitedInTime) {

      for(const stage of this.stages) {

        if(!stage.done) {

          LOG.warn("%s %s did not exit within %sms of SIGTERM. Sending SIGKILL.", this.name, stage.spec.label, this.killGracePeriod);
          stage.process.kill("SIGKILL");
        }
      }

      await this.exited;
    }
  }
}

/**
 * Starts pipelines. One runner is shared by the live stream service and the recording supervisor.
 */
export class PipelineRunner {

  private readonly killGracePeriod: number;
  private readonly spawner: StageSpawner;

  constructor(options: PipelineRunnerOptions) {

    this.killGracePeriod = options.killGracePeriod;
    this.spawner = options.spawn ?? spawnStage;
  }

  /**
   * Starts every stage of a pipeline in order and wires them together.
   * @param spec - The pipeline to start.
   * @returns The running pipeline.
   * @throws LaunchFailedError if any stage fails to start. Stages already started are torn down first.
   */
  public async start(spec: PipelineSpec): Promise<PipelineHandle> {

    const launched: LaunchedStage[] = [];

    try {

      for(const stageSpec of spec.stages) {

        // Stages start one after another so that a failure of the first never leaves a second stage waiting on a stdin nobody will write.
        // eslint-disable-next-line no-await-in-loop
        launched.push(await launchStage(this.spawner, stageSpec, spec.name));
      }
    } catch(error) {

      await Promise.all(launched.map(async (stage) => {

        if(!stage.done) {

          stage.process.kill("SIGKILL");
          await stage.exited;
        }
      }));

      throw error;
    }

    LOG.debug("pipeline", "Started %s: %s.", spec.name, launched.map((stage) => [ stage.spec.label, "[", String(stage.process.pid ?? "?"), "]" ].join("")).join(" | "));

    return new RunningPipeline(spec.name, launched, this.killGracePeriod);
  }
}
