/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * fakeProcess.ts: In-process stand-ins for extractor and ffmpeg child processes.
 */
import type { StageProcess, StageSpawner } from "../../streaming/pipeline.js";
import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";

/**
 * A child process that lives entirely in memory. Tests write to its stdout and stderr and decide when and how it exits.
 */
export class FakeProcess extends EventEmitter implements StageProcess {

  public readonly args: readonly string[];
  public readonly command: string;
  public exitCode: number | null = null;
  public exited = false;

  // When set, SIGTERM is recorded but ignored, so only SIGKILL ends the process.
  public ignoreSigterm = false;

  public readonly pid: number;
  public signalCode: NodeJS.Signals | null = null;

  // Every signal sent through kill(), in order.
  public readonly signals: NodeJS.Signals[] = [];

  public readonly stderr = new PassThrough();
  public readonly stdin = new PassThrough();
  public readonly stdout = new PassThrough();

  constructor(command: string, args: readonly string[], pid: number) {

    super();

    this.args = args;
    this.command = command;
    this.pid = pid;

    // Nothing reads the fake's stdin unless a test does, so keep it flowing into the void.
    this.stdin.resume();
  }

  public kill(signal: NodeJS.Signals = "SIGTERM"): boolean {

    this.signals.push(signal);

    if(this.exited) {

      return false;
    }

    if((signal === "SIGTERM") && this.ignoreSigterm) {

      return true;
    }

    setImmediate(() => this.finish(null, signal));

    return true;
  }

  /**
   * Ends the process: closes its output streams and emits "exit". Later calls do nothing.
   * @param code - Exit code, or null when ended by a signal.
   * @param signal - The signal that ended it, if any.
   */
  public finish(code: number | null, signal: NodeJS.Signals | null = null): void {

    if(this.exited) {

      return;
    }

    this.exited = true;
    this.exitCode = code;
    this.signalCode = signal;

    for(const stream of [ this.stdout, this.stderr ]) {

      if(!stream.destroyed) {

        stream.end();
      }
    }

    this.emit("exit", code, signal);
  }
}

/**
 * Decides what a fake process does once it has spawned.
 */
export type FakeBehavior = (process: FakeProcess) => void;

export interface FakeSpawnerOptions {

  // Runs right after "spawn" is emitted.
  behavior?: FakeBehavior;

  // Returns true for invocations that should fail to start with ENOENT.
  fail?: (command: string, args: readonly string[]) => boolean;
}

/**
 * Records every process the pipeline runner asks for and hands out fakes.
 */
export class FakeSpawner {

  public readonly processes: FakeProcess[] = [];

  private nextPid = 1000;
  private readonly options: FakeSpawnerOptions;

  constructor(options: FakeSpawnerOptions = {}) {

    this.options = options;
  }

  public readonly spawn: StageSpawner = (command, args) => {

    const child = new FakeProcess(command, args, this.nextPid++);

    this.processes.push(child);

    setImmediate(() => {

      if(this.options.fail?.(command, args)) {

        const error = Object.assign(new Error("spawn " + command + " ENOENT"), { code: "ENOENT" });

        child.exited = true;
        child.emit("error", error);

        return;
      }

      child.emit("spawn");
      this.options.behavior?.(child);
    });

    return child;
  };

  /**
   * The commands spawned so far, in order.
   */
  public get commands(): string[] {

    return this.processes.map((child) => child.command);
  }
}

/**
 * Resolves after pending I/O callbacks and timers of zero delay have run.
 */
export async function flush(): Promise<void> {

  return new Promise<void>((resolve) => {

    setImmediate(resolve);
  });
}

/**
 * Resolves after the given number of milliseconds.
 */
export async function sleep(ms: number): Promise<void> {

  return new Promise<void>((resolve) => {

    setTimeout(resolve, ms);
  });
}

/**
 * A promise with its resolve function exposed.
 */
export interface Deferred<T> {

  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function createDeferred<T = void>(): Deferred<T> {

  let resolve: (value: T) => void = () => { /* Replaced below. */ };
  const promise = new Promise<T>((res) => {

    resolve = res;
  });

  return { promise, resolve };
}
