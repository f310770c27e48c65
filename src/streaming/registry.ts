/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * registry.ts: Viewer session tracking for TwitchTuner.
 */
import type { ExtractionMode, Nullable } from "../types/index.js";

/* The session registry tracks every viewer currently connected to /stream/:channel. It is not involved in data flow; each session owns its own pipeline. The registry
 * exists so that the /streams endpoint can list sessions, DELETE /streams/:id can end one, status.json can fill tuner slots, the health endpoint can count viewers,
 * and graceful shutdown can abort everything and wait for each pipeline to be torn down before the server closes.
 */

/**
 * Registry entry for an active viewer session.
 */
export interface ViewerSession {

  // Bytes written to the client so far. Updated by the copy loop.
  bytesSent: number;

  // The channel being served.
  readonly channelId: string;

  // IP address of the client, if known.
  readonly clientAddress: Nullable<string>;

  // Unique numeric identifier for this session.
  readonly id: number;

  readonly mode: ExtractionMode;

  readonly startTime: Date;

  // String identifier for logging (e.g., "alice-3").
  readonly streamIdStr: string;

  // Aborts the session. The same path a client disconnect takes.
  readonly terminate: (reason: string) => void;
}

/**
 * Parameters for registering a new session.
 */
export interface ViewerSessionInit {

  channelId: string;
  clientAddress: Nullable<string>;
  mode: ExtractionMode;
  terminate: (reason: string) => void;
}

/**
 * Tracks active viewer sessions.
 */
export class SessionRegistry {

  // Settles when each session's serve call has returned, which is after its pipeline has been torn down.
  private readonly completions = new Map<number, Promise<unknown>>();

  private nextId = 1;
  private readonly sessions = new Map<number, ViewerSession>();

  /**
   * Registers a new session and assigns it an identifier.
   * @param init - Session parameters.
   * @returns The registered session.
   */
  public register(init: ViewerSessionInit): ViewerSession {

    const id = this.nextId++;
    const session: ViewerSession = {

      bytesSent: 0,
      channelId: init.channelId,
      clientAddress: init.clientAddress,
      id,
      mode: init.mode,
      startTime: new Date(),
      streamIdStr: [ init.channelId, "-", String(id) ].join(""),
      terminate: init.terminate
    };

    this.sessions.set(id, session);

    return session;
  }

  /**
   * Records the work serving a session, so terminateAll() can wait for it.
   * @param id - The session id.
   * @param completion - Settles once the session is fully torn down.
   */
  public track(id: number, completion: Promise<unknown>): void {

    if(this.sessions.has(id)) {

      this.completions.set(id, completion);
    }
  }

  /**
   * Removes a session. Safe to call for a session that is already gone.
   * @param id - The session id.
   */
  public unregister(id: number): void {

    this.sessions.delete(id);
    this.completions.delete(id);
  }

  /**
   * @param id - The session id.
   * @returns The session, or undefined if it is not registered.
   */
  public get(id: number): ViewerSession | undefined {

    return this.sessions.get(id);
  }

  /**
   * @returns All active sessions, oldest first.
   */
  public getAll(): ViewerSession[] {

    return [...this.sessions.values()].sort((a, b) => a.id - b.id);
  }

  /**
   * Aborts every active session and waits for their pipelines to be torn down. Used during graceful shutdown.
   * @param reason - Reason recorded in each session's log.
   */
  public async terminateAll(reason: string): Promise<void> {

    const pending = this.getAll().map((session) => {

      const completion = this.completions.get(session.id) ?? Promise.resolve();

      session.terminate(reason);

      return completion;
    });

    await Promise.allSettled(pending);
  }

  public get count(): number {

    return this.sessions.size;
  }
}
