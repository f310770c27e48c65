/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * errors.ts: Error formatting and pipeline error types for TwitchTuner.
 */

/**
 * Formats an error for logging by extracting the message if available, falling back to string conversion for non-Error objects. Trailing punctuation is stripped
 * to allow callers to add consistent punctuation in their log format strings.
 * @param error - The error to format.
 * @returns A string representation suitable for logging, without trailing punctuation.
 */
export function formatError(error: unknown): string {

  let message: string;

  if(error instanceof Error) {

    message = error.message;
  } else if(error && (typeof error === "object") && ("message" in error) && (typeof error.message === "string")) {

    message = error.message;
  } else {

    message = String(error);
  }

  // Strip trailing punctuation to prevent double punctuation when callers add their own.
  return message.replace(/[.!?]+$/, "");
}

/**
 * Returns the errno code of a Node system error ("ENOENT", "EPIPE", ...), or undefined for anything else.
 * @param error - The error to inspect.
 * @returns The code, if present.
 */
export function getErrorCode(error: unknown): string | undefined {

  if(error && (typeof error === "object") && ("code" in error) && (typeof error.code === "string")) {

    return error.code;
  }

  return undefined;
}

/*
 * PIPELINE ERRORS
 *
 * Every way a streaming or recording session can end maps to one of these kinds. The live pipeline reports the kind as the session outcome, and the supervisor logs it
 * when a recorder stops. Only LaunchFailed is thrown across module boundaries; the others are produced by the copy loop and surface as outcomes.
 */

export type PipelineErrorKind = "ClientCancelled" | "IOError" | "LaunchFailed" | "UpstreamEnded";

/**
 * Base class for pipeline errors. The kind is a stable discriminator for callers that switch on failure type.
 */
export class PipelineError extends Error {

  public readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string, options?: ErrorOptions) {

    super(message, options);

    this.kind = kind;
    this.name = "PipelineError";
  }
}

/**
 * A stage could not be started, or stream URL discovery failed. The message is suitable for an HTTP error body.
 */
export class LaunchFailedError extends PipelineError {

  // The stage label that failed, or null when the failure is not tied to a single stage.
  public readonly stage: string | null;

  constructor(message: string, stage: string | null = null, options?: ErrorOptions) {

    super("LaunchFailed", message, options);

    this.name = "LaunchFailedError";
    this.stage = stage;
  }
}

/**
 * The upstream extractor produced end-of-stream or exited. The normal way a live broadcast ends.
 */
export class UpstreamEndedError extends PipelineError {

  constructor(message = "Upstream ended.", options?: ErrorOptions) {

    super("UpstreamEnded", message, options);

    this.name = "UpstreamEndedError";
  }
}

/**
 * The viewer disconnected or the session was aborted by an operator.
 */
export class ClientCancelledError extends PipelineError {

  constructor(message = "Client cancelled.", options?: ErrorOptions) {

    super("ClientCancelled", message, options);

    this.name = "ClientCancelledError";
  }
}

/**
 * A read from the pipeline or a write to the client failed.
 */
export class StreamIOError extends PipelineError {

  constructor(message: string, options?: ErrorOptions) {

    super("IOError", message, options);

    this.name = "StreamIOError";
  }
}
