/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * delay.ts: Async delay utility for TwitchTuner.
 */

/**
 * Creates a promise that resolves after the specified delay, or earlier when the optional signal aborts. The promise never rejects, so callers that race it against
 * other work do not need a catch handler.
 * @param ms - The delay duration in milliseconds.
 * @param signal - Optional abort signal that ends the delay early.
 * @returns A promise that resolves to true if the full delay elapsed, false if it was cut short by the signal.
 */
export async function delay(ms: number, signal?: AbortSignal): Promise<boolean> {

  if(signal?.aborted) {

    return false;
  }

  return new Promise<boolean>((resolve) => {

    const onAbort = (): void => {

      clearTimeout(timer);
      resolve(false);
    };

    const timer = setTimeout(() => {

      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
