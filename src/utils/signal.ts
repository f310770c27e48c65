/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * signal.ts: One-slot wake notification for background loops.
 */

/* A WakeSignal lets one producer nudge one consumer loop without queuing. notify() sets a pending flag; the consumer's next wait() returns immediately if the flag is
 * set, otherwise it sleeps until notify(), the timeout, or the abort signal, whichever comes first. Any number of notify() calls between two waits collapse into one
 * wake.
 */

export type WakeReason = "aborted" | "notified" | "timeout";

export class WakeSignal {

  private pending = false;
  private waiter: ((reason: WakeReason) => void) | null = null;

  /**
   * Sets the signal. Wakes the waiting consumer, if any.
   */
  public notify(): void {

    if(this.waiter) {

      const wake = this.waiter;

      this.waiter = null;
      wake("notified");

      return;
    }

    this.pending = true;
  }

  /**
   * Waits for the next notification.
   * @param timeoutMs - Upper bound on the wait.
   * @param signal - Optional abort signal that ends the wait.
   * @returns Why the wait ended.
   */
  public async wait(timeoutMs: number, signal?: AbortSignal): Promise<WakeReason> {

    if(signal?.aborted) {

      return "aborted";
    }

    if(this.pending) {

      this.pending = false;

      return "notified";
    }

    return new Promise<WakeReason>((resolve) => {

      const finish = (reason: WakeReason): void => {

        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        this.waiter = null;
        resolve(reason);
      };

      const onAbort = (): void => finish("aborted");
      const timer = setTimeout(() => finish("timeout"), timeoutMs);

      this.waiter = finish;
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /**
   * Whether a notification is pending with no consumer waiting.
   */
  public get isPending(): boolean {

    return this.pending;
  }
}
