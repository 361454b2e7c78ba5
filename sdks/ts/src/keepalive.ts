/**
 * Liveness probes for idle receive sessions.
 * @module
 */

import createDebug from "debug";
import type { Connection } from "./transport.ts";

const debug = createDebug("esub:keepalive");

/**
 * Periodically sends a liveness probe on a connection so that proxies and
 * load balancers do not drop it while no messages flow.
 *
 * Only used on the receive side when Confirmation Mode is off; with
 * confirmations the acknowledgements keep the connection busy.
 *
 * @example
 * ```typescript
 * const monitor = new LivenessMonitor(connection, 54_000);
 * monitor.start(signal);
 * try {
 *   // receive loop
 * } finally {
 *   monitor.stop();
 * }
 * ```
 */
export class LivenessMonitor {
  readonly #connection: Connection;
  readonly #periodMs: number;
  #timer: ReturnType<typeof setTimeout> | null = null;
  #running = false;
  #probesSent = 0;
  #signal: AbortSignal | null = null;
  #onAbort = () => this.stop();

  constructor(connection: Connection, periodMs: number) {
    this.#connection = connection;
    this.#periodMs = periodMs;
  }

  /**
   * Start probing. Stops by itself when `signal` aborts.
   */
  start(signal?: AbortSignal): void {
    if (this.#running || signal?.aborted) return;
    this.#running = true;

    if (signal) {
      this.#signal = signal;
      signal.addEventListener("abort", this.#onAbort, { once: true });
    }
    this.#schedule();
  }

  /**
   * Stop probing. No probe is sent after this returns.
   */
  stop(): void {
    if (!this.#running) return;
    this.#running = false;

    if (this.#timer !== null) {
      clearTimeout(this.#timer);
      this.#timer = null;
    }
    this.#signal?.removeEventListener("abort", this.#onAbort);
    this.#signal = null;
  }

  /**
   * Check if the monitor is running.
   */
  get running(): boolean {
    return this.#running;
  }

  /**
   * Number of probes sent since the monitor was created.
   */
  get probesSent(): number {
    return this.#probesSent;
  }

  #schedule(): void {
    this.#timer = setTimeout(() => {
      this.#timer = null;
      this.#probe();
    }, this.#periodMs);
  }

  #probe(): void {
    if (!this.#running) return;
    if (this.#connection.closed) {
      this.stop();
      return;
    }

    this.#probesSent++;
    this.#connection.ping().then(
      () => {
        if (this.#running) this.#schedule();
      },
      (err: unknown) => {
        // The receive loop reports the broken connection.
        debug("probe failed on %s: %s", this.#connection.url, err);
        this.stop();
      },
    );
  }
}
