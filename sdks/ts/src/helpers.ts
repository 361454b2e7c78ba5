/**
 * Convenience functions for running persistent sessions from a process.
 *
 * These helpers wire SIGTERM/SIGINT to session cancellation, so a long-lived
 * sub or rep ends cleanly when the process is asked to stop.
 *
 * @example Persistent sub until Ctrl-C
 * ```typescript
 * import { EsubClient, runSubscriber } from "esub-client";
 *
 * await runSubscriber(new EsubClient(), "events", {
 *   callback: (frame) => console.log("event:", frame),
 * });
 * ```
 *
 * @example Publish stdin, one message per line
 * ```typescript
 * import { EsubClient, lines, runPublisher } from "esub-client";
 *
 * await runPublisher(new EsubClient(), lines(process.stdin), { key: "events" });
 * ```
 *
 * @module
 */

import { createInterface } from "node:readline";
import type { EsubClient } from "./client.ts";
import { CancelledError } from "./errors.ts";
import type {
  ItemSource,
  PrepOptions,
  PsubOptions,
  PublishItem,
} from "./types.ts";

/**
 * Where shutdown signals come from; `process` by default.
 */
export interface SignalSource {
  on(event: "SIGINT" | "SIGTERM", listener: () => void): unknown;
  off(event: "SIGINT" | "SIGTERM", listener: () => void): unknown;
}

/**
 * Options of the run helpers.
 */
export interface RunOptions {
  /** Emitter of SIGINT/SIGTERM, defaults to `process` */
  signals?: SignalSource;
}

/**
 * Item source yielding one item per line of `input`.
 *
 * The line reader detaches from `input` when the session ends early.
 *
 * @param defaults - Fields every item carries besides its line
 */
export function lines(
  input: NodeJS.ReadableStream,
  defaults: Omit<PublishItem, "data"> = {},
): ItemSource {
  return async function* (signal?: AbortSignal) {
    const reader = createInterface({ input, crlfDelay: Infinity, signal });
    try {
      for await (const line of reader) {
        yield { ...defaults, data: line };
      }
    } finally {
      reader.close();
    }
  };
}

/**
 * Run `session` with an abort signal that fires on SIGINT/SIGTERM.
 *
 * A cancellation caused by such a signal ends the run normally.
 */
async function runUntilShutdown(
  signals: SignalSource,
  session: (shutdown: AbortSignal) => Promise<number>,
): Promise<void> {
  const abortController = new AbortController();
  const signalHandler = () => {
    abortController.abort();
  };

  signals.on("SIGTERM", signalHandler);
  signals.on("SIGINT", signalHandler);

  try {
    await session(abortController.signal);
  } catch (e) {
    if (e instanceof CancelledError && abortController.signal.aborted) {
      return;
    }
    throw e;
  } finally {
    signals.off("SIGTERM", signalHandler);
    signals.off("SIGINT", signalHandler);
  }
}

/**
 * Run a persistent sub until the server ends it or the process is asked to
 * stop.
 *
 * @throws Whatever {@link EsubClient.psub} throws, except the cancellation
 *   caused by SIGINT/SIGTERM
 */
export function runSubscriber(
  client: EsubClient,
  key: string,
  options: Omit<PsubOptions, "signal"> & RunOptions = {},
): Promise<void> {
  const { signals = process, ...psubOptions } = options;
  return runUntilShutdown(
    signals,
    (shutdown) => client.psub(key, { ...psubOptions, signal: shutdown }),
  );
}

/**
 * Run a persistent rep until `items` is exhausted or the process is asked to
 * stop.
 *
 * @throws Whatever {@link EsubClient.prep} throws, except the cancellation
 *   caused by SIGINT/SIGTERM
 */
export function runPublisher(
  client: EsubClient,
  items: ItemSource | readonly string[],
  options: Omit<PrepOptions, "signal"> & RunOptions = {},
): Promise<void> {
  const { signals = process, ...prepOptions } = options;
  return runUntilShutdown(
    signals,
    (shutdown) => client.prep(items, { ...prepOptions, signal: shutdown }),
  );
}
