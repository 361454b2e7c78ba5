/**
 * Receive side of a persistent sub.
 * @module
 */

import { CallerError, ConnectionClosedError } from "./errors.ts";
import { LivenessMonitor } from "./keepalive.ts";
import { ACK_FRAME, frameToText } from "./protocol.ts";
import type { Connection } from "./transport.ts";
import type { DeliveryCallback, Frame } from "./types.ts";

/**
 * Options of a receive loop.
 */
export interface ReceiveOptions {
  /** Acknowledge every message instead of sending liveness probes */
  confirm: boolean;
  /** Liveness probe period in milliseconds, used when `confirm` is off */
  pingPeriodMs: number;
  /** Stops the loop and its liveness monitor when aborted */
  signal?: AbortSignal;
}

/**
 * Default delivery callback: print each message.
 */
export function printFrame(frame: Frame): void {
  console.log(frameToText(frame));
}

/**
 * Deliver every message of a persistent sub to `callback`.
 *
 * With Confirmation Mode each message is answered with an `"ok"` frame before
 * the next one is awaited. Without it a {@link LivenessMonitor} probes the
 * connection for as long as the loop runs.
 *
 * The callback should be quick and never throw; if it does, the loop ends
 * with a {@link CallerError}.
 *
 * @returns The number of delivered messages, once the server closes the
 *   connection cleanly
 * @throws {ConnectionError} If the connection breaks
 * @throws {CallerError} If the callback throws
 */
export async function receiveLoop(
  connection: Connection,
  callback: DeliveryCallback,
  options: ReceiveOptions,
): Promise<number> {
  const monitor = options.confirm
    ? null
    : new LivenessMonitor(connection, options.pingPeriodMs);
  monitor?.start(options.signal);

  let delivered = 0;
  try {
    for (;;) {
      options.signal?.throwIfAborted();

      let frame: Frame;
      try {
        frame = await connection.receive();
      } catch (err) {
        if (err instanceof ConnectionClosedError) {
          return delivered;
        }
        throw err;
      }

      try {
        callback(frame);
      } catch (err) {
        throw new CallerError("Delivery callback failed", err);
      }
      delivered++;

      if (options.confirm) {
        await connection.send(ACK_FRAME);
      }
    }
  } finally {
    monitor?.stop();
  }
}
