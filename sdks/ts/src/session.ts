/**
 * Timeout and cancellation envelope around persistent sessions.
 * @module
 */

import createDebug from "debug";
import { typeid } from "typeid-js";
import { CancelledError, TimeoutError } from "./errors.ts";
import type { Connection, Connector } from "./transport.ts";

const debug = createDebug("esub:session");

/**
 * What a session body gets to work with.
 */
export interface SessionContext {
  /** Session ID (TypeID format: sess_<uuid_v7>), used in logs */
  readonly id: string;
  /** The session's connection, owned exclusively by the body */
  readonly connection: Connection;
  /** Aborted when the session times out or is cancelled */
  readonly signal: AbortSignal;
}

/**
 * Options of the session envelope.
 */
export interface SessionOptions {
  /** Overall deadline in seconds, covering the connect; absent waits forever */
  timeout?: number;
  /** Cancels the session when aborted */
  signal?: AbortSignal;
}

/**
 * Settle with `promise`, or reject with the abort reason as soon as `signal`
 * aborts. The abandoned promise keeps a handler attached.
 */
export function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Close a connection that finishes opening after its session was abandoned.
 */
function closeWhenOpened(opening: Promise<Connection>, id: string): void {
  opening.then(
    (late) => late.close(),
    (err: unknown) => debug("%s: abandoned connect failed: %s", id, err),
  );
}

/**
 * Open a connection and run a session body on it.
 *
 * The connection is closed exactly once before this settles, whatever the
 * outcome. When the deadline passes or `options.signal` aborts, the body's
 * signal aborts, the in-flight operation is abandoned and the returned promise
 * rejects with {@link TimeoutError} or {@link CancelledError}.
 *
 * The rejection still waits for the connection to close, so it can arrive up
 * to the transport's close grace period (1 s for WebSocket) after the
 * deadline when the peer is slow to answer the close.
 *
 * @example
 * ```typescript
 * const count = await runSession(connector, url, async ({ connection }) => {
 *   await connection.send("hello");
 *   return 1;
 * }, { timeout: 30 });
 * ```
 */
export async function runSession<T>(
  connector: Connector,
  url: string,
  body: (context: SessionContext) => Promise<T>,
  options: SessionOptions = {},
): Promise<T> {
  if (options.signal?.aborted) {
    throw new CancelledError();
  }

  const id = typeid("sess").toString();
  const controller = new AbortController();
  const { signal } = controller;

  const onCancel = () => {
    debug("%s: cancelled", id);
    controller.abort(new CancelledError());
  };
  options.signal?.addEventListener("abort", onCancel, { once: true });

  let timer: ReturnType<typeof setTimeout> | null = null;
  if (options.timeout !== undefined) {
    const timeoutMs = options.timeout * 1000;
    timer = setTimeout(() => {
      debug("%s: timed out after %dms", id, timeoutMs);
      controller.abort(
        new TimeoutError(
          `Session timed out after ${options.timeout}s`,
          timeoutMs,
        ),
      );
    }, timeoutMs);
  }

  let connection: Connection | null = null;
  try {
    const opening = connector(url);
    try {
      connection = await untilAborted(opening, signal);
    } catch (err) {
      if (signal.aborted) {
        closeWhenOpened(opening, id);
      }
      throw err;
    }

    debug("%s: started on %s", id, url);
    return await untilAborted(body({ id, connection, signal }), signal);
  } finally {
    if (timer !== null) clearTimeout(timer);
    options.signal?.removeEventListener("abort", onCancel);
    if (connection) {
      await connection.close();
      debug("%s: closed", id);
    }
  }
}
