/**
 * Duplex message transport for persistent sessions.
 * @module
 */

import createDebug from "debug";
import WebSocket from "ws";
import { ConnectionClosedError, ConnectionError } from "./errors.ts";
import { FrameQueue } from "./stream.ts";
import type { Frame } from "./types.ts";

const debug = createDebug("esub:transport");

/** Close codes that end a connection cleanly */
const CLEAN_CLOSE_CODES = new Set([1000, 1001, 1005]);

/** Time the peer gets to answer a close before the socket is terminated */
const CLOSE_GRACE_MS = 1000;

// ============================================================================
// Connection Contract
// ============================================================================

/**
 * A duplex, message-oriented connection owned by one session.
 */
export interface Connection {
  /** URL the connection was opened to */
  readonly url: string;
  /** True once either side closed the connection */
  readonly closed: boolean;
  /**
   * Send one text message. Concurrent calls are written one at a time, in
   * call order.
   *
   * @throws {ConnectionError} If the connection is closed or the write fails
   */
  send(data: string): Promise<void>;
  /**
   * Wait for the next message.
   *
   * @throws {ConnectionClosedError} After a clean close
   * @throws {ConnectionError} After an abnormal close
   */
  receive(): Promise<Frame>;
  /**
   * Send a protocol-level liveness probe carrying no payload.
   */
  ping(): Promise<void>;
  /**
   * Close the connection. Safe to call repeatedly and after errors.
   */
  close(): Promise<void>;
}

/** Opens a {@link Connection} to a URL. */
export type Connector = (url: string) => Promise<Connection>;

/**
 * Options for WebSocket connections.
 */
export interface WebSocketOptions {
  /** `User-Agent` header of the opening handshake */
  userAgent?: string;
}

// ============================================================================
// WebSocket Connection
// ============================================================================

function toText(data: WebSocket.RawData): string {
  return toBytes(data).toString("utf8");
}

function toBytes(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/**
 * {@link Connection} over a `ws` WebSocket.
 *
 * Messages have no size limit. Liveness probes are unsolicited pong frames.
 */
export class WebSocketConnection implements Connection {
  readonly url: string;

  readonly #socket: WebSocket;
  readonly #queue = new FrameQueue();
  #writeChain: Promise<void> = Promise.resolve();
  #closing: Promise<void> | null = null;
  #closed = false;
  #failure: Error | null = null;

  private constructor(socket: WebSocket, url: string) {
    this.#socket = socket;
    this.url = url;

    socket.on("message", (data, isBinary) => {
      this.#queue.push(isBinary ? toBytes(data) : toText(data));
    });
    socket.on("error", (err) => {
      debug("socket error on %s: %s", url, err.message);
      this.#failure ??= err;
    });
    socket.on("close", (code, reason) => {
      this.#onClose(code, reason.toString("utf8"));
    });
  }

  /**
   * Open a WebSocket and wait for the handshake to complete.
   *
   * @throws {ConnectionError} If the connection is refused or the handshake
   *   fails
   */
  static open(
    url: string,
    options: WebSocketOptions = {},
  ): Promise<WebSocketConnection> {
    return new Promise((resolve, reject) => {
      const socket = new WebSocket(url, {
        maxPayload: 0,
        headers: options.userAgent
          ? { "User-Agent": options.userAgent }
          : undefined,
      });
      const connection = new WebSocketConnection(socket, url);

      const onOpen = () => {
        socket.off("error", onError);
        debug("opened %s", url);
        resolve(connection);
      };
      const onError = (err: Error) => {
        socket.off("open", onOpen);
        reject(
          new ConnectionError(`Failed to connect to ${url}: ${err.message}`, {
            cause: err,
          }),
        );
      };

      socket.once("open", onOpen);
      socket.once("error", onError);
    });
  }

  get closed(): boolean {
    return this.#closed;
  }

  send(data: string): Promise<void> {
    return this.#write((done) => this.#socket.send(data, done));
  }

  receive(): Promise<Frame> {
    return this.#queue.next();
  }

  ping(): Promise<void> {
    return this.#write((done) => this.#socket.pong(undefined, undefined, done));
  }

  close(): Promise<void> {
    if (!this.#closing) {
      this.#closing = this.#shutdown();
    }
    return this.#closing;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  #write(op: (done: (err?: Error) => void) => void): Promise<void> {
    const result = this.#writeChain.then(() =>
      new Promise<void>((resolve, reject) => {
        if (this.#closed) {
          reject(new ConnectionError("Connection is closed"));
          return;
        }
        op((err) => {
          if (err) {
            reject(
              new ConnectionError(`Failed to send: ${err.message}`, {
                cause: err,
              }),
            );
          } else {
            resolve();
          }
        });
      })
    );
    // Callers observe failures through `result`; the chain only orders writes.
    this.#writeChain = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  async #shutdown(): Promise<void> {
    this.#closed = true;
    this.#queue.end(new ConnectionClosedError("Connection closed locally"), true);

    if (this.#socket.readyState === WebSocket.CLOSED) return;

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        debug("no close answer from %s, terminating", this.url);
        this.#socket.terminate();
      }, CLOSE_GRACE_MS);
      this.#socket.once("close", () => {
        clearTimeout(timer);
        resolve();
      });
      this.#socket.close(1000);
    });
  }

  #onClose(code: number, reason: string): void {
    const local = this.#closing !== null;
    this.#closed = true;
    debug("closed %s (%d%s)", this.url, code, local ? ", local" : "");

    if (local || CLEAN_CLOSE_CODES.has(code)) {
      this.#queue.end(
        new ConnectionClosedError(
          `Connection closed (${code}${reason ? `: ${reason}` : ""})`,
          code,
        ),
      );
      return;
    }

    const detail = this.#failure?.message ?? (reason || "abnormal closure");
    this.#queue.end(
      new ConnectionError(`Connection lost (${code}): ${detail}`, {
        cause: this.#failure ?? undefined,
      }),
    );
  }
}

/**
 * Create a {@link Connector} opening {@link WebSocketConnection}s.
 */
export function webSocketConnector(options: WebSocketOptions = {}): Connector {
  return (url) => WebSocketConnection.open(url, options);
}
