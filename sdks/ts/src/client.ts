/**
 * The esub client: one-shot calls and persistent sessions.
 * @module
 */

import { type EsubConfig, loadConfig } from "./config.ts";
import { type FetchLike, request } from "./http.ts";
import { NodeResolver } from "./node.ts";
import { nodeAddress, prepUrl, psubUrl, repUrl, subUrl } from "./protocol.ts";
import { runSession } from "./session.ts";
import { printFrame, receiveLoop } from "./sink.ts";
import { publishLoop, toItemSource } from "./source.ts";
import { type Connector, webSocketConnector } from "./transport.ts";
import type {
  ItemSource,
  NodeOptions,
  PrepOptions,
  PsubOptions,
  RepOptions,
} from "./types.ts";

/**
 * Options for creating a client.
 */
export interface ClientOptions {
  /** Configuration overrides, on top of the environment */
  config?: Partial<EsubConfig>;
  /** Opens persistent connections (default: WebSocket) */
  connector?: Connector;
  /** Performs one-shot requests (default: global `fetch`) */
  fetch?: FetchLike;
}

/**
 * Client of an esub server.
 *
 * Owns its configuration and node resolver; create one per process or per
 * server you talk to.
 *
 * @example One-shot
 * ```typescript
 * const client = new EsubClient();
 *
 * // in one process
 * const value = await client.sub("job-42", { timeout: 30 });
 *
 * // in another
 * await client.rep("job-42", "done");
 * ```
 *
 * @example Persistent
 * ```typescript
 * await client.psub("events", {
 *   shared: true,
 *   callback: (frame) => console.log("got", frame),
 * });
 *
 * await client.prep(["a", "b", "c"], { key: "events" });
 * ```
 */
export class EsubClient {
  readonly config: EsubConfig;
  readonly #resolver: NodeResolver;
  readonly #connector: Connector;
  readonly #fetch: FetchLike;

  constructor(options: ClientOptions = {}) {
    this.config = { ...loadConfig(), ...options.config };
    this.#fetch = options.fetch ?? fetch;
    this.#connector = options.connector ??
      webSocketConnector({ userAgent: this.config.userAgent });
    this.#resolver = new NodeResolver(this.config, this.#fetch);
  }

  /**
   * Fetch the IP of an available node.
   *
   * @param cacheSeconds - How long a resolved IP is reused
   */
  nodeIp(cacheSeconds = 10): Promise<string> {
    return this.#resolver.ip(cacheSeconds);
  }

  /**
   * Wait for a value to be rep'd to `key`.
   *
   * @returns The value as bytes
   * @throws {HttpError} If the server rejects the sub
   * @throws {TimeoutError} If `timeout` elapses first
   */
  async sub(key: string, options: NodeOptions = {}): Promise<Uint8Array> {
    const url = subUrl(
      this.#resolver.address(options.node),
      key,
      options.token || this.config.token,
    );
    const response = await this.#request(url, options);
    return new Uint8Array(await response.arrayBuffer());
  }

  /**
   * Reply to a sub waiting on `key`.
   *
   * @throws {HttpError} If the server rejects the rep
   */
  async rep(key: string, data: string, options: RepOptions = {}): Promise<void> {
    const url = repUrl(
      this.#resolver.address(options.node),
      key,
      options.token || this.config.token,
      options.psub,
    );
    await this.#request(url, options, data);
  }

  /**
   * Subscribe to `key` with a persistent sub.
   *
   * Every message the server pushes is handed to `options.callback`. Runs
   * until the server ends the sub, the timeout elapses or `options.signal`
   * aborts.
   *
   * @returns The number of delivered messages
   * @throws {TimeoutError} If `timeout` elapses first
   * @throws {CancelledError} If `signal` aborts
   * @throws {ConnectionError} If the connection fails
   * @throws {CallerError} If the callback throws
   */
  async psub(key: string, options: PsubOptions = {}): Promise<number> {
    const url = psubUrl(this.#wsAddress(options.node), key, {
      token: options.token || this.config.token,
      shared: options.shared,
      timeout: options.timeout,
    });

    let callback = options.callback;
    if (!callback) {
      console.log(`persistent sub to ${url}`);
      callback = printFrame;
    }
    const deliver = callback;

    return await runSession(
      this.#connector,
      url,
      ({ connection, signal }) =>
        receiveLoop(connection, deliver, {
          confirm: this.config.confirm,
          pingPeriodMs: this.config.pingPeriodMs,
          signal,
        }),
      options,
    );
  }

  /**
   * Publish a sequence of messages over a persistent rep.
   *
   * `items` is either a function producing publish items, or a non-empty
   * list of payloads sent with the session defaults (`key`, `token`, `psub`).
   * With Confirmation Mode, `options.callback` gets each payload with the
   * server's confirmation.
   *
   * @example
   * ```typescript
   * await client.prep(function* () {
   *   yield { key: "a", data: "first" };
   *   yield { key: "b", data: "second", psub: true };
   * });
   * ```
   *
   * @returns The number of sent messages
   * @throws {ValidationError} If the list is empty or an item has no key
   * @throws {TimeoutError} If `timeout` elapses first
   * @throws {CancelledError} If `signal` aborts
   * @throws {ConnectionError} If the connection fails
   */
  async prep(
    items: ItemSource | readonly string[],
    options: PrepOptions = {},
  ): Promise<number> {
    const source = toItemSource(items);
    const token = options.token || this.config.token;
    const url = prepUrl(this.#wsAddress(options.node), {
      token,
      psub: options.psub,
    });

    return await runSession(
      this.#connector,
      url,
      ({ connection, signal }) =>
        publishLoop(connection, source, {
          confirm: this.config.confirm,
          defaults: { key: options.key, token, psub: options.psub },
          callback: options.callback,
          signal,
        }),
      options,
    );
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  #wsAddress(node?: string): string {
    return nodeAddress(
      this.config.wsProtocol,
      node || this.config.host,
      this.config.port,
    );
  }

  #request(url: string, options: NodeOptions, body?: string): Promise<Response> {
    return request(this.#fetch, url, {
      method: body === undefined ? "GET" : "POST",
      body,
      timeoutMs: options.timeout === undefined
        ? undefined
        : options.timeout * 1000,
      retries: this.config.retries,
      userAgent: this.config.userAgent,
    });
  }
}
