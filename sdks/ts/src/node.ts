/**
 * Node address resolution.
 * @module
 */

import createDebug from "debug";
import type { EsubConfig } from "./config.ts";
import { ProtocolError } from "./errors.ts";
import { type FetchLike, request } from "./http.ts";
import { nodeAddress } from "./protocol.ts";
import type { WireNodeInfo } from "./types.ts";

const debug = createDebug("esub:node");

/** Timeout of `/info` requests */
const INFO_TIMEOUT_MS = 2000;

function isNodeInfo(body: unknown): body is WireNodeInfo & { ip: string } {
  return typeof body === "object" && body !== null && "ip" in body &&
    typeof body.ip === "string";
}

/**
 * Tracks the node the client talks to and the last resolved node IP.
 *
 * Each client owns one resolver; nothing is shared between clients.
 */
export class NodeResolver {
  readonly #config: EsubConfig;
  readonly #fetch: FetchLike;
  readonly #now: () => number;
  #address: string | null = null;
  #ip: string | null = null;
  #resolvedAt: number | null = null;

  constructor(
    config: EsubConfig,
    fetchFn: FetchLike,
    now: () => number = Date.now,
  ) {
    this.#config = config;
    this.#fetch = fetchFn;
    this.#now = now;
  }

  /**
   * Full address of a node, `{protocol}://{node}:{port}`.
   *
   * Switching to a different node drops the cached node IP.
   *
   * @param node - Node host, defaults to the configured host
   */
  address(node?: string): string {
    const address = nodeAddress(
      this.#config.protocol,
      node || this.#config.host,
      this.#config.port,
    );

    if (address !== this.#address) {
      if (this.#address !== null) {
        debug("node changed from %s to %s", this.#address, address);
      }
      this.#address = address;
      this.#ip = null;
      this.#resolvedAt = null;
    }
    return address;
  }

  /**
   * Fetch the IP of an available node.
   *
   * @param cacheSeconds - How long a resolved IP is reused; 0 always refetches
   * @throws {ProtocolError} If the node answers without an IP
   */
  async ip(cacheSeconds = 10): Promise<string> {
    const address = this.address();
    const now = this.#now();

    if (
      this.#ip !== null && this.#resolvedAt !== null && cacheSeconds > 0 &&
      now - this.#resolvedAt < cacheSeconds * 1000
    ) {
      return this.#ip;
    }

    const response = await request(this.#fetch, `${address}/info`, {
      timeoutMs: INFO_TIMEOUT_MS,
      retries: this.#config.retries,
      userAgent: this.#config.userAgent,
    });
    const body: unknown = await response.json();
    if (!isNodeInfo(body)) {
      throw new ProtocolError(`No node IP in response from ${address}/info`);
    }

    debug("resolved node ip %s", body.ip);
    this.#ip = body.ip;
    this.#resolvedAt = now;
    return body.ip;
  }
}
