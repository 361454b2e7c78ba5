/**
 * esub wire protocol: endpoint URLs and message encoding.
 * @module
 */

import { ValidationError } from "./errors.ts";
import type { Frame, PublishItem, WireEnvelope } from "./types.ts";

// ============================================================================
// Protocol Constants
// ============================================================================

/** Frame a persistent sub sends back for each delivered message */
export const ACK_FRAME = "ok";

/** Path of the persistent rep endpoint */
export const PREP_PATH = "/prep";

// ============================================================================
// URLs
// ============================================================================

/**
 * Append query parameters, skipping absent ones.
 *
 * Parameters keep their order; no `?` is added when all are absent.
 */
export function withQuery(
  base: string,
  params: ReadonlyArray<readonly [string, string | undefined]>,
): string {
  const query = new URLSearchParams();
  for (const [name, value] of params) {
    if (value !== undefined && value !== "") {
      query.append(name, value);
    }
  }
  const text = query.toString();
  return text ? `${base}?${text}` : base;
}

/**
 * `{scheme}://{host}:{port}`
 */
export function nodeAddress(scheme: string, host: string, port: number): string {
  return `${scheme}://${host}:${port}`;
}

/**
 * URL of a one-shot sub.
 */
export function subUrl(address: string, key: string, token?: string): string {
  return withQuery(`${address}/sub/${encodeURIComponent(key)}`, [
    ["token", token],
  ]);
}

/**
 * URL of a one-shot rep.
 */
export function repUrl(
  address: string,
  key: string,
  token?: string,
  psub = false,
): string {
  return withQuery(`${address}/rep/${encodeURIComponent(key)}`, [
    ["token", token],
    ["psub", psub ? "1" : undefined],
  ]);
}

/**
 * URL of a persistent sub.
 *
 * @param timeout - Server-side timeout in seconds
 */
export function psubUrl(
  address: string,
  key: string,
  options: { token?: string; shared?: boolean; timeout?: number } = {},
): string {
  return withQuery(`${address}/psub/${encodeURIComponent(key)}`, [
    ["token", options.token],
    ["shared", options.shared ? "1" : undefined],
    ["timeout", options.timeout ? String(options.timeout) : undefined],
  ]);
}

/**
 * URL of a persistent rep.
 */
export function prepUrl(
  address: string,
  options: { token?: string; psub?: boolean } = {},
): string {
  return withQuery(`${address}${PREP_PATH}`, [
    ["token", options.token],
    ["psub", options.psub ? "1" : undefined],
  ]);
}

// ============================================================================
// Encoding
// ============================================================================

/**
 * Session-level values a {@link PublishItem} falls back to.
 */
export interface EnvelopeDefaults {
  key?: string;
  token?: string;
  psub?: boolean;
}

/**
 * Build the wire envelope of one published item.
 *
 * Item fields take precedence over the session defaults.
 *
 * @throws {ValidationError} If neither the item nor the defaults name a key
 */
export function buildEnvelope(
  item: PublishItem,
  defaults: EnvelopeDefaults,
): WireEnvelope {
  const key = item.key ?? defaults.key;
  if (key === undefined || key === "") {
    throw new ValidationError("Publish item has no key", "key");
  }

  return {
    key,
    token: item.token || defaults.token || null,
    psub: item.psub ?? defaults.psub ?? false,
    data: item.data,
  };
}

const textDecoder = new TextDecoder();

/**
 * Text of a received frame; binary frames are decoded as UTF-8.
 */
export function frameToText(frame: Frame): string {
  return typeof frame === "string" ? frame : textDecoder.decode(frame);
}

/**
 * Serialize an envelope into a text frame.
 */
export function encodeEnvelope(envelope: WireEnvelope): string {
  return JSON.stringify(envelope);
}
