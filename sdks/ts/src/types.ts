/**
 * Core types for the esub client.
 * @module
 */

// ============================================================================
// Public Types
// ============================================================================

/**
 * A message received on a persistent connection.
 *
 * Text frames arrive as strings, binary frames as bytes.
 */
export type Frame = string | Uint8Array;

/**
 * One message to publish on a persistent rep.
 *
 * Fields left out fall back to the session defaults, and the token finally
 * to the configured default token.
 */
export interface PublishItem {
  /** Sub key to deliver to */
  readonly key?: string;
  /** Token for this message */
  readonly token?: string;
  /** Prefer delivering to a persistent sub */
  readonly psub?: boolean;
  /** Message payload */
  readonly data: string;
}

/**
 * Producer of the messages of a persistent rep.
 *
 * Called once per session with the session's signal; the returned sequence
 * may be finite or infinite. A producer that waits on outside input should
 * stop waiting when the signal aborts.
 */
export type ItemSource = (signal?: AbortSignal) =>
  | Iterable<PublishItem>
  | AsyncIterable<PublishItem>;

/** Callback for each message delivered to a persistent sub. */
export type DeliveryCallback = (frame: Frame) => void;

/** Callback for each confirmed message of a persistent rep. */
export type ConfirmationCallback = (data: string, confirmation: Frame) => void;

/**
 * Options shared by all calls that reach a server node.
 */
export interface NodeOptions {
  /** Token, falls back to the configured default */
  token?: string;
  /** Specific node host, falls back to the configured host */
  node?: string;
  /** Timeout in seconds; absent waits indefinitely */
  timeout?: number;
}

/**
 * Options for a one-shot rep.
 */
export interface RepOptions extends NodeOptions {
  /** Prefer delivering to a persistent sub */
  psub?: boolean;
}

/**
 * Options for a persistent sub.
 */
export interface PsubOptions extends NodeOptions {
  /** Called with each delivered message, default prints it */
  callback?: DeliveryCallback;
  /** Share delivery of the key with other subscribers */
  shared?: boolean;
  /** Cancels the session when aborted */
  signal?: AbortSignal;
}

/**
 * Options for a persistent rep.
 */
export interface PrepOptions extends NodeOptions {
  /** Default key of every message */
  key?: string;
  /** Default psub flag of every message */
  psub?: boolean;
  /** Called with each confirmed message, default prints it */
  callback?: ConfirmationCallback;
  /** Cancels the session when aborted */
  signal?: AbortSignal;
}

// ============================================================================
// Internal Types (not exported from mod.ts)
// ============================================================================

/**
 * Wire format of a published message.
 * @internal
 */
export interface WireEnvelope {
  key: string;
  token: string | null;
  psub: boolean;
  data: string;
}

/**
 * Body of the `/info` endpoint.
 * @internal
 */
export interface WireNodeInfo {
  ip?: unknown;
}
