/**
 * esub-client - TypeScript client for the esub publish/subscribe service.
 *
 * A sub waits for a value at a key; a rep supplies one. Both come in a
 * one-shot flavour (HTTP) and a persistent one (a long-lived WebSocket):
 * - {@link EsubClient.sub} / {@link EsubClient.rep}: one value, one request
 * - {@link EsubClient.psub}: receive every message sent to a key
 * - {@link EsubClient.prep}: stream many messages over one connection
 *
 * @example One-shot sub and rep
 * ```typescript
 * import { EsubClient } from "esub-client";
 *
 * const client = new EsubClient();
 * const value = await client.sub("job-42", { timeout: 30 });
 * ```
 *
 * @example Persistent sub
 * ```typescript
 * await client.psub("events", {
 *   shared: true,
 *   timeout: 600,
 *   callback: (frame) => console.log(frame),
 * });
 * ```
 *
 * @example Persistent rep from a generator
 * ```typescript
 * await client.prep(async function* () {
 *   for await (const reading of sensor()) {
 *     yield { key: "readings", data: JSON.stringify(reading) };
 *   }
 * });
 * ```
 *
 * Set `ESUB_CONFIRM_RECEIPT=1` to have every persistent message confirmed,
 * and `DEBUG=esub:*` to trace sessions.
 *
 * @module
 */

// ============================================================================
// Types
// ============================================================================

export type {
  ConfirmationCallback,
  DeliveryCallback,
  Frame,
  ItemSource,
  NodeOptions,
  PrepOptions,
  PsubOptions,
  PublishItem,
  RepOptions,
} from "./src/types.ts";

// ============================================================================
// Client
// ============================================================================

export { EsubClient } from "./src/client.ts";
export type { ClientOptions } from "./src/client.ts";

// ============================================================================
// Configuration
// ============================================================================

export { loadConfig, pingPeriodFromHint, VERSION } from "./src/config.ts";
export type { EsubConfig, EsubEnv } from "./src/config.ts";

// ============================================================================
// Sessions
// ============================================================================

export { runSession } from "./src/session.ts";
export type { SessionContext, SessionOptions } from "./src/session.ts";
export { printFrame, receiveLoop } from "./src/sink.ts";
export type { ReceiveOptions } from "./src/sink.ts";
export { printConfirmation, publishLoop, toItemSource } from "./src/source.ts";
export type { PublishOptions } from "./src/source.ts";
export { LivenessMonitor } from "./src/keepalive.ts";

// ============================================================================
// Transport
// ============================================================================

export { WebSocketConnection, webSocketConnector } from "./src/transport.ts";
export type {
  Connection,
  Connector,
  WebSocketOptions,
} from "./src/transport.ts";
export { FrameQueue } from "./src/stream.ts";
export { ACK_FRAME } from "./src/protocol.ts";

// ============================================================================
// Errors
// ============================================================================

export {
  CallerError,
  CancelledError,
  ConnectionClosedError,
  ConnectionError,
  describeError,
  EsubError,
  HttpError,
  ProtocolError,
  TimeoutError,
  ValidationError,
} from "./src/errors.ts";

// ============================================================================
// Helpers
// ============================================================================

export { lines, runPublisher, runSubscriber } from "./src/helpers.ts";
export type { RunOptions, SignalSource } from "./src/helpers.ts";
