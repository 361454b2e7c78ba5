/**
 * Error types for the esub client.
 * @module
 */

/**
 * Base error class for all esub errors.
 *
 * All errors include a `code` property for programmatic error handling.
 */
export class EsubError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  constructor(message: string, code = "UNKNOWN", options?: ErrorOptions) {
    super(message, options);
    this.name = "EsubError";
    this.code = code;
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error thrown when a connection cannot be opened, written or read.
 *
 * Common causes:
 * - Server not running or unreachable
 * - DNS failure
 * - Handshake rejected by the server
 */
export class ConnectionError extends EsubError {
  constructor(message: string, options?: ErrorOptions, code = "CONNECTION_FAILED") {
    super(message, code, options);
    this.name = "ConnectionError";
  }
}

/**
 * Error thrown when the connection was closed cleanly, by the peer or
 * locally.
 *
 * A subscribe session treats it as the end of the stream.
 */
export class ConnectionClosedError extends ConnectionError {
  /** WebSocket close code, when the peer sent one */
  readonly closeCode?: number;

  constructor(message = "Connection closed", closeCode?: number) {
    super(message, undefined, "CONNECTION_CLOSED");
    this.name = "ConnectionClosedError";
    this.closeCode = closeCode;
  }
}

/**
 * Error thrown when a session or request deadline elapses.
 */
export class TimeoutError extends EsubError {
  /** Timeout duration in milliseconds */
  readonly timeoutMs: number;

  constructor(message = "Operation timed out", timeoutMs = 0) {
    super(message, "TIMEOUT");
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Error thrown when the caller aborts a session.
 */
export class CancelledError extends EsubError {
  constructor(message = "Session cancelled") {
    super(message, "CANCELLED");
    this.name = "CancelledError";
  }
}

/**
 * Error thrown when a delivery or confirmation callback raises.
 *
 * The original error is available as `cause`.
 */
export class CallerError extends EsubError {
  constructor(message: string, cause: unknown) {
    super(message, "CALLER_ERROR", { cause });
    this.name = "CallerError";
  }
}

/**
 * Error thrown when a one-shot request gets a non-success response.
 */
export class HttpError extends EsubError {
  /** HTTP status code */
  readonly status: number;
  /** Requested URL */
  readonly url: string;

  constructor(status: number, statusText: string, url: string) {
    super(`${status} ${statusText} for url: ${url}`, "HTTP_ERROR");
    this.name = "HttpError";
    this.status = status;
    this.url = url;
  }
}

/**
 * Error thrown when the server answers with something the client cannot
 * interpret.
 */
export class ProtocolError extends EsubError {
  constructor(message: string) {
    super(message, "PROTOCOL_ERROR");
    this.name = "ProtocolError";
  }
}

/**
 * Error thrown when configuration or input validation fails.
 */
export class ValidationError extends EsubError {
  /** The field that failed validation */
  readonly field: string;

  constructor(message: string, field: string) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
    this.field = field;
  }
}

/**
 * Render an error for a terminal.
 *
 * By default a single `name: message` line. With `debug`, the stack of the
 * error and of every error in its `cause` chain.
 */
export function describeError(
  error: unknown,
  options: { debug?: boolean } = {},
): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  if (!options.debug) {
    return `${error.name}: ${error.message}`;
  }

  const parts: string[] = [];
  let current: unknown = error;
  while (current !== undefined) {
    if (current instanceof Error) {
      parts.push(current.stack ?? `${current.name}: ${current.message}`);
      current = current.cause;
    } else {
      parts.push(String(current));
      current = undefined;
    }
  }
  return parts.join("\n\nCaused by: ");
}
