/**
 * One-shot HTTP requests with retry on network failures.
 * @module
 */

import createDebug from "debug";
import { ConnectionError, HttpError, TimeoutError } from "./errors.ts";

const debug = createDebug("esub:http");

/** Base delay between attempts */
const RETRY_BACKOFF_MS = 100;

/** The subset of `fetch` the client uses. */
export type FetchLike = (
  input: string,
  init?: RequestInit,
) => Promise<Response>;

/**
 * Options of a one-shot request.
 */
export interface RequestOptions {
  method?: "GET" | "POST";
  body?: string;
  /** Per-attempt timeout in milliseconds; absent waits indefinitely */
  timeoutMs?: number;
  /** Extra attempts after a network failure */
  retries: number;
  /** `User-Agent` header value */
  userAgent: string;
}

/**
 * Delay before the next attempt: the base delay with ±50% jitter.
 */
export function calculateDelay(baseDelayMillis: number): number {
  const jitterRange = 0.5;
  const factor = 1 + (Math.random() * 2 - 1) * jitterRange; // [0.5, 1.5]
  return Math.floor(Math.max(0, baseDelayMillis * factor));
}

/**
 * Sleeps for the specified duration.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Perform a request, retrying when the server cannot be reached.
 *
 * Responses with an error status are not retried.
 *
 * @throws {HttpError} On a non-2xx response
 * @throws {TimeoutError} When an attempt exceeds `timeoutMs`
 * @throws {ConnectionError} When every attempt failed to reach the server
 */
export async function request(
  fetchFn: FetchLike,
  url: string,
  options: RequestOptions,
): Promise<Response> {
  const maxAttempts = Math.max(0, options.retries) + 1;
  let lastError: unknown;

  // attemptNo is 1-based: 1..maxAttempts
  for (let attemptNo = 1; attemptNo <= maxAttempts; attemptNo++) {
    const signal = options.timeoutMs === undefined
      ? undefined
      : AbortSignal.timeout(options.timeoutMs);

    let response: Response;
    try {
      response = await fetchFn(url, {
        method: options.method ?? "GET",
        body: options.body,
        headers: { "User-Agent": options.userAgent },
        signal,
      });
    } catch (err) {
      if (signal?.aborted) {
        throw new TimeoutError(
          `Request to ${url} timed out`,
          options.timeoutMs,
        );
      }
      lastError = err;
      if (attemptNo === maxAttempts) {
        debug("max attempts exhausted for %s", url);
        break;
      }
      const delay = calculateDelay(RETRY_BACKOFF_MS);
      debug(
        "attempt %d/%d for %s failed (%s), retrying in %dms",
        attemptNo,
        maxAttempts,
        url,
        err,
        delay,
      );
      await sleep(delay);
      continue;
    }

    if (!response.ok) {
      throw new HttpError(response.status, response.statusText, url);
    }
    return response;
  }

  throw new ConnectionError(
    `Failed to reach ${url} after ${maxAttempts} attempt(s): ${
      lastError instanceof Error ? lastError.message : String(lastError)
    }`,
    { cause: lastError },
  );
}
