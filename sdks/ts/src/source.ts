/**
 * Send side of a persistent rep.
 * @module
 */

import createDebug from "debug";
import { CallerError, ValidationError } from "./errors.ts";
import {
  buildEnvelope,
  encodeEnvelope,
  type EnvelopeDefaults,
  frameToText,
} from "./protocol.ts";
import { untilAborted } from "./session.ts";
import type { Connection } from "./transport.ts";
import type {
  ConfirmationCallback,
  Frame,
  ItemSource,
  PublishItem,
} from "./types.ts";

const debug = createDebug("esub:source");

type Items = Iterable<PublishItem> | AsyncIterable<PublishItem>;
type ItemIterator = Iterator<PublishItem> | AsyncIterator<PublishItem>;

/**
 * Options of a publish loop.
 */
export interface PublishOptions {
  /** Wait for a confirmation after every message */
  confirm: boolean;
  /** Values items fall back to */
  defaults: EnvelopeDefaults;
  /** Called with each confirmed message, default prints it */
  callback?: ConfirmationCallback;
  /** Stops the loop, and the wait for the next item, when aborted */
  signal?: AbortSignal;
}

/**
 * Default confirmation callback: print the sent data and the reply.
 */
export function printConfirmation(data: string, confirmation: Frame): void {
  console.log(`${JSON.stringify(data)}: ${frameToText(confirmation)}`);
}

/**
 * Turn the accepted item inputs into an {@link ItemSource}.
 *
 * A list of payloads is shorthand for items carrying only `data`, so every
 * message uses the session defaults.
 *
 * @throws {ValidationError} If the list is empty
 */
export function toItemSource(items: ItemSource | readonly string[]): ItemSource {
  if (typeof items === "function") {
    return items;
  }
  if (items.length === 0) {
    throw new ValidationError("Publish list cannot be empty", "items");
  }
  return () => items.map((data) => ({ data }));
}

function isAsyncIterable(items: Items): items is AsyncIterable<PublishItem> {
  return Symbol.asyncIterator in items;
}

function iterate(items: Items): ItemIterator {
  return isAsyncIterable(items)
    ? items[Symbol.asyncIterator]()
    : items[Symbol.iterator]();
}

/**
 * Ask an abandoned iterator to finish. An async generator still waiting for
 * its next item finishes once that wait ends.
 */
function release(iterator: ItemIterator): void {
  Promise.resolve(iterator.return?.()).then(
    () => undefined,
    (err: unknown) => debug("item source failed to finish: %s", err),
  );
}

/**
 * Send every item of `source` over the connection, in order.
 *
 * With Confirmation Mode, each send is followed by exactly one receive whose
 * frame is handed to the callback before the next item is sent.
 *
 * The source gets `options.signal`. When the signal aborts while the source
 * is waiting for its next item, the loop rejects right away and the source's
 * iterator is returned.
 *
 * @returns The number of sent messages, once the source is exhausted
 * @throws {ConnectionError} If a send or receive fails
 * @throws {ValidationError} If an item has no key
 * @throws {CallerError} If the callback throws
 */
export async function publishLoop(
  connection: Connection,
  source: ItemSource,
  options: PublishOptions,
): Promise<number> {
  const callback = options.callback ?? printConfirmation;
  const { signal } = options;
  const iterator = iterate(source(signal));
  let exhausted = false;
  let sent = 0;

  try {
    for (;;) {
      signal?.throwIfAborted();

      const next = Promise.resolve(iterator.next());
      const result = signal ? await untilAborted(next, signal) : await next;
      if (result.done) {
        exhausted = true;
        break;
      }
      const item = result.value;
      signal?.throwIfAborted();

      const envelope = buildEnvelope(item, options.defaults);
      await connection.send(encodeEnvelope(envelope));
      sent++;

      if (options.confirm) {
        const confirmation = await connection.receive();
        try {
          callback(item.data, confirmation);
        } catch (err) {
          throw new CallerError("Confirmation callback failed", err);
        }
      }
    }
  } finally {
    if (!exhausted) release(iterator);
  }

  return sent;
}
