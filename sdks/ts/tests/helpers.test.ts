import { EventEmitter } from "node:events";
import { PassThrough, Readable } from "node:stream";
import { describe, expect, it } from "vitest";
import {
  CancelledError,
  ConnectionError,
  TimeoutError,
  ValidationError,
} from "../src/errors.ts";
import { lines, runPublisher, runSubscriber } from "../src/helpers.ts";
import type { PublishItem } from "../src/types.ts";
import { makeClient } from "./support/client.ts";
import { flush } from "./support/memory-connection.ts";

async function collect(
  source: () => Iterable<PublishItem> | AsyncIterable<PublishItem>,
): Promise<PublishItem[]> {
  const items: PublishItem[] = [];
  for await (const item of source()) {
    items.push(item);
  }
  return items;
}

describe("lines", () => {
  it("yields one item per line", async () => {
    const input = Readable.from([
      Buffer.from("first\nsec"),
      Buffer.from("ond\r\nthird"),
    ]);

    expect(await collect(lines(input))).toEqual([
      { data: "first" },
      { data: "second" },
      { data: "third" },
    ]);
  });

  it("adds the defaults to every item", async () => {
    const input = Readable.from([Buffer.from("a\nb\n")]);

    expect(await collect(lines(input, { key: "k", psub: true }))).toEqual([
      { key: "k", psub: true, data: "a" },
      { key: "k", psub: true, data: "b" },
    ]);
  });

  it("detaches from the input when the session is cancelled", async () => {
    const input = new PassThrough();
    const { client } = makeClient();
    const controller = new AbortController();

    const session = client.prep(lines(input, { key: "k" }), {
      signal: controller.signal,
    });
    await flush();
    expect(input.listenerCount("end")).toBe(1);

    controller.abort();

    await expect(session).rejects.toBeInstanceOf(CancelledError);
    await flush();
    expect(input.listenerCount("end")).toBe(0);
    expect(input.listenerCount("data")).toBe(0);
  });

  it("detaches from the input when the session times out", async () => {
    const input = new PassThrough();
    const { client, connection } = makeClient();

    const session = client.prep(lines(input, { key: "k" }), {
      timeout: 0.05,
    });
    await flush();
    input.write("first\n");

    await expect(session).rejects.toBeInstanceOf(TimeoutError);
    await flush();
    expect(connection.sent).toEqual([
      '{"key":"k","token":null,"psub":false,"data":"first"}',
    ]);
    expect(input.listenerCount("end")).toBe(0);
  });
});

describe("runSubscriber", () => {
  it("ends normally on SIGINT", async () => {
    const signals = new EventEmitter();
    const { client, connection } = makeClient();

    const run = runSubscriber(client, "events", {
      callback: () => {},
      signals,
    });
    await flush();
    expect(signals.listenerCount("SIGINT")).toBe(1);

    signals.emit("SIGINT");

    await expect(run).resolves.toBeUndefined();
    expect(connection.closed).toBe(true);
    expect(signals.listenerCount("SIGINT")).toBe(0);
    expect(signals.listenerCount("SIGTERM")).toBe(0);
  });

  it("passes on failures that are not a shutdown", async () => {
    const signals = new EventEmitter();
    const { client, connection } = makeClient();

    const run = runSubscriber(client, "events", {
      callback: () => {},
      signals,
    });
    await flush();
    connection.fail();

    await expect(run).rejects.toBeInstanceOf(ConnectionError);
    expect(signals.listenerCount("SIGTERM")).toBe(0);
  });
});

describe("runPublisher", () => {
  it("publishes every item then detaches from the signals", async () => {
    const signals = new EventEmitter();
    const { client, connection } = makeClient();

    await runPublisher(client, ["a", "b"], { key: "k", signals });

    expect(connection.sent).toEqual([
      '{"key":"k","token":null,"psub":false,"data":"a"}',
      '{"key":"k","token":null,"psub":false,"data":"b"}',
    ]);
    expect(signals.listenerCount("SIGTERM")).toBe(0);
  });

  it("ends normally on SIGTERM while waiting for items", async () => {
    const signals = new EventEmitter();
    const { client, connection } = makeClient();

    let finished = false;

    const run = runPublisher(
      client,
      async function* (signal) {
        try {
          yield { key: "k", data: "first" };
          await new Promise<void>((resolve) => {
            signal?.addEventListener("abort", () => resolve(), { once: true });
          });
        } finally {
          finished = true;
        }
      },
      { signals },
    );
    await flush();
    signals.emit("SIGTERM");

    await expect(run).resolves.toBeUndefined();
    await flush();
    expect(connection.sent).toHaveLength(1);
    expect(connection.closed).toBe(true);
    expect(finished).toBe(true);
  });

  it("rejects an empty list", async () => {
    const signals = new EventEmitter();
    const { client } = makeClient();

    await expect(runPublisher(client, [], { key: "k", signals })).rejects
      .toBeInstanceOf(ValidationError);
    expect(signals.listenerCount("SIGINT")).toBe(0);
  });
});
