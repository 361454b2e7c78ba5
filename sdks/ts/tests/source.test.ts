import { afterEach, describe, expect, it, vi } from "vitest";
import {
  CallerError,
  CancelledError,
  ConnectionError,
  ValidationError,
} from "../src/errors.ts";
import { printConfirmation, publishLoop, toItemSource } from "../src/source.ts";
import type { Frame, ItemSource, PublishItem } from "../src/types.ts";
import { MemoryConnection } from "./support/memory-connection.ts";

function* items(...data: string[]): Generator<PublishItem> {
  for (const value of data) {
    yield { key: "k", token: "t", psub: false, data: value };
  }
}

describe("publishLoop", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("sends one envelope per item, in order, without confirmations", async () => {
    const connection = new MemoryConnection();

    const sent = await publishLoop(connection, () => items("a", "b", "c"), {
      confirm: false,
      defaults: {},
    });

    expect(sent).toBe(3);
    expect(connection.sent).toEqual([
      '{"key":"k","token":"t","psub":false,"data":"a"}',
      '{"key":"k","token":"t","psub":false,"data":"b"}',
      '{"key":"k","token":"t","psub":false,"data":"c"}',
    ]);
    expect(connection.kinds()).toEqual(["send", "send", "send"]);
    expect(connection.probes).toBe(0);
  });

  it("waits for one confirmation after every send", async () => {
    const connection = new MemoryConnection();
    let replies = 0;
    connection.onSend = () => {
      replies++;
      connection.deliver(`confirmed ${replies}`);
    };
    const confirmed: Array<[string, Frame]> = [];

    const sent = await publishLoop(connection, () => items("a", "b"), {
      confirm: true,
      defaults: {},
      callback: (data, confirmation) => confirmed.push([data, confirmation]),
    });

    expect(sent).toBe(2);
    expect(confirmed).toEqual([["a", "confirmed 1"], ["b", "confirmed 2"]]);
    expect(connection.kinds()).toEqual(["send", "receive", "send", "receive"]);
  });

  it("applies session defaults under item fields", async () => {
    const connection = new MemoryConnection();

    await publishLoop(
      connection,
      () => [{ data: "x" }, { key: "other", psub: false, data: "y" }],
      { confirm: false, defaults: { key: "k", token: "t", psub: true } },
    );

    expect(connection.sent).toEqual([
      '{"key":"k","token":"t","psub":true,"data":"x"}',
      '{"key":"other","token":"t","psub":false,"data":"y"}',
    ]);
  });

  it("reads async sources", async () => {
    const connection = new MemoryConnection();
    async function* source(): AsyncGenerator<PublishItem> {
      yield { key: "k", data: "1" };
      yield { key: "k", data: "2" };
    }

    await expect(
      publishLoop(connection, source, { confirm: false, defaults: {} }),
    ).resolves.toBe(2);
  });

  it("rejects an item without a key before sending it", async () => {
    const connection = new MemoryConnection();

    await expect(
      publishLoop(connection, () => [{ data: "x" }], {
        confirm: false,
        defaults: {},
      }),
    ).rejects.toBeInstanceOf(ValidationError);
    expect(connection.sent).toEqual([]);
  });

  it("propagates send failures", async () => {
    const connection = new MemoryConnection();
    await connection.close();

    await expect(
      publishLoop(connection, () => items("a"), {
        confirm: false,
        defaults: {},
      }),
    ).rejects.toBeInstanceOf(ConnectionError);
  });

  it("surfaces a throwing confirmation callback as CallerError", async () => {
    const connection = new MemoryConnection();
    connection.onSend = () => connection.deliver("ok");

    await expect(
      publishLoop(connection, () => items("a", "b"), {
        confirm: true,
        defaults: {},
        callback: () => {
          throw new Error("bad callback");
        },
      }),
    ).rejects.toBeInstanceOf(CallerError);
    expect(connection.sent).toHaveLength(1);
  });

  it("stops between items once its signal aborts", async () => {
    const connection = new MemoryConnection();
    const controller = new AbortController();
    const reason = new CancelledError();
    connection.onSend = () => controller.abort(reason);

    await expect(
      publishLoop(connection, () => items("a", "b"), {
        confirm: false,
        defaults: {},
        signal: controller.signal,
      }),
    ).rejects.toBe(reason);
    expect(connection.sent).toHaveLength(1);
  });

  it("hands its signal to the source", async () => {
    const connection = new MemoryConnection();
    const controller = new AbortController();
    const source = vi.fn<ItemSource>(() => items("a"));

    await publishLoop(connection, source, {
      confirm: false,
      defaults: {},
      signal: controller.signal,
    });

    expect(source).toHaveBeenCalledWith(controller.signal);
  });

  it("returns a source still waiting for an item when its signal aborts", async () => {
    const connection = new MemoryConnection();
    const controller = new AbortController();
    const reason = new CancelledError();
    const finish = vi.fn(() =>
      Promise.resolve<IteratorResult<PublishItem>>({
        done: true,
        value: undefined,
      })
    );
    const source: ItemSource = () => ({
      [Symbol.asyncIterator]: () => ({
        next: () => new Promise<IteratorResult<PublishItem>>(() => {}),
        return: finish,
      }),
    });

    const loop = publishLoop(connection, source, {
      confirm: false,
      defaults: { key: "k" },
      signal: controller.signal,
    });
    controller.abort(reason);

    await expect(loop).rejects.toBe(reason);
    expect(finish).toHaveBeenCalledTimes(1);
    expect(connection.sent).toEqual([]);
  });

  it("prints confirmations by default", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const connection = new MemoryConnection();
    connection.onSend = () => connection.deliver("ok");

    await publishLoop(connection, () => items("a"), {
      confirm: true,
      defaults: {},
    });

    expect(log).toHaveBeenCalledWith('"a": ok');
  });
});

describe("toItemSource", () => {
  it("turns a payload list into items carrying only data", async () => {
    const collected: PublishItem[] = [];
    for await (const item of toItemSource(["a", "b"])()) {
      collected.push(item);
    }
    expect(collected).toEqual([{ data: "a" }, { data: "b" }]);
  });

  it("passes producer functions through", () => {
    const producer = () => items("a");
    expect(toItemSource(producer)).toBe(producer);
  });

  it("rejects an empty list", () => {
    expect(() => toItemSource([])).toThrow(ValidationError);
  });
});

describe("printConfirmation", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints the data as a JSON string and the reply", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    printConfirmation("a b", "ok");
    expect(log).toHaveBeenCalledWith('"a b": ok');
  });
});
