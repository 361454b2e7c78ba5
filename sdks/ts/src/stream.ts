/**
 * FrameQueue buffering received frames for a connection.
 * @module
 */

import type { Frame } from "./types.ts";

interface Waiter {
  resolve: (frame: Frame) => void;
  reject: (error: Error) => void;
}

/**
 * Ordered buffer between a socket's event callbacks and `receive()` calls.
 *
 * Frames pushed before the queue ends are still handed out; once they are
 * drained, every pending and later `next()` rejects with the error the queue
 * was ended with.
 *
 * @example
 * ```typescript
 * const queue = new FrameQueue();
 * socket.on("message", (data) => queue.push(data));
 * socket.on("close", () => queue.end(new ConnectionClosedError()));
 *
 * const frame = await queue.next();
 * ```
 */
export class FrameQueue {
  #frames: Frame[] = [];
  #waiters: Waiter[] = [];
  #error: Error | null = null;

  /**
   * Push a frame to the queue.
   *
   * Frames pushed after the queue ended are discarded.
   */
  push(frame: Frame): void {
    if (this.#error) return;

    const waiter = this.#waiters.shift();
    if (waiter) {
      waiter.resolve(frame);
    } else {
      this.#frames.push(frame);
    }
  }

  /**
   * Get the next frame.
   * Waits until a frame is available or the queue ends.
   */
  next(): Promise<Frame> {
    const frame = this.#frames.shift();
    if (frame !== undefined) {
      return Promise.resolve(frame);
    }
    if (this.#error) {
      return Promise.reject(this.#error);
    }

    return new Promise((resolve, reject) => {
      this.#waiters.push({ resolve, reject });
    });
  }

  /**
   * End the queue with the error later reads fail with.
   *
   * Only the first call has an effect. With `discard`, frames still buffered
   * are dropped instead of being handed out first.
   */
  end(error: Error, discard = false): void {
    if (this.#error) return;
    this.#error = error;
    if (discard) {
      this.#frames = [];
    }

    for (const waiter of this.#waiters.splice(0)) {
      waiter.reject(error);
    }
  }

  /**
   * Check if the queue has ended.
   */
  get ended(): boolean {
    return this.#error !== null;
  }

  /**
   * Get the number of frames waiting in the queue.
   */
  get pending(): number {
    return this.#frames.length;
  }
}
