import { EventEmitter } from "node:events";
import { ensureError } from "switchyard-shared";
import { Logger } from "./logger";

/**
 * Broadcast stream of events.
 * Uses EventEmitter internally for pub/sub; every subscriber sees every
 * event published after it subscribed.
 *
 * @example
 * ```typescript
 * const stream = new EventStream<Message>('room:1');
 * const unsubscribe = stream.subscribe((message) => render(message));
 *
 * for await (const message of stream) {
 *   // ends when the stream is closed
 * }
 * ```
 */
export class EventStream<T> implements AsyncIterable<T> {
  private emitter = new EventEmitter();
  private isClosed = false;
  private log = Logger.for(this);

  constructor(public readonly name: string) {
    this.emitter.setMaxListeners(0);
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Get the number of active subscribers.
   */
  get subscriberCount(): number {
    return this.emitter.listenerCount("event");
  }

  /**
   * Publish an event to every subscriber.
   * @returns false if the stream is closed and the event was dropped
   */
  publish(event: T): boolean {
    if (this.isClosed) {
      return false;
    }
    this.emitter.emit("event", event);
    return true;
  }

  /**
   * Subscribe to events on this stream. A throwing handler is logged and
   * does not affect other subscribers or the publisher.
   * @returns Unsubscribe function
   */
  subscribe(handler: (event: T) => void): () => void {
    if (this.isClosed) {
      return () => {};
    }

    const listener = (event: T): void => {
      try {
        handler(event);
      } catch (error) {
        this.log.error({ err: ensureError(error), stream: this.name }, "Subscriber threw");
      }
    };
    this.emitter.on("event", listener);

    return () => {
      this.emitter.off("event", listener);
    };
  }

  /**
   * Register a handler called once when the stream closes.
   * @returns Unsubscribe function
   */
  onClose(handler: () => void): () => void {
    if (this.isClosed) {
      handler();
      return () => {};
    }
    this.emitter.once("close", handler);
    return () => {
      this.emitter.off("close", handler);
    };
  }

  /**
   * Resolve with the next event matching `predicate`.
   * Rejects on timeout or when the stream closes first.
   */
  waitFor(predicate: (event: T) => boolean, timeoutMs: number = 30000): Promise<T> {
    return new Promise((resolve, reject) => {
      if (this.isClosed) {
        reject(new Error(`Stream "${this.name}" is closed`));
        return;
      }

      const cleanup = (): void => {
        clearTimeout(timeout);
        unsubscribe();
        offClose();
      };

      const timeout = setTimeout(() => {
        cleanup();
        reject(new Error(`Stream "${this.name}": no matching event after ${timeoutMs}ms`));
      }, timeoutMs);

      const unsubscribe = this.subscribe((event) => {
        if (predicate(event)) {
          cleanup();
          resolve(event);
        }
      });

      const offClose = this.onClose(() => {
        cleanup();
        reject(new Error(`Stream "${this.name}" closed while waiting`));
      });
    });
  }

  /**
   * Iterate events until the stream closes. Subscribes on the first `next()`.
   */
  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    const buffer: T[] = [];
    let ended = this.isClosed;
    let wake: (() => void) | undefined;

    const unsubscribe = this.subscribe((event) => {
      buffer.push(event);
      wake?.();
    });
    const offClose = this.onClose(() => {
      ended = true;
      wake?.();
    });

    try {
      while (true) {
        while (buffer.length > 0) {
          const [next] = buffer.splice(0, 1);
          yield next;
        }
        if (ended) return;
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
        wake = undefined;
      }
    } finally {
      unsubscribe();
      offClose();
    }
  }

  /**
   * Close the stream: notify close handlers, then remove all subscribers.
   * Idempotent.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.emitter.emit("close");
    this.emitter.removeAllListeners();
  }
}
