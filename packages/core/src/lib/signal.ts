/**
 * Signal - an event channel that fans fired arguments out to its handlers.
 *
 * @packageDocumentation
 */

import {Connection} from './connection.js';
import {Latch} from './latch.js';
import {SignalDisposedError} from './protocol.js';
import {HandlerRegistry} from './registry.js';
import type {Handler, Subscribable} from './types.js';

/**
 * A wait() call waiting for the next fire round to complete.
 */
interface PendingWait {
  start: number;
  resolve: (elapsed: number) => void;
}

/**
 * An event channel carrying the argument list `TArgs`.
 *
 * Handlers run synchronously on the firing thread, in the order they were
 * connected. A handler that throws ends the round: the handlers after it do
 * not run and the error reaches the caller of `fire()`.
 *
 * A signal belongs to the thread that created it. Other threads reach it
 * through `share()` / `attach()`.
 *
 * @example
 * ```ts
 * const welcome = new Signal<[name: string]>();
 * welcome.connect((name) => console.log(`Hello ${name}`));
 *
 * setTimeout(() => welcome.fire('Blue'), 5000);
 * const elapsed = await welcome.wait();  // ~5000
 * ```
 */
export class Signal<TArgs extends Array<unknown> = []>
  implements Subscribable<TArgs>
{
  readonly #handlers = new HandlerRegistry<Handler<TArgs>>();
  readonly #latch = new Latch();
  readonly #observers = new Set<Handler<TArgs>>();
  #waiters: Array<PendingWait> = [];
  #disposed = false;

  /**
   * Number of connected handlers. Observers are not counted.
   */
  get size(): number {
    return this.#handlers.size;
  }

  /**
   * The ready flag: false from a wait() until the next completed fire.
   */
  get ready(): boolean {
    return this.#latch.ready;
  }

  get disposed(): boolean {
    return this.#disposed;
  }

  /**
   * The shared latch buffer other threads block on.
   * @internal Posted to remotes by SignalHost.
   */
  get _latchBuffer(): SharedArrayBuffer {
    return this.#latch.buffer;
  }

  /**
   * Observe completed rounds without counting as a handler. An observer runs
   * after the handlers of every round that had any, and must not throw.
   *
   * @internal Used by SignalHost to forward fires.
   * @returns A function that stops observing.
   */
  _observe(observer: Handler<TArgs>): () => void {
    this.#observers.add(observer);
    return () => {
      this.#observers.delete(observer);
    };
  }

  /**
   * Connect a handler. It runs on every later fire until disconnected.
   */
  connect(handler: Handler<TArgs>): Connection {
    if (this.#disposed) {
      throw new SignalDisposedError('connect');
    }
    const token = this.#handlers.add(handler);
    return new Connection(this.#handlers, token);
  }

  /**
   * Call every connected handler with `args`, then release everything
   * waiting on this signal.
   *
   * Handlers connected during the round first run on the next fire; handlers
   * disconnected during the round are skipped if not yet reached. With no
   * handlers connected this does nothing at all, and waiters stay pending.
   */
  fire(...args: TArgs): void {
    if (this.#handlers.size === 0) {
      return;
    }

    for (const [token, handler] of this.#handlers.snapshot()) {
      if (this.#handlers.has(token)) {
        handler(...args);
      }
    }
    for (const observer of [...this.#observers]) {
      observer(...args);
    }

    this.#latch.release();
    const waiters = this.#waiters.splice(0);
    const now = performance.now();
    for (const {start, resolve} of waiters) {
      resolve(Math.floor(now - start));
    }
  }

  /**
   * Wait for the next fire round to complete.
   *
   * Only fires that complete after this call count. Every pending waiter is
   * released by the same fire.
   *
   * @returns Whole milliseconds between this call and the fire's completion.
   */
  wait(): Promise<number> {
    if (this.#disposed) {
      return Promise.reject(new SignalDisposedError('wait'));
    }
    this.#latch.arm();
    const start = performance.now();
    return new Promise<number>((resolve) => {
      this.#waiters.push({start, resolve});
    });
  }

  /**
   * Disconnect every handler. Connections report `connected === false`
   * afterwards. Pending waits are not released.
   */
  dispose(): void {
    this.#disposed = true;
    this.#handlers.clear();
  }

  [Symbol.dispose](): void {
    this.dispose();
  }
}
