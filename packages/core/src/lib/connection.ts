/**
 * Connection - one handler's membership in a signal.
 *
 * @packageDocumentation
 */

import type {ConnectionOwner} from './registry.js';

/**
 * Handle returned by `connect()`.
 *
 * A connection refers to its handler by token, never by position, and holds
 * its owner weakly: keeping a connection around does not keep the signal
 * alive, and a connection whose signal is gone reports itself disconnected.
 *
 * Dropping the handle does not disconnect the handler.
 *
 * @example
 * ```ts
 * const welcome = new Signal<[name: string]>();
 * const hello = welcome.connect((name) => console.log(`Hello ${name}`));
 *
 * welcome.fire('Blue');    // Hello Blue
 * hello.disconnect();
 * welcome.fire('Purple');  // nothing
 * ```
 */
export class Connection {
  readonly #owner: WeakRef<ConnectionOwner>;
  readonly #token: number;

  /**
   * @internal Created by Signal.connect() and RemoteSignal.connect().
   */
  constructor(owner: ConnectionOwner, token: number) {
    this.#owner = new WeakRef(owner);
    this.#token = token;
  }

  /**
   * Whether the handler is still registered. Once false, never true again.
   */
  get connected(): boolean {
    return this.#owner.deref()?.has(this.#token) ?? false;
  }

  /**
   * Remove the handler from its signal. Does nothing if already disconnected.
   */
  disconnect(): void {
    this.#owner.deref()?.delete(this.#token);
  }

  [Symbol.dispose](): void {
    this.disconnect();
  }
}
