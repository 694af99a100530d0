/**
 * @fileoverview SignalState - a read-only TC39 signal mirroring fires.
 *
 * SignalState connects to a tripwire signal (local or remote) and stores the
 * arguments of each fire in a Signal.State, so computeds and effects can track
 * them.
 */

import {Signal} from 'signal-polyfill';
import type {Connection, Subscribable} from '@tripwire/core';

/**
 * A read-only reactive view of the latest fire of a tripwire signal.
 *
 * @example
 * ```ts
 * const welcome = new tripwire.Signal<[name: string]>();
 * const latest = new SignalState(welcome);
 *
 * const greeting = new Signal.Computed(() => {
 *   const args = latest.get();
 *   return args === undefined ? 'Nobody yet' : `Hello ${args[0]}`;
 * });
 *
 * welcome.fire('Blue');
 * greeting.get();  // 'Hello Blue'
 * ```
 */
export class SignalState<TArgs extends Array<unknown>> {
  /**
   * Internal state signals. Reads of get() and count are tracked through
   * these.
   */
  readonly #latest = new Signal.State<TArgs | undefined>(undefined);
  readonly #count = new Signal.State(0);

  readonly #connection: Connection;

  constructor(source: Subscribable<TArgs>) {
    this.#connection = source.connect((...args) => {
      this.#latest.set(args);
      this.#count.set(this.#count.get() + 1);
    });
  }

  /**
   * Arguments of the latest fire, or undefined before the first one.
   * This is reactive - effects will track this read.
   */
  get(): TArgs | undefined {
    return this.#latest.get();
  }

  /**
   * Number of fires observed. Reactive.
   */
  get count(): number {
    return this.#count.get();
  }

  /**
   * Throws an error - the state only changes when the source fires.
   */
  set(_value: TArgs): void {
    throw new Error(
      'SignalState is read-only. Fire the source signal to change it.',
    );
  }

  /**
   * Whether the state still follows its source.
   */
  get connected(): boolean {
    return this.#connection.connected;
  }

  /**
   * Stop following the source. The last value is kept.
   */
  dispose(): void {
    this.#connection.disconnect();
  }

  [Symbol.dispose](): void {
    this.dispose();
  }
}

/**
 * Create a SignalState following `source`.
 */
export function toState<TArgs extends Array<unknown>>(
  source: Subscribable<TArgs>,
): SignalState<TArgs> {
  return new SignalState(source);
}
