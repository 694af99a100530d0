/**
 * @fileoverview TC39 Signals integration for tripwire.
 *
 * This package mirrors the fires of a tripwire signal into a read-only TC39
 * Signal, so reactive code can depend on "the latest event".
 *
 * @example
 * ```ts
 * import {Signal as Channel} from '@tripwire/core';
 * import {toState} from '@tripwire/reactive';
 * import {Signal} from 'signal-polyfill';
 *
 * const clicks = new Channel<[x: number, y: number]>();
 * const lastClick = toState(clicks);
 * const label = new Signal.Computed(() => {
 *   const args = lastClick.get();
 *   return args === undefined ? 'no clicks' : `${args[0]},${args[1]}`;
 * });
 *
 * clicks.fire(3, 4);
 * label.get();  // '3,4'
 * ```
 *
 * @packageDocumentation
 */

export {SignalState, toState} from './lib/signal-state.js';
