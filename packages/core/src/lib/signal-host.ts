/**
 * @fileoverview SignalHost - serves a signal to one remote thread.
 *
 * The host runs in the signal's own thread. It answers fire requests by
 * firing the signal there, and while the remote is subscribed it forwards
 * the arguments of every completed round back over the endpoint. The
 * forwarder observes the signal instead of connecting to it, so it neither
 * counts as a handler nor fails the owner's round when arguments cannot be
 * posted.
 */

import {findNonCloneable, serializeError, warn} from './protocol.js';
import type {Signal} from './signal.js';
import type {Endpoint, HostMessage, Options, RemoteMessage} from './types.js';
import {isHostMessage, isTripwireMessage} from './types.js';

export class SignalHost<TArgs extends Array<unknown>> {
  readonly #signal: Signal<TArgs>;
  readonly #endpoint: Endpoint;
  readonly #debug: boolean;

  // Present while the remote is subscribed
  #unobserve: (() => void) | undefined;

  // Bound message handler for cleanup
  #handleMessage: (data: unknown) => void;

  constructor(
    signal: Signal<TArgs>,
    endpoint: Endpoint,
    options: Options = {},
  ) {
    this.#signal = signal;
    this.#endpoint = endpoint;
    this.#debug = options.debug ?? false;

    this.#handleMessage = this.#onMessage.bind(this);
    endpoint.on('message', this.#handleMessage);

    this.#post({type: 'tripwire:ready', latch: signal._latchBuffer});
  }

  /**
   * Whether the remote currently receives forwarded fires.
   */
  get subscribed(): boolean {
    return this.#unobserve !== undefined;
  }

  /**
   * Stop listening and stop forwarding. The signal itself is left alone.
   */
  close(): void {
    this.#endpoint.off('message', this.#handleMessage);
    this.#unsubscribe();
  }

  #post(message: RemoteMessage): void {
    this.#endpoint.postMessage(message);
  }

  #onMessage(data: unknown): void {
    if (!isTripwireMessage(data)) {
      return;
    }
    if (!isHostMessage(data)) {
      warn(this.#debug, 'host ignored message', data);
      return;
    }
    this.#dispatch(data);
  }

  #dispatch(message: HostMessage): void {
    switch (message.type) {
      case 'tripwire:fire':
        this.#fire(message.callId, message.args);
        break;
      case 'tripwire:subscribe':
        this.#subscribe();
        break;
      case 'tripwire:unsubscribe':
        this.#unsubscribe();
        break;
    }
  }

  #fire(callId: number, args: Array<unknown>): void {
    try {
      // Arguments arrive through structured clone; their shape is the
      // remote's promise, as with any wire value.
      this.#signal.fire(...(args as TArgs));
    } catch (error) {
      this.#post({
        type: 'tripwire:throw',
        callId,
        error: serializeError(error),
      });
      return;
    }
    this.#post({type: 'tripwire:return', callId});
  }

  #subscribe(): void {
    if (this.#unobserve !== undefined) {
      return;
    }
    this.#unobserve = this.#signal._observe((...args) => {
      this.#forward(args);
    });
  }

  #unsubscribe(): void {
    this.#unobserve?.();
    this.#unobserve = undefined;
  }

  // Runs inside the owner's round: report, never throw
  #forward(args: Array<unknown>): void {
    if (this.#debug) {
      const error = findNonCloneable(args, 'args');
      if (error !== undefined) {
        warn(true, 'host could not forward fire', error);
        return;
      }
    }
    try {
      this.#post({type: 'tripwire:fired', args});
    } catch (error) {
      warn(this.#debug, 'host could not forward fire', error);
    }
  }
}
