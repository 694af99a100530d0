/**
 * @fileoverview RemoteSignal - another thread's view of a shared signal.
 *
 * The signal itself, and the handlers connected to it there, stay in the
 * thread that shared it. A RemoteSignal can:
 * - fire it (the round runs in the owning thread; errors come back)
 * - connect local handlers, which receive forwarded fires
 * - wait for the next fire, asynchronously or by blocking this thread on the
 *   shared latch
 *
 * The remote subscribes to forwarded fires only while it has handlers or
 * pending waits, and unsubscribes when it has neither.
 */

import {Connection} from './connection.js';
import type {Latch} from './latch.js';
import {
  deserializeError,
  findNonCloneable,
  SignalDisposedError,
  warn,
} from './protocol.js';
import {HandlerRegistry} from './registry.js';
import type {
  Endpoint,
  Handler,
  HostMessage,
  Options,
  Subscribable,
} from './types.js';
import {isRemoteMessage, isTripwireMessage} from './types.js';

/**
 * Fire request waiting for the host's answer.
 */
interface PendingCall {
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * A wait() call waiting for the next forwarded fire.
 */
interface PendingWait {
  start: number;
  resolve: (elapsed: number) => void;
  reject: (error: Error) => void;
}

/**
 * A shared signal as seen from another thread. Created by `attach()`.
 *
 * Forwarded fires are delivered from the endpoint's 'message' listener, so
 * they follow the rules of a local round: a handler that throws ends the
 * delivery before later handlers and before this thread's waiters. The
 * error has no caller to reach and surfaces as an uncaught exception in
 * this thread.
 *
 * @example
 * ```ts
 * // worker.ts
 * const welcome = await attach<[name: string]>(parentPort);
 * welcome.connect((name) => console.log(`Hello ${name}`));
 *
 * const elapsed = welcome.waitSync();  // blocks until the owner fires
 * ```
 */
export class RemoteSignal<TArgs extends Array<unknown>>
  implements Subscribable<TArgs>
{
  readonly #endpoint: Endpoint;
  readonly #latch: Latch;
  readonly #debug: boolean;

  readonly #handlers = new HandlerRegistry<Handler<TArgs>>({
    onRemove: () => {
      this.#updateSubscription();
    },
  });
  #waiters: Array<PendingWait> = [];
  #subscribed = false;
  #closed = false;

  // Pending fire calls awaiting the host's answer
  #nextCallId = 1;
  #pendingFires = new Map<number, PendingCall>();

  // Bound message handler for cleanup
  #handleMessage: (data: unknown) => void;

  /**
   * @internal Use attach(), which waits for the host's latch first.
   */
  constructor(endpoint: Endpoint, latch: Latch, options: Options = {}) {
    this.#endpoint = endpoint;
    this.#latch = latch;
    this.#debug = options.debug ?? false;

    this.#handleMessage = this.#onMessage.bind(this);
    endpoint.on('message', this.#handleMessage);
  }

  /**
   * Number of handlers connected in this thread.
   */
  get size(): number {
    return this.#handlers.size;
  }

  /**
   * The shared ready flag: false from any thread's wait until the next
   * completed fire.
   */
  get ready(): boolean {
    return this.#latch.ready;
  }

  /**
   * Whether the host has been asked to forward fires.
   */
  get subscribed(): boolean {
    return this.#subscribed;
  }

  get closed(): boolean {
    return this.#closed;
  }

  /**
   * Connect a handler in this thread. It runs for every fire forwarded by the
   * host from the time the host sees the subscription.
   */
  connect(handler: Handler<TArgs>): Connection {
    if (this.#closed) {
      throw new SignalDisposedError('connect');
    }
    const token = this.#handlers.add(handler);
    this.#updateSubscription();
    return new Connection(this.#handlers, token);
  }

  /**
   * Fire the shared signal in its owning thread.
   *
   * Resolves when the round has completed there. Rejects with the handler's
   * error if one threw, or with a `NonCloneableError` in debug mode if an
   * argument cannot cross threads.
   */
  fire(...args: TArgs): Promise<void> {
    if (this.#closed) {
      return Promise.reject(new SignalDisposedError('fire'));
    }
    if (this.#debug) {
      const error = findNonCloneable(args, 'args');
      if (error !== undefined) {
        return Promise.reject(error);
      }
    }

    const callId = this.#nextCallId++;
    return new Promise<void>((resolve, reject) => {
      this.#pendingFires.set(callId, {resolve, reject});
      try {
        this.#post({type: 'tripwire:fire', callId, args});
      } catch (error) {
        this.#pendingFires.delete(callId);
        throw error;
      }
    });
  }

  /**
   * Wait for the next fire forwarded by the host.
   *
   * @returns Whole milliseconds between this call and the forwarded fire's
   *   arrival.
   */
  wait(): Promise<number> {
    if (this.#closed) {
      return Promise.reject(new SignalDisposedError('wait'));
    }
    this.#latch.arm();
    const start = performance.now();
    const waiting = new Promise<number>((resolve, reject) => {
      this.#waiters.push({start, resolve, reject});
    });
    this.#updateSubscription();
    return waiting;
  }

  /**
   * Block this thread until the owning thread's next fire completes.
   *
   * Parks on the shared latch with `Atomics.wait`; no messages are processed
   * meanwhile. Never call this in the owning thread: nothing could fire.
   *
   * @returns Whole milliseconds spent blocked.
   */
  waitSync(): number {
    if (this.#closed) {
      throw new SignalDisposedError('waitSync');
    }
    const start = performance.now();
    const generation = this.#latch.arm();
    this.#latch.waitSync(generation);
    return Math.floor(performance.now() - start);
  }

  /**
   * Stop listening, disconnect local handlers and unsubscribe. Outstanding
   * fire calls and waits reject with `SignalDisposedError`.
   */
  close(): void {
    if (this.#closed) {
      return;
    }
    this.#closed = true;
    this.#handlers.clear();
    this.#updateSubscription();
    this.#endpoint.off('message', this.#handleMessage);

    for (const {reject} of this.#pendingFires.values()) {
      reject(new SignalDisposedError('fire'));
    }
    this.#pendingFires.clear();
    for (const {reject} of this.#waiters.splice(0)) {
      reject(new SignalDisposedError('wait'));
    }
  }

  [Symbol.dispose](): void {
    this.close();
  }

  #post(message: HostMessage): void {
    this.#endpoint.postMessage(message);
  }

  #updateSubscription(): void {
    const wanted =
      !this.#closed && (this.#handlers.size > 0 || this.#waiters.length > 0);
    if (wanted === this.#subscribed) {
      return;
    }
    this.#subscribed = wanted;
    this.#post({
      type: wanted ? 'tripwire:subscribe' : 'tripwire:unsubscribe',
    });
  }

  #onMessage(data: unknown): void {
    if (!isTripwireMessage(data)) {
      return;
    }
    if (!isRemoteMessage(data)) {
      warn(this.#debug, 'remote ignored message', data);
      return;
    }

    switch (data.type) {
      case 'tripwire:ready':
        // Handshake already completed by attach()
        break;
      case 'tripwire:return':
        this.#settle(data.callId)?.resolve();
        break;
      case 'tripwire:throw':
        this.#settle(data.callId)?.reject(deserializeError(data.error));
        break;
      case 'tripwire:fired':
        // Same wire-value contract as the host's fire requests
        this.#deliver(data.args as TArgs);
        break;
    }
  }

  #settle(callId: number): PendingCall | undefined {
    const pending = this.#pendingFires.get(callId);
    if (pending === undefined) {
      warn(this.#debug, `no pending fire for call ${String(callId)}`);
      return undefined;
    }
    this.#pendingFires.delete(callId);
    return pending;
  }

  #deliver(args: TArgs): void {
    for (const [token, handler] of this.#handlers.snapshot()) {
      if (this.#handlers.has(token)) {
        handler(...args);
      }
    }

    const waiters = this.#waiters.splice(0);
    const now = performance.now();
    for (const {start, resolve} of waiters) {
      resolve(Math.floor(now - start));
    }
    this.#updateSubscription();
  }
}
