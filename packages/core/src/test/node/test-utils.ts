/**
 * Test utilities for @tripwire/core.
 */

import {MessageChannel, Worker, type MessagePort} from 'node:worker_threads';
import {attach, Signal, SignalHost} from '../../index.js';
import type {
  Endpoint,
  EndpointEvent,
  Options,
  RemoteSignal,
} from '../../index.js';

/**
 * A disposable test context with a signal shared over an in-process
 * MessageChannel.
 */
export interface SharedSignalContext<TArgs extends Array<unknown>> {
  /** The owning side's signal */
  signal: Signal<TArgs>;
  /** The host serving the signal on port1 */
  host: SignalHost<TArgs>;
  /** The attached remote on port2 */
  remote: RemoteSignal<TArgs>;
  /** The underlying ports (exposed for advanced use cases) */
  port1: MessagePort;
  port2: MessagePort;
  /** Dispose method for `using` declarations */
  [Symbol.dispose]: () => void;
}

/**
 * Share a signal over a MessageChannel and attach to it.
 * Use with `using` to close everything when the scope ends.
 *
 * Both sides run in this thread, so waitSync() cannot be tested here; use
 * startWorker() for that.
 *
 * @example
 * ```ts
 * using ctx = await setupSharedSignal(new Signal<[string]>());
 * await ctx.remote.fire('Blue');
 * ```
 */
export async function setupSharedSignal<TArgs extends Array<unknown>>(
  signal: Signal<TArgs>,
  options: Options = {},
): Promise<SharedSignalContext<TArgs>> {
  const {port1, port2} = new MessageChannel();

  const host = new SignalHost(signal, port1, options);
  const remote = await attach<TArgs>(port2, options);

  return {
    signal,
    host,
    remote,
    port1,
    port2,
    [Symbol.dispose]() {
      remote.close();
      host.close();
      port1.close();
      port2.close();
    },
  };
}

/**
 * An endpoint driven by hand: records posted messages and delivers events
 * synchronously, so listener exceptions reach the caller of emit().
 */
export class FakeEndpoint implements Endpoint {
  readonly posted: Array<unknown> = [];
  readonly #listeners = new Map<EndpointEvent, Set<(data: unknown) => void>>();

  postMessage(message: unknown): void {
    this.posted.push(message);
  }

  on(type: EndpointEvent, listener: (data: unknown) => void): void {
    let listeners = this.#listeners.get(type);
    if (listeners === undefined) {
      listeners = new Set();
      this.#listeners.set(type, listeners);
    }
    listeners.add(listener);
  }

  off(type: EndpointEvent, listener: (data: unknown) => void): void {
    this.#listeners.get(type)?.delete(listener);
  }

  listenerCount(type: EndpointEvent): number {
    return this.#listeners.get(type)?.size ?? 0;
  }

  emit(type: EndpointEvent, data?: unknown): void {
    for (const listener of [...(this.#listeners.get(type) ?? [])]) {
      listener(data);
    }
  }
}

/**
 * Wait for a short delay to let posted messages be delivered.
 */
export function waitForMessages(ms = 10): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wait for a short delay.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// Workers get a fresh module loader, so TypeScript support is registered in
// the worker before the fixture is imported.
const TSX_API = import.meta.resolve('tsx/esm/api');
const BOOTSTRAP = `
const {workerData} = require('node:worker_threads');
import(workerData.tsx).then(({register}) => {
  register();
  return import(workerData.entry);
});
`;

/**
 * What a fixture worker does once attached. See signal-worker.ts.
 */
export type WorkerMode = 'block' | 'fire' | 'listen';

export interface WorkerOptions {
  mode: WorkerMode;
  /** Delay before firing, in 'fire' mode */
  delay?: number;
  /** Arguments to fire, in 'fire' mode */
  args?: Array<unknown>;
}

/**
 * Start the fixture worker. Its parentPort is the endpoint to share on.
 */
export function startWorker(options: WorkerOptions): Worker {
  return new Worker(BOOTSTRAP, {
    eval: true,
    execArgv: [],
    workerData: {
      ...options,
      tsx: TSX_API,
      entry: new URL('./signal-worker.ts', import.meta.url).href,
    },
  });
}

/**
 * Fixture-to-test messages. Not tripwire messages, so hosts ignore them.
 */
export type FixtureMessage =
  | {kind: 'attached'}
  | {kind: 'waited'; elapsed: number; ready: boolean}
  | {kind: 'fired'}
  | {kind: 'received'; args: Array<unknown>};

function isFixtureMessage(data: unknown): data is FixtureMessage {
  return typeof data === 'object' && data !== null && 'kind' in data;
}

/**
 * Resolve with the next fixture message of the given kind.
 */
export function nextFixtureMessage<K extends FixtureMessage['kind']>(
  worker: Worker,
  kind: K,
): Promise<Extract<FixtureMessage, {kind: K}>> {
  return new Promise((resolve, reject) => {
    const onMessage = (data: unknown) => {
      if (isFixtureMessage(data) && data.kind === kind) {
        worker.off('message', onMessage);
        worker.off('error', reject);
        resolve(data as Extract<FixtureMessage, {kind: K}>);
      }
    };
    worker.on('message', onMessage);
    worker.once('error', reject);
  });
}
