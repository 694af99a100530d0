/**
 * Share a signal with another thread.
 *
 * This is a thin wrapper around SignalHost.
 *
 * @fileoverview Owner-side API for sharing signals.
 */

import {SignalHost} from './signal-host.js';
import type {Signal} from './signal.js';
import type {Endpoint, Options} from './types.js';

/**
 * Serve `signal` over `endpoint` so the thread on the other side can
 * `attach()` to it.
 *
 * Posts a ready message carrying the signal's shared latch. The attach() side
 * waits for it before returning.
 *
 * @param signal - The signal to share; it stays owned by this thread
 * @param endpoint - The endpoint to listen on (MessagePort, Worker, parentPort)
 * @param options - Configuration options
 * @returns A cleanup function to stop serving
 */
export function share<TArgs extends Array<unknown>>(
  signal: Signal<TArgs>,
  endpoint: Endpoint,
  options: Options = {},
): () => void {
  const host = new SignalHost(signal, endpoint, options);
  return () => host.close();
}
