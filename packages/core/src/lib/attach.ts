/**
 * Attach to a signal shared from another thread.
 *
 * This is a thin wrapper around RemoteSignal that waits for the host's ready
 * message and its latch.
 *
 * @fileoverview Remote-side API for attaching to shared signals.
 */

import {Latch} from './latch.js';
import {RemoteSignal} from './remote-signal.js';
import type {Endpoint, Options} from './types.js';
import {isRemoteMessage} from './types.js';

/**
 * Attach to the signal shared over `endpoint`.
 *
 * Returns a Promise that resolves once the sharing side has posted its ready
 * message, so the latch is available before the first waitSync(). It rejects
 * if the endpoint reports an error, or exits or closes before that message.
 *
 * @param endpoint - The endpoint the signal was shared on
 * @param options - Configuration options
 * @returns A promise for the remote view of the signal
 */
export function attach<TArgs extends Array<unknown> = []>(
  endpoint: Endpoint,
  options: Options = {},
): Promise<RemoteSignal<TArgs>> {
  return new Promise((resolve, reject) => {
    const cleanup = () => {
      endpoint.off('message', onReady);
      endpoint.off('error', onError);
      endpoint.off('exit', onGone);
      endpoint.off('close', onGone);
    };
    const onReady = (data: unknown) => {
      if (isRemoteMessage(data) && data.type === 'tripwire:ready') {
        // Start listening before letting go of the bootstrap listener
        const remote = new RemoteSignal<TArgs>(
          endpoint,
          new Latch(data.latch),
          options,
        );
        cleanup();
        resolve(remote);
      }
    };
    const onError = (error: unknown) => {
      cleanup();
      reject(error instanceof Error ? error : new Error(String(error)));
    };
    const onGone = () => {
      cleanup();
      reject(new Error('Endpoint closed before the signal was shared.'));
    };
    endpoint.on('message', onReady);
    endpoint.on('error', onError);
    endpoint.on('exit', onGone);
    endpoint.on('close', onGone);
  });
}
