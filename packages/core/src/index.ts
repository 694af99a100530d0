/**
 * @tripwire/core
 *
 * Thread-aware signals: connect handlers, fire, and wait for the next fire,
 * in this thread or from a worker.
 *
 * @fileoverview Public API exports.
 */

export const VERSION = '0.0.1';

// Core API
export {Signal} from './lib/signal.js';
export {Connection} from './lib/connection.js';
export {Latch} from './lib/latch.js';

// Sharing across threads
export {share} from './lib/share.js';
export {attach} from './lib/attach.js';
export {SignalHost} from './lib/signal-host.js';
export {RemoteSignal} from './lib/remote-signal.js';

// Utilities
export {HandlerRegistry} from './lib/registry.js';
export {
  findNonCloneable,
  NonCloneableError,
  SignalDisposedError,
} from './lib/protocol.js';

// Types
export type {
  Handler,
  Subscribable,
  Endpoint,
  EndpointEvent,
  Options,
  Message,
  HostMessage,
  RemoteMessage,
  SerializedError,
} from './lib/types.js';
export type {ConnectionOwner, HandlerRegistryOptions} from './lib/registry.js';
