/**
 * Core type definitions for tripwire.
 *
 * @packageDocumentation
 */

import type {Connection} from './connection.js';
import {MESSAGE_PREFIX} from './constants.js';

// ============================================================
// Handlers
// ============================================================

/**
 * A callback connected to a signal. Receives the fired arguments unchanged.
 */
export type Handler<TArgs extends Array<unknown>> = (...args: TArgs) => void;

/**
 * Anything handlers can be connected to: a local Signal or a RemoteSignal.
 */
export interface Subscribable<TArgs extends Array<unknown>> {
  connect(handler: Handler<TArgs>): Connection;
}

// ============================================================
// Endpoint interface
// ============================================================

/**
 * Events an endpoint may emit. Only 'message' is required; 'error', 'exit'
 * (Worker) and 'close' (MessagePort) end a pending attach().
 */
export type EndpointEvent = 'message' | 'error' | 'exit' | 'close';

/**
 * An Endpoint is any object that can send and receive messages across a
 * thread boundary: a worker_threads MessagePort, Worker, or parentPort.
 */
export interface Endpoint {
  postMessage(message: unknown, transfer?: ReadonlyArray<unknown>): void;
  on(type: EndpointEvent, listener: (data: unknown) => void): void;
  off(type: EndpointEvent, listener: (data: unknown) => void): void;
}

/**
 * Options for configuring share() and attach().
 */
export interface Options {
  /**
   * Enable debug mode.
   *
   * When `true`, fired arguments are traversed before they are posted and a
   * `NonCloneableError` names the path of the first value structured clone
   * would reject (e.g. "args[1].onDone"). Ignored or malformed protocol
   * messages are reported with `console.warn`.
   *
   * @default false
   */
  debug?: boolean;
}

// ============================================================
// Message types
// ============================================================

/**
 * Serialized error format for transmission.
 */
export interface SerializedError {
  name: string;
  message: string;
  stack?: string;
}

/**
 * Sent by the host once it listens. Carries the signal's latch buffer.
 */
export interface ReadyMessage {
  type: 'tripwire:ready';
  latch: SharedArrayBuffer;
}

/**
 * Ask the host to fire the shared signal.
 */
export interface FireMessage {
  type: 'tripwire:fire';
  callId: number;
  args: Array<unknown>;
}

/**
 * A host fire round completed without error.
 */
export interface ReturnMessage {
  type: 'tripwire:return';
  callId: number;
}

/**
 * A host fire round was aborted by a throwing handler.
 */
export interface ThrowMessage {
  type: 'tripwire:throw';
  callId: number;
  error: SerializedError;
}

/**
 * Forwarded arguments of a host fire, sent while the remote is subscribed.
 */
export interface FiredMessage {
  type: 'tripwire:fired';
  args: Array<unknown>;
}

export interface SubscribeMessage {
  type: 'tripwire:subscribe';
}

export interface UnsubscribeMessage {
  type: 'tripwire:unsubscribe';
}

/**
 * Messages the host receives.
 */
export type HostMessage = FireMessage | SubscribeMessage | UnsubscribeMessage;

/**
 * Messages the remote receives.
 */
export type RemoteMessage =
  | ReadyMessage
  | ReturnMessage
  | ThrowMessage
  | FiredMessage;

export type Message = HostMessage | RemoteMessage;

// Type guards for messages
// Shared helper casts value to record after null/object check
type MessageRecord = Record<string, unknown>;
const asMessage = (v: unknown): MessageRecord | undefined =>
  typeof v === 'object' && v !== null ? (v as MessageRecord) : undefined;

/**
 * Whether the value looks like a tripwire message at all, well-formed or not.
 */
export function isTripwireMessage(value: unknown): value is {type: string} {
  const type = asMessage(value)?.['type'];
  return typeof type === 'string' && type.startsWith(MESSAGE_PREFIX);
}

function isSerializedError(value: unknown): value is SerializedError {
  const e = asMessage(value);
  return typeof e?.['name'] === 'string' && typeof e['message'] === 'string';
}

export function isHostMessage(value: unknown): value is HostMessage {
  const m = asMessage(value);
  switch (m?.['type']) {
    case 'tripwire:fire':
      return typeof m['callId'] === 'number' && Array.isArray(m['args']);
    case 'tripwire:subscribe':
    case 'tripwire:unsubscribe':
      return true;
    default:
      return false;
  }
}

export function isRemoteMessage(value: unknown): value is RemoteMessage {
  const m = asMessage(value);
  switch (m?.['type']) {
    case 'tripwire:ready':
      return m['latch'] instanceof SharedArrayBuffer;
    case 'tripwire:return':
      return typeof m['callId'] === 'number';
    case 'tripwire:throw':
      return typeof m['callId'] === 'number' && isSerializedError(m['error']);
    case 'tripwire:fired':
      return Array.isArray(m['args']);
    default:
      return false;
  }
}
