/**
 * Wire protocol utilities and runtime helpers.
 *
 * This file contains:
 * - Error serialization/deserialization
 * - NonCloneableError and the debug-mode argument check
 * - SignalDisposedError
 *
 * Constants live in constants.ts. Type definitions live in types.ts.
 *
 * @fileoverview Runtime utilities for the wire protocol.
 */

import type {SerializedError} from './types.js';

// ============================================================
// Errors
// ============================================================

/**
 * Serialize an error for transmission.
 */
export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    const serialized: SerializedError = {
      name: error.name,
      message: error.message,
    };
    if (error.stack !== undefined) {
      serialized.stack = error.stack;
    }
    return serialized;
  }
  return {
    name: 'Error',
    message: String(error),
  };
}

/**
 * Deserialize an error from transmission.
 */
export function deserializeError(serialized: SerializedError): Error {
  const error = new Error(serialized.message);
  error.name = serialized.name;
  if (serialized.stack) {
    error.stack = serialized.stack;
  }
  return error;
}

/**
 * Thrown (or rejected with) when a signal is used after dispose(), or when a
 * closed RemoteSignal still had work outstanding.
 */
export class SignalDisposedError extends Error {
  constructor(public readonly operation: string) {
    super(`Cannot ${operation}: the signal has been disposed.`);
    this.name = 'SignalDisposedError';
  }
}

/**
 * Error thrown in debug mode when a fired argument cannot be cloned.
 */
export class NonCloneableError extends Error {
  constructor(
    public readonly valueType:
      | 'function'
      | 'symbol'
      | 'promise'
      | 'class-instance',
    public readonly path: string,
  ) {
    const t =
      valueType === 'function'
        ? 'Function'
        : valueType === 'symbol'
          ? 'Symbol'
          : valueType === 'promise'
            ? 'Promise'
            : 'Class instance';
    super(
      `${t} at "${path}" cannot be cloned. Only structured-cloneable values can be fired across threads.`,
    );
    this.name = 'NonCloneableError';
  }
}

// ============================================================
// Detection helpers
// ============================================================

/**
 * Check if a value is a Promise (or thenable).
 */
export function isPromise(value: unknown): value is Promise<unknown> {
  return typeof (value as PromiseLike<unknown> | null)?.then === 'function';
}

/**
 * Check if a value is a plain object (not a class instance).
 */
export function isPlainObject(value: unknown): value is object {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto = Object.getPrototypeOf(value) as unknown;
  return proto === Object.prototype || proto === null;
}

// Built-ins that structured clone copies even though they are not plain
const cloneableClasses: ReadonlyArray<new (...args: Array<never>) => object> =
  [
    Date,
    RegExp,
    Map,
    Set,
    ArrayBuffer,
    SharedArrayBuffer,
    DataView,
    Error,
  ];

function isCloneableInstance(value: object): boolean {
  return (
    ArrayBuffer.isView(value) ||
    cloneableClasses.some((ctor) => value instanceof ctor)
  );
}

/**
 * Walk a value the way structured clone would and return an error for the
 * first value it would reject, or undefined if the whole graph clones.
 *
 * Map and Set contents are not traversed.
 */
export function findNonCloneable(
  value: unknown,
  path: string,
  seen = new WeakSet<object>(),
): NonCloneableError | undefined {
  if (typeof value === 'function') {
    return new NonCloneableError('function', path);
  }
  if (typeof value === 'symbol') {
    return new NonCloneableError('symbol', path);
  }
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }
  if (seen.has(value)) {
    return undefined;
  }
  seen.add(value);

  if (isPromise(value)) {
    return new NonCloneableError('promise', path);
  }
  if (Array.isArray(value)) {
    for (let i = 0; i < value.length; i++) {
      const error = findNonCloneable(value[i], `${path}[${String(i)}]`, seen);
      if (error !== undefined) {
        return error;
      }
    }
    return undefined;
  }
  if (isPlainObject(value)) {
    for (const [key, nested] of Object.entries(value)) {
      const error = findNonCloneable(nested, `${path}.${key}`, seen);
      if (error !== undefined) {
        return error;
      }
    }
    return undefined;
  }
  return isCloneableInstance(value)
    ? undefined
    : new NonCloneableError('class-instance', path);
}

/**
 * Report a protocol anomaly in debug mode.
 */
export function warn(debug: boolean, message: string, data?: unknown): void {
  if (debug) {
    console.warn(`[tripwire] ${message}`, data);
  }
}
