/**
 * Wire protocol and shared memory constants.
 *
 * Separated into their own file to avoid circular dependencies between
 * types.ts and the modules that build messages.
 *
 * @fileoverview Constants for the wire protocol and the latch layout.
 */

/**
 * Prefix of every message type. Messages without it belong to someone else
 * sharing the endpoint and are left alone.
 */
export const MESSAGE_PREFIX = 'tripwire:';

/**
 * Int32 slot holding the ready flag (0 = a wait is armed, 1 = fired since).
 */
export const READY_INDEX = 0;

/**
 * Int32 slot holding the release counter that blocked threads park on.
 */
export const GENERATION_INDEX = 1;

/**
 * Byte length of a latch buffer: two Int32 slots.
 */
export const LATCH_BYTE_LENGTH = 2 * Int32Array.BYTES_PER_ELEMENT;
