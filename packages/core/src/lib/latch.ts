/**
 * @fileoverview Latch - the ready flag and its condition, in shared memory.
 *
 * Two Int32 slots in a SharedArrayBuffer: READY, which observers read, and
 * GENERATION, which every release bumps and blocked threads park on.
 * `Atomics.wait` compares GENERATION against the armed value and parks in one
 * step, so a release landing between arm() and waitSync() is never lost.
 */

import {
  GENERATION_INDEX,
  LATCH_BYTE_LENGTH,
  READY_INDEX,
} from './constants.js';

export class Latch {
  /**
   * The shared buffer. Post it to another thread and wrap it there with
   * `new Latch(buffer)` to wait on the same flag.
   */
  readonly buffer: SharedArrayBuffer;
  readonly #state: Int32Array;

  constructor(
    buffer: SharedArrayBuffer = new SharedArrayBuffer(LATCH_BYTE_LENGTH),
  ) {
    if (!(buffer instanceof SharedArrayBuffer)) {
      throw new TypeError('Latch requires a SharedArrayBuffer');
    }
    if (buffer.byteLength !== LATCH_BYTE_LENGTH) {
      throw new TypeError(
        `Latch buffer must be ${String(LATCH_BYTE_LENGTH)} bytes, got ${String(buffer.byteLength)}`,
      );
    }
    this.buffer = buffer;
    this.#state = new Int32Array(buffer);
  }

  /**
   * True when a release has happened since the last arm().
   */
  get ready(): boolean {
    return Atomics.load(this.#state, READY_INDEX) === 1;
  }

  get generation(): number {
    return Atomics.load(this.#state, GENERATION_INDEX);
  }

  /**
   * Clear the ready flag and return the generation to wait past.
   */
  arm(): number {
    Atomics.store(this.#state, READY_INDEX, 0);
    return Atomics.load(this.#state, GENERATION_INDEX);
  }

  /**
   * Set the ready flag and wake every thread blocked in waitSync().
   *
   * @returns The number of threads woken.
   */
  release(): number {
    Atomics.add(this.#state, GENERATION_INDEX, 1);
    Atomics.store(this.#state, READY_INDEX, 1);
    return Atomics.notify(this.#state, GENERATION_INDEX);
  }

  /**
   * Block the calling thread until the generation moves past `generation`.
   * Returns at once if it already has.
   */
  waitSync(generation: number): void {
    while (Atomics.load(this.#state, GENERATION_INDEX) === generation) {
      Atomics.wait(this.#state, GENERATION_INDEX, generation);
    }
  }
}
