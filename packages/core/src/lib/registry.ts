/**
 * @fileoverview HandlerRegistry - token-keyed handler storage.
 *
 * Every handler gets a token that is never reused, so removing one handler
 * can never shift or invalidate another's identity. Map preserves insertion
 * order, which is the delivery order.
 */

/**
 * The part of a registry a Connection needs to observe and end its own
 * membership.
 */
export interface ConnectionOwner {
  has(token: number): boolean;
  delete(token: number): boolean;
}

export interface HandlerRegistryOptions {
  /**
   * Called after a token is removed through delete(). Not called by clear().
   */
  onRemove?: (token: number) => void;
}

export class HandlerRegistry<H> implements ConnectionOwner {
  #nextToken = 1;
  #handlers = new Map<number, H>();
  readonly #onRemove: ((token: number) => void) | undefined;

  constructor(options: HandlerRegistryOptions = {}) {
    this.#onRemove = options.onRemove;
  }

  /**
   * Number of handlers currently registered.
   */
  get size(): number {
    return this.#handlers.size;
  }

  /**
   * Register a handler at the end of the delivery order and return its token.
   */
  add(handler: H): number {
    const token = this.#nextToken++;
    this.#handlers.set(token, handler);
    return token;
  }

  has(token: number): boolean {
    return this.#handlers.has(token);
  }

  get(token: number): H | undefined {
    return this.#handlers.get(token);
  }

  delete(token: number): boolean {
    if (!this.#handlers.delete(token)) {
      return false;
    }
    this.#onRemove?.(token);
    return true;
  }

  /**
   * Copy of the current entries in delivery order. Later changes to the
   * registry do not affect the copy.
   */
  snapshot(): Array<[number, H]> {
    return [...this.#handlers];
  }

  clear(): void {
    this.#handlers.clear();
  }
}
