/**
 * Single-pass cursor with one item of lookahead.
 *
 * Feeds the recursive builder, which must inspect the next item's depth
 * before deciding whether it belongs to the current level.
 */

import { ExhaustedError } from '../errors.js';

export class LookaheadSequence<T> {
  private readonly iterator: Iterator<T>;
  private peeked: IteratorResult<T> | null = null;

  constructor(source: Iterable<T>) {
    this.iterator = source[Symbol.iterator]();
  }

  /**
   * Look at the next item without consuming it. Repeated calls return the
   * same item; undefined once the source is drained.
   */
  peek(): T | undefined {
    if (this.peeked === null) {
      this.peeked = this.iterator.next();
    }
    return this.peeked.done ? undefined : this.peeked.value;
  }

  /**
   * Consume and return the next item.
   * Throws ExhaustedError when nothing is left.
   */
  advance(): T {
    const next = this.peeked ?? this.iterator.next();
    this.peeked = null;

    if (next.done) {
      // Keep the drained state so later peeks stay undefined
      this.peeked = next;
      throw new ExhaustedError();
    }
    return next.value;
  }

  /** Whether at least one more item is available */
  hasNext(): boolean {
    return this.peek() !== undefined;
  }
}
