/**
 * SharedArrayObject - fixed-length slot buffer behind a SharedArray
 */

import { check, checksEnabled } from './contract';
import { getConfig } from './config';
import { SharedObject } from './shared-object';
import type { Allocator, ElementTraits, Slots } from './types';

// Values and references are copied as they are
export const identityTraits = {
  copy<T>(value: T): T {
    return value;
  },
};

export class SharedArrayObject<T> extends SharedObject<SharedArrayObject<T>> {
  private readonly slots: Slots<T>;
  private readonly n: number;

  constructor(
    count: number,
    readonly traits: ElementTraits<T> = identityTraits,
    readonly allocator: Allocator = getConfig().allocator
  ) {
    super();
    check(Number.isInteger(count) && count >= 0, 'INVALID_COUNT', () => `invalid element count ${count}`);
    this.n = count;
    this.slots = count > 0 ? allocator.allocate<T>(count) : [];
  }

  get length(): number {
    return this.n;
  }

  /** Whether slot `index` holds a value. */
  has(index: number): boolean {
    this.checkIndex(index);
    return index in this.slots;
  }

  get(index: number): T {
    this.checkIndex(index);
    check(index in this.slots, 'UNINITIALIZED_SLOT', () => `slot ${index} was read before it was assigned`);
    return this.slots[index];
  }

  /**
   * Store `value` at `index`. The store owns the value from here on: a value
   * it replaces is destroyed.
   */
  set(index: number, value: T): void {
    this.checkIndex(index);
    const { slots } = this;
    if (index in slots) {
      const prev = slots[index];
      if (prev !== value) this.traits.destroy?.(prev);
    }
    slots[index] = value;
  }

  copy(): SharedArrayObject<T> {
    const o = new SharedArrayObject<T>(this.n, this.traits, this.allocator);
    const { slots, traits } = this;
    try {
      for (let i = this.n; i--; ) {
        if (i in slots) o.slots[i] = traits.copy(slots[i]);
      }
    } catch (err) {
      try {
        o.teardown();
      } finally {
        // The copy failure is what the caller sees
        throw err;
      }
    }
    return o;
  }

  protected destroy(): void {
    this.teardown();
  }

  private teardown(): void {
    if (this.n === 0) return;
    const { slots, traits } = this;
    try {
      if (traits.destroy) {
        for (let i = this.n; i--; ) {
          if (i in slots) traits.destroy(slots[i]);
        }
      }
    } finally {
      this.allocator.free(slots);
    }
  }

  private checkIndex(index: number): void {
    if (!checksEnabled()) return;
    check(
      Number.isInteger(index) && index >= 0 && index < this.n,
      'INDEX_OUT_OF_RANGE',
      () => `index ${index} outside [0, ${this.n})`
    );
  }
}
