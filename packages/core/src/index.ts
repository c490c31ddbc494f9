/**
 * sharray – reference-counted shared arrays
 *
 * - new SharedArray(n)      → handle on a fresh store of n slots
 * - new SharedArray(other)  → second handle on other's store (shared, not copied)
 * - handle.deepCopy()       → handle on an independent copy
 * - handle.release()        → drop a use; the last one frees the store
 *
 * Sharing is never broken behind the caller's back: a write through one
 * handle shows through every handle on the same store.
 */

import {
  SharedArrayObject,
  SharedHandle,
  type Allocator,
  type ElementTraits,
} from './internal';

export {
  ContractViolationError,
  AllocationError,
  createHeapAllocator,
  defaultAllocator,
  configure,
  getConfig,
  SharedObject,
  SharedHandle,
  CloneContext,
  SharedArrayObject,
  identityTraits,
  type HeapAllocator,
  type HeapAllocatorOptions,
  type Config,
  type Slots,
  type ElementTraits,
  type Allocator,
  type AllocatorStats,
  type ContractCode,
} from './internal';

// =====================================================
// SharedArray
// =====================================================

export interface SharedArrayOptions<T> {
  traits?: ElementTraits<T>;
  allocator?: Allocator;
}

export class SharedArray<T> extends SharedHandle<SharedArrayObject<T>> implements Iterable<T> {
  /** Uninitialized; call init() or assign() before use. */
  constructor();
  /** Bound to a fresh store of `count` unassigned slots. */
  constructor(count: number, options?: SharedArrayOptions<T>);
  /** Shares `source`'s store (or stays uninitialized along with it). */
  constructor(source: SharedArray<T>);
  constructor(source?: number | SharedArray<T>, options: SharedArrayOptions<T> = {}) {
    super();
    if (typeof source === 'number') {
      this.init(source, options);
    } else if (source !== undefined) {
      this.assign(source);
    }
  }

  static from<T>(source: SharedArray<T>): SharedArray<T> {
    return new SharedArray(source);
  }

  /**
   * Handle on a fresh store holding `values` in order.
   */
  static fromArray<T>(values: readonly T[], options: SharedArrayOptions<T> = {}): SharedArray<T> {
    const arr = new SharedArray<T>(values.length, options);
    values.forEach((value, i) => arr.set(i, value));
    return arr;
  }

  /**
   * Bind to a fresh store. One-time: the handle must not be bound yet.
   */
  init(count: number, options: SharedArrayOptions<T> = {}): this {
    this.unbound();
    this.bind(new SharedArrayObject<T>(count, options.traits, options.allocator));
    return this;
  }

  get length(): number {
    return this.object().length;
  }

  has(index: number): boolean {
    return this.object().has(index);
  }

  get(index: number): T {
    return this.object().get(index);
  }

  set(index: number, value: T): this {
    this.object().set(index, value);
    return this;
  }

  /**
   * New handle on an independent copy of this store.
   */
  deepCopy(): SharedArray<T> {
    const copy = new SharedArray<T>();
    copy.bind(this.object().copy());
    return copy;
  }

  toArray(): T[] {
    const o = this.object();
    const out = new Array<T>(o.length);
    for (let i = 0; i < o.length; i++) out[i] = o.get(i);
    return out;
  }

  *[Symbol.iterator](): IterableIterator<T> {
    const o = this.object();
    for (let i = 0; i < o.length; i++) yield o.get(i);
  }
}

/**
 * Traits for arrays whose elements are themselves shared arrays: copying an
 * element shares its store, destroying one releases it.
 */
export function sharedArrayTraits<T>(): ElementTraits<SharedArray<T>> {
  return {
    copy: (value) => new SharedArray(value),
    destroy: (value) => value.release(),
  };
}
