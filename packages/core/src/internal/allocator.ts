/**
 * Heap allocator - hands out raw slot buffers and keeps usage counters
 *
 * Buffers come back as arrays of holes: nothing is value-initialized.
 */

import { MAX_SLOTS } from './constants';
import { check } from './contract';
import { AllocationError } from './errors';
import type { Allocator, AllocatorStats, Slots } from './types';

export interface HeapAllocatorOptions {
  /** Upper bound on live slots across all buffers. Unbounded by default. */
  maxSlots?: number;
}

export interface HeapAllocator extends Allocator {
  readonly capacity: number;
  stats(): AllocatorStats;
}

export function createHeapAllocator(options: HeapAllocatorOptions = {}): HeapAllocator {
  const capacity = Math.min(options.maxSlots ?? MAX_SLOTS, MAX_SLOTS);
  // Live buffer → slots it was allocated with
  const live = new WeakMap<object, number>();
  let allocations = 0;
  let frees = 0;
  let liveBuffers = 0;
  let liveSlots = 0;

  return {
    capacity,

    allocate<T>(count: number): Slots<T> {
      const available = capacity - liveSlots;
      if (count > available) {
        throw new AllocationError(count, available);
      }
      const slots = new Array<T>(count);
      live.set(slots, count);
      allocations++;
      liveBuffers++;
      liveSlots += count;
      return slots;
    },

    free<T>(slots: Slots<T>): void {
      const size = live.get(slots);
      check(size !== undefined, 'FOREIGN_BUFFER', () => `buffer of length ${slots.length} was not allocated here or is already free`);
      if (size === undefined) return;
      live.delete(slots);
      frees++;
      liveBuffers--;
      liveSlots -= size;
    },

    stats(): AllocatorStats {
      return { allocations, frees, liveBuffers, liveSlots };
    },
  };
}

export const defaultAllocator: HeapAllocator = createHeapAllocator();
