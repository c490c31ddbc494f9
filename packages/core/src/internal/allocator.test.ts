/**
 * Tests for the heap allocator
 */

import { describe, it, expect, afterEach } from 'vitest';
import { createHeapAllocator, defaultAllocator } from './allocator';
import { MAX_SLOTS } from './constants';
import { checksEnabled, setChecksEnabled } from './contract';
import { AllocationError, ContractViolationError } from './errors';

describe('createHeapAllocator', () => {
  const initialChecks = checksEnabled();

  afterEach(() => {
    setChecksEnabled(initialChecks);
  });

  it('should hand out buffers of holes', () => {
    const heap = createHeapAllocator();
    const slots = heap.allocate<number>(3);

    expect(slots.length).toBe(3);
    expect(0 in slots).toBe(false);
    expect(2 in slots).toBe(false);
  });

  it('should track allocations and frees', () => {
    const heap = createHeapAllocator();
    const a = heap.allocate<number>(3);
    heap.allocate<number>(5);

    expect(heap.stats()).toEqual({ allocations: 2, frees: 0, liveBuffers: 2, liveSlots: 8 });

    heap.free(a);

    expect(heap.stats()).toEqual({ allocations: 2, frees: 1, liveBuffers: 1, liveSlots: 5 });
  });

  it('should free the size it allocated even if the buffer grew', () => {
    const heap = createHeapAllocator({ maxSlots: 4 });
    const slots = heap.allocate<number>(2);
    slots[5] = 1;

    heap.free(slots);

    expect(heap.stats()).toEqual({ allocations: 1, frees: 1, liveBuffers: 0, liveSlots: 0 });
    expect(() => heap.allocate<number>(5)).toThrow(AllocationError);
    expect(heap.allocate<number>(4).length).toBe(4);
  });

  it('should be unbounded unless asked otherwise', () => {
    expect(createHeapAllocator().capacity).toBe(MAX_SLOTS);
    expect(createHeapAllocator({ maxSlots: 10 }).capacity).toBe(10);
    expect(defaultAllocator.capacity).toBe(MAX_SLOTS);
  });

  it('should refuse requests beyond capacity', () => {
    const heap = createHeapAllocator({ maxSlots: 10 });
    const a = heap.allocate<number>(6);

    let error: unknown;
    try {
      heap.allocate<number>(5);
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(AllocationError);
    expect(error).toMatchObject({ requested: 5, available: 4, name: 'AllocationError' });

    heap.free(a);
    expect(heap.allocate<number>(10).length).toBe(10);
  });

  it('should reject buffers it does not own', () => {
    const heap = createHeapAllocator();
    const other = createHeapAllocator().allocate<number>(2);
    const own = heap.allocate<number>(1);
    heap.free(own);

    expect(() => heap.free(other)).toThrow(ContractViolationError);
    expect(() => heap.free(own)).toThrow(ContractViolationError);
    expect(heap.stats().frees).toBe(1);
  });

  it('should ignore foreign buffers when checks are off', () => {
    setChecksEnabled(false);
    const heap = createHeapAllocator();
    heap.allocate<number>(1);

    heap.free([1, 2]);

    expect(heap.stats()).toEqual({ allocations: 1, frees: 0, liveBuffers: 1, liveSlots: 1 });
  });
});
