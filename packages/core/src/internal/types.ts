/**
 * Core type definitions
 */

// Raw slot buffer; unassigned slots are holes
export type Slots<T> = T[];

// Per-array element behavior used by deep copy and teardown
export interface ElementTraits<T> {
  copy(value: T): T;
  destroy?(value: T): void;
}

// Host memory boundary: raw buffers in, raw buffers out
export interface Allocator {
  allocate<T>(count: number): Slots<T>;
  free<T>(slots: Slots<T>): void;
}

export interface AllocatorStats {
  allocations: number;
  frees: number;
  liveBuffers: number;
  liveSlots: number;
}

export type ContractCode =
  | 'INVALID_COUNT'
  | 'INDEX_OUT_OF_RANGE'
  | 'UNINITIALIZED_SLOT'
  | 'UNINITIALIZED_HANDLE'
  | 'ALREADY_INITIALIZED'
  | 'RELEASED_HANDLE'
  | 'USE_COUNT_UNDERFLOW'
  | 'FOREIGN_BUFFER'
  | 'CLOSED_CONTEXT';
