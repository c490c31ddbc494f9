/**
 * Internal modules barrel export
 */

// Constants
export { MAX_SLOTS, DEFAULT_CHECKS } from './constants';

// Errors
export { ContractViolationError, AllocationError } from './errors';

// Contract checks
export { check, enforce, checksEnabled, setChecksEnabled } from './contract';

// Allocator
export {
  createHeapAllocator,
  defaultAllocator,
  type HeapAllocator,
  type HeapAllocatorOptions,
} from './allocator';

// Config
export { configure, getConfig, type Config } from './config';

// Shared objects & handles
export { SharedObject, SharedHandle, CloneContext } from './shared-object';

// Backing store
export { SharedArrayObject, identityTraits } from './array-object';

// Types
export type { Slots, ElementTraits, Allocator, AllocatorStats, ContractCode } from './types';
