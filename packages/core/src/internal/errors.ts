import type { ContractCode } from './types';

/**
 * Thrown when a caller breaks a precondition: bad index, wrong handle state,
 * unbalanced use counts. A programming error, not something to recover from.
 */
export class ContractViolationError extends Error {
  constructor(
    public readonly code: ContractCode,
    message: string
  ) {
    super(`Contract violation [${code}]: ${message}`);
    this.name = 'ContractViolationError';
  }
}

/**
 * Thrown when the allocator cannot hand out the requested slots.
 * Fatal at this layer; nothing here retries.
 */
export class AllocationError extends Error {
  constructor(
    public readonly requested: number,
    public readonly available: number
  ) {
    super(`Allocation failed: requested ${requested} slots, ${available} available`);
    this.name = 'AllocationError';
  }
}
