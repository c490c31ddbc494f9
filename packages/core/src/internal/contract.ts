/**
 * Contract checks
 *
 * check()   → skipped when checks are disabled (production builds)
 * enforce() → always on; guards use counts and narrows handle state
 */

import { DEFAULT_CHECKS } from './constants';
import { ContractViolationError } from './errors';
import type { ContractCode } from './types';

let enabled = DEFAULT_CHECKS;

export function checksEnabled(): boolean {
  return enabled;
}

export function setChecksEnabled(value: boolean): void {
  enabled = value;
}

export function check(condition: boolean, code: ContractCode, message: () => string): void {
  if (enabled && !condition) {
    throw new ContractViolationError(code, message());
  }
}

export function enforce(condition: boolean, code: ContractCode, message: () => string): asserts condition {
  if (!condition) {
    throw new ContractViolationError(code, message());
  }
}
