/**
 * Process-wide defaults: contract checks and the allocator new stores use
 */

import { defaultAllocator } from './allocator';
import { checksEnabled, setChecksEnabled } from './contract';
import type { Allocator } from './types';

export interface Config {
  checks: boolean;
  allocator: Allocator;
}

let allocator: Allocator = defaultAllocator;

export function getConfig(): Config {
  return { checks: checksEnabled(), allocator };
}

/**
 * Override defaults. Returns the previous settings so callers can restore them.
 */
export function configure(options: Partial<Config>): Config {
  const previous = getConfig();
  if (options.checks !== undefined) setChecksEnabled(options.checks);
  if (options.allocator !== undefined) allocator = options.allocator;
  return previous;
}
