/**
 * Core constants for sharray
 */

// Longest length a JS array can hold
export const MAX_SLOTS = 2 ** 32 - 1;

// Contract checks stay on outside production builds
export const DEFAULT_CHECKS = process.env.NODE_ENV !== 'production';
