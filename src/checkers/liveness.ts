import type { LivenessStatus } from '../types';

/** Reachable but gating access, or rejecting the probe's method */
const REACHABLE_CODES = new Set([401, 403, 405]);

/**
 * Map an HTTP status to a liveness verdict. Redirects count as up: the service answered.
 */
export function classifyStatus(status: number): Exclude<LivenessStatus, 'unknown'> {
  if (status >= 200 && status < 400) return 'up';
  if (REACHABLE_CODES.has(status)) return 'up';
  return 'down';
}
