import { invalidDomain, invalidPartitionCount } from './errors';
import type { Interval, QuadratureMethod } from '../types';

/**
 * Builds a frozen interval, rejecting a ≥ b and non-finite bounds.
 */
export const createInterval = (a: number, b: number): Interval => {
  assertInterval({ a, b });
  return Object.freeze({ a, b });
};

export const assertInterval = (interval: Interval): void => {
  const { a, b } = interval;
  if (!Number.isFinite(a) || !Number.isFinite(b) || a >= b) {
    throw invalidDomain(a, b);
  }
};

/**
 * Checks n ≥ 1 and integral. Simpson additionally needs an even count:
 * odd n is rejected, never bumped to n + 1.
 */
export const assertPartitionCount = (n: number, method?: QuadratureMethod): void => {
  if (!Number.isInteger(n)) {
    throw invalidPartitionCount(n, 'must be an integer', { method });
  }
  if (n < 1) {
    throw invalidPartitionCount(n, 'must be at least 1', { method });
  }
  if (method === 'simpson' && n % 2 !== 0) {
    throw invalidPartitionCount(n, "Simpson's rule requires an even number of subintervals", { method });
  }
};

export const stepSize = (interval: Interval, n: number): number =>
  (interval.b - interval.a) / n;
