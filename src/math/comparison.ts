import { assertInterval, assertPartitionCount } from './domain';
import { evaluate } from './integration';
import type { Integrand, Interval, QuadratureComparison, QuadratureMethod } from '../types';

/**
 * Runs two methods on the same integrand, interval and n for overlay display.
 * Both partition counts are validated before either rule samples the integrand.
 */
export const compare = (
  methodA: QuadratureMethod,
  methodB: QuadratureMethod,
  integrand: Integrand,
  interval: Interval,
  n: number
): QuadratureComparison => {
  assertInterval(interval);
  assertPartitionCount(n, methodA);
  assertPartitionCount(n, methodB);

  const bounds: Interval = Object.freeze({ a: interval.a, b: interval.b });
  const first = evaluate(methodA, integrand, bounds, n);
  const second = evaluate(methodB, integrand, bounds, n);

  return { first, second, difference: second.value - first.value };
};
