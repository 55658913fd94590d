/**
 * Composite quadrature rules over a continuous integrand.
 *
 * Every rule partitions [a, b] into n equal subintervals (or uses n Gauss
 * nodes), samples the integrand once per node and sums left to right in
 * node order, so results are bit-for-bit reproducible.
 */

import { assertInterval, assertPartitionCount, stepSize } from './domain';
import { numericDomainError, sumOverflow } from './errors';
import { getGaussLegendreRule } from './gauss-legendre';
import type { DataPoint2D, Integrand, Interval, QuadratureMethod, QuadratureResult } from '../types';

export interface RuleOutput {
  value: number;
  nodes: DataPoint2D[];
}

export type QuadratureRule = (f: Integrand, interval: Interval, n: number) => RuleOutput;

/**
 * Evaluates f at x, turning a throw or a non-finite return into a
 * NumericDomainError that names the sample point.
 */
export const sampleIntegrand = (f: Integrand, x: number): number => {
  let y: number;
  try {
    y = f(x);
  } catch (error) {
    throw numericDomainError(x, null, error);
  }
  if (typeof y !== 'number' || !Number.isFinite(y)) {
    throw numericDomainError(x, typeof y === 'number' ? y : Number.NaN);
  }
  return y;
};

// Endpoint i = n is pinned to b so a + n·h rounding never leaves the interval
const gridPoint = (interval: Interval, h: number, i: number, n: number): number =>
  i === n ? interval.b : interval.a + i * h;

const riemannSum = (
  f: Integrand,
  interval: Interval,
  n: number,
  position: 'left' | 'right' | 'midpoint'
): RuleOutput => {
  const h = stepSize(interval, n);
  const nodes: DataPoint2D[] = [];
  let sum = 0;

  for (let i = 0; i < n; i++) {
    const x = position === 'left'
      ? gridPoint(interval, h, i, n)
      : position === 'right'
        ? gridPoint(interval, h, i + 1, n)
        : interval.a + (i + 0.5) * h;
    const y = sampleIntegrand(f, x);
    nodes.push({ x, y });
    sum += y;
  }

  return { value: sum * h, nodes };
};

export const leftRiemann: QuadratureRule = (f, interval, n) => riemannSum(f, interval, n, 'left');

export const rightRiemann: QuadratureRule = (f, interval, n) => riemannSum(f, interval, n, 'right');

export const midpointRiemann: QuadratureRule = (f, interval, n) => riemannSum(f, interval, n, 'midpoint');

/**
 * Trapezoidal rule: (h/2)·[f(x₀) + 2Σ f(xᵢ) + f(xₙ)].
 */
export const trapezoidal: QuadratureRule = (f, interval, n) => {
  const h = stepSize(interval, n);
  const nodes: DataPoint2D[] = [];
  let interior = 0;
  let ends = 0;

  for (let i = 0; i <= n; i++) {
    const x = gridPoint(interval, h, i, n);
    const y = sampleIntegrand(f, x);
    nodes.push({ x, y });
    if (i === 0 || i === n) {
      ends += y;
    } else {
      interior += y;
    }
  }

  return { value: (h / 2) * (ends + 2 * interior), nodes };
};

/**
 * Simpson's 1/3 rule: (h/3)·[f(x₀) + 4Σ odd + 2Σ even interior + f(xₙ)].
 * n must be even; callers go through assertPartitionCount first.
 */
export const simpson: QuadratureRule = (f, interval, n) => {
  const h = stepSize(interval, n);
  const nodes: DataPoint2D[] = [];
  let odd = 0;
  let evenInterior = 0;
  let ends = 0;

  for (let i = 0; i <= n; i++) {
    const x = gridPoint(interval, h, i, n);
    const y = sampleIntegrand(f, x);
    nodes.push({ x, y });
    if (i === 0 || i === n) {
      ends += y;
    } else if (i % 2 === 1) {
      odd += y;
    } else {
      evenInterior += y;
    }
  }

  return { value: (h / 3) * (ends + 4 * odd + 2 * evenInterior), nodes };
};

/**
 * n-point Gauss-Legendre quadrature mapped from [-1, 1] onto [a, b].
 */
export const gaussian: QuadratureRule = (f, interval, n) => {
  const { nodes: reference, weights } = getGaussLegendreRule(n);
  const halfWidth = (interval.b - interval.a) / 2;
  const center = (interval.a + interval.b) / 2;
  const nodes: DataPoint2D[] = [];
  let sum = 0;

  for (let i = 0; i < n; i++) {
    const x = halfWidth * reference[i] + center;
    const y = sampleIntegrand(f, x);
    nodes.push({ x, y });
    sum += weights[i] * y;
  }

  return { value: halfWidth * sum, nodes };
};

export interface QuadratureMethodInfo {
  label: string;
  expectedOrder: number | null;   // Algebraic order in h; null when convergence is not algebraic
  rule: QuadratureRule;
}

export const QUADRATURE_METHODS: Record<QuadratureMethod, QuadratureMethodInfo> = {
  'left-riemann': { label: 'Left Riemann sum', expectedOrder: 1, rule: leftRiemann },
  'right-riemann': { label: 'Right Riemann sum', expectedOrder: 1, rule: rightRiemann },
  'midpoint-riemann': { label: 'Midpoint Riemann sum', expectedOrder: 2, rule: midpointRiemann },
  'trapezoidal': { label: 'Trapezoidal rule', expectedOrder: 2, rule: trapezoidal },
  'simpson': { label: "Simpson's rule", expectedOrder: 4, rule: simpson },
  'gaussian': { label: 'Gauss-Legendre quadrature', expectedOrder: null, rule: gaussian }
};

/**
 * Single entry point for one quadrature evaluation.
 * Validates the interval and partition count, then dispatches on method.
 */
export const evaluate = (
  method: QuadratureMethod,
  integrand: Integrand,
  interval: Interval,
  n: number
): QuadratureResult => {
  assertInterval(interval);
  assertPartitionCount(n, method);

  const { value, nodes } = QUADRATURE_METHODS[method].rule(integrand, interval, n);
  if (!Number.isFinite(value)) {
    throw sumOverflow(method, n, value);
  }

  return Object.freeze({
    value,
    method,
    partitionCount: n,
    interval: Object.freeze({ a: interval.a, b: interval.b }),
    evaluations: nodes.length,
    nodes: Object.freeze(nodes)
  });
};
