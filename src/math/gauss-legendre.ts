/**
 * Gauss-Legendre nodes and weights on the reference interval [-1, 1].
 *
 * Nodes are the roots of Pₙ, located by Newton iteration from the
 * Chebyshev-like guess cos(π(i − ¼)/(n + ½)); weights are
 * 2 / ((1 − ξ²)·Pₙ′(ξ)²). Tables are frozen; those up to 64 nodes are cached.
 */

import { assertPartitionCount } from './domain';

export interface GaussLegendreRule {
  nodes: readonly number[];     // Ascending, symmetric about 0
  weights: readonly number[];   // Positive, summing to 2
  order: number;                // Node count n; exact for degree ≤ 2n − 1
}

const NEWTON_TOLERANCE = 1e-15;
const NEWTON_MAX_ITERATIONS = 100;
// Rules above this size are rebuilt on every call
export const MAX_CACHED_NODES = 64;

const ruleCache = new Map<number, GaussLegendreRule>();

/**
 * Evaluates Pₙ(x) and Pₙ′(x) with the three-term recurrence
 * (k + 1)Pₖ₊₁ = (2k + 1)xPₖ − kPₖ₋₁.
 */
export const legendre = (n: number, x: number): { value: number; derivative: number } => {
  if (n === 0) return { value: 1, derivative: 0 };

  let previous = 1;
  let current = x;
  for (let k = 1; k < n; k++) {
    const next = ((2 * k + 1) * x * current - k * previous) / (k + 1);
    previous = current;
    current = next;
  }

  // Pₙ′ = n(xPₙ − Pₙ₋₁)/(x² − 1), with the closed form n(n + 1)/2 · (±1)ⁿ⁺¹ at the endpoints
  const derivative = Math.abs(x) === 1
    ? (x > 0 ? 1 : (n % 2 === 0 ? -1 : 1)) * n * (n + 1) / 2
    : n * (x * current - previous) / (x * x - 1);

  return { value: current, derivative };
};

const computeRule = (n: number): GaussLegendreRule => {
  const nodes = new Array<number>(n);
  const weights = new Array<number>(n);
  const half = Math.floor((n + 1) / 2);

  for (let i = 1; i <= half; i++) {
    let x = Math.cos(Math.PI * (i - 0.25) / (n + 0.5));
    for (let iteration = 0; iteration < NEWTON_MAX_ITERATIONS; iteration++) {
      const p = legendre(n, x);
      const dx = p.value / p.derivative;
      x -= dx;
      if (Math.abs(dx) < NEWTON_TOLERANCE) break;
    }
    const { derivative } = legendre(n, x);

    const weight = 2 / ((1 - x * x) * derivative * derivative);

    // Guesses run from the largest root down; fill both ends symmetrically
    nodes[n - i] = x;
    nodes[i - 1] = -x;
    weights[n - i] = weight;
    weights[i - 1] = weight;
  }

  // Odd n has a root at exactly 0
  if (n % 2 === 1) {
    nodes[half - 1] = 0;
  }

  return {
    nodes: Object.freeze(nodes),
    weights: Object.freeze(weights),
    order: n
  };
};

/**
 * Returns the n-point rule, computing it on first use and caching it
 * for n ≤ MAX_CACHED_NODES.
 */
export const getGaussLegendreRule = (n: number): GaussLegendreRule => {
  assertPartitionCount(n, 'gaussian');

  const cached = ruleCache.get(n);
  if (cached) return cached;

  const rule = Object.freeze(computeRule(n));
  if (n <= MAX_CACHED_NODES) {
    ruleCache.set(n, rule);
  }
  return rule;
};
