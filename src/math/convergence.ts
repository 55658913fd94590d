/**
 * Error and convergence-order analysis.
 *
 * For an ascending sequence of partition counts, measures |Qₙ − I| against a
 * reference and fits error ≈ C·hᵖ by least squares on (ln h, ln error).
 * Samples below the error floor stay in the series but are left out of the
 * fit: once a rule hits rounding noise the log-log slope means nothing.
 */

import * as d3 from 'd3';
import { resolveConvergenceConfig } from '../lib/config';
import { assertInterval, assertPartitionCount, stepSize } from './domain';
import { insufficientSamples, invalidPartitionCount, nonFiniteReference } from './errors';
import { QUADRATURE_METHODS, evaluate } from './integration';
import type {
  ConvergenceAnalysis,
  ConvergenceConfig,
  ConvergenceFit,
  ErrorSample,
  Integrand,
  Interval,
  LocalOrder,
  QuadratureMethod,
  ReferenceValue
} from '../types';

// Observed orders further than this from the rule's theoretical order get a warning
const ORDER_DEVIATION_WARNING = 0.5;

const isAboveFloor = (sample: ErrorSample, errorFloor: number): boolean =>
  Number.isFinite(sample.absoluteError) && sample.absoluteError > 0 && sample.absoluteError >= errorFloor;

export const computeErrorMetrics = (
  approximation: number,
  referenceValue: number
): { absoluteError: number; relativeError: number | null } => {
  const absoluteError = Math.abs(approximation - referenceValue);
  const relativeError = referenceValue !== 0 ? absoluteError / Math.abs(referenceValue) : null;
  return { absoluteError, relativeError };
};

/**
 * Least-squares slope of ln(error) against ln(h).
 * Throws InsufficientSamples when fewer than two samples clear the floor.
 */
export const estimateConvergenceOrder = (
  samples: readonly ErrorSample[],
  errorFloor: number = 1e-14
): ConvergenceFit => {
  const points = samples
    .filter(s => isAboveFloor(s, errorFloor))
    .map(s => ({ x: Math.log(s.stepSize), y: Math.log(s.absoluteError) }));

  if (points.length < 2) {
    throw insufficientSamples(points.length, errorFloor);
  }

  const meanX = d3.mean(points, p => p.x) ?? 0;
  const meanY = d3.mean(points, p => p.y) ?? 0;

  let sxx = 0;
  let sxy = 0;
  let syy = 0;
  for (const p of points) {
    const dx = p.x - meanX;
    const dy = p.y - meanY;
    sxx += dx * dx;
    sxy += dx * dy;
    syy += dy * dy;
  }

  if (sxx === 0) {
    // Every sample has the same step size; no slope to fit
    throw insufficientSamples(1, errorFloor);
  }

  const slope = sxy / sxx;
  const intercept = meanY - slope * meanX;
  const residual = syy - slope * sxy;
  const rSquared = syy > 0 ? Math.max(0, 1 - residual / syy) : 1;

  return {
    order: slope,
    logConstant: intercept,
    rSquared,
    sampleCount: points.length
  };
};

const computeLocalOrders = (samples: ErrorSample[], errorFloor: number): LocalOrder[] => {
  const valid = samples.filter(s => isAboveFloor(s, errorFloor));
  return d3.pairs(valid, (coarse, fine) => ({
    from: coarse.partitionCount,
    to: fine.partitionCount,
    order: Math.log(coarse.absoluteError / fine.absoluteError) /
      Math.log(coarse.stepSize / fine.stepSize)
  }));
};

const assertAscendingSequence = (nSequence: readonly number[], method: QuadratureMethod): void => {
  if (nSequence.length === 0) {
    throw invalidPartitionCount(Number.NaN, 'partition sequence is empty', { method });
  }
  nSequence.forEach((n, i) => {
    assertPartitionCount(n, method);
    if (i > 0 && n <= nSequence[i - 1]) {
      throw invalidPartitionCount(n, `sequence must be strictly increasing (follows ${nSequence[i - 1]})`, {
        method,
        index: i
      });
    }
  });
};

/**
 * Runs a method over an ascending partition sequence and measures its error
 * against the reference. The order is null, not an error, when the method is
 * already exact (every sample below the floor) or only one sample remains.
 */
export const convergence = (
  method: QuadratureMethod,
  integrand: Integrand,
  interval: Interval,
  nSequence: readonly number[],
  reference: ReferenceValue | number,
  config: Partial<ConvergenceConfig> = {}
): ConvergenceAnalysis => {
  assertInterval(interval);
  assertAscendingSequence(nSequence, method);
  const { errorFloor } = resolveConvergenceConfig(config);
  const referenceValue = typeof reference === 'number' ? reference : reference.value;
  if (!Number.isFinite(referenceValue)) {
    throw nonFiniteReference(referenceValue);
  }
  const warnings: string[] = [];

  const samples: ErrorSample[] = nSequence.map(n => {
    const approximation = evaluate(method, integrand, interval, n).value;
    return {
      partitionCount: n,
      stepSize: stepSize(interval, n),
      approximation,
      ...computeErrorMetrics(approximation, referenceValue)
    };
  });

  const validCount = samples.filter(s => isAboveFloor(s, errorFloor)).length;
  const excluded = samples.length - validCount;
  if (excluded > 0) {
    warnings.push(
      `Excluded ${excluded} of ${samples.length} samples with error below ${errorFloor} from the order fit`
    );
  }

  const expectedOrder = QUADRATURE_METHODS[method].expectedOrder;
  let fit: ConvergenceFit | null = null;

  if (validCount >= 2) {
    fit = estimateConvergenceOrder(samples, errorFloor);
    if (expectedOrder !== null && Math.abs(fit.order - expectedOrder) > ORDER_DEVIATION_WARNING) {
      warnings.push(
        `Observed order ${fit.order.toFixed(2)} differs from the expected order ${expectedOrder} ` +
        '(integrand may lack smoothness, or the reference may be inaccurate)'
      );
    }
  } else {
    warnings.push('Fewer than 2 samples above the error floor; convergence order is undefined');
  }

  return {
    method,
    reference: referenceValue,
    samples,
    order: fit ? fit.order : null,
    fit,
    localOrders: computeLocalOrders(samples, errorFloor),
    expectedOrder,
    errorFloor,
    warnings
  };
};
