import { describe, it, expect } from 'vitest';
import { computeErrorMetrics, convergence, estimateConvergenceOrder } from '../convergence';
import { reference } from '../reference';
import { createInterval } from '../domain';
import { isQuadratureError } from '../errors';
import { captureError, unit } from './helpers';
import type { ErrorSample, ReferenceValue } from '../../types';

const square = (x: number) => x * x;

describe('convergence', () => {
  describe('trapezoidal rule on x² over [0, 1]', () => {
    const analysis = convergence('trapezoidal', square, unit, [10, 20, 40, 80], 1 / 3);

    it('estimates order 2', () => {
      expect(analysis.order).not.toBeNull();
      expect(Math.abs((analysis.order ?? 0) - 2)).toBeLessThan(0.3);
      expect(analysis.order).toBeCloseTo(2, 6);
      expect(analysis.expectedOrder).toBe(2);
    });

    it('records one error sample per partition count', () => {
      expect(analysis.samples.map(s => s.partitionCount)).toEqual([10, 20, 40, 80]);
      expect(analysis.samples[0].stepSize).toBe(0.1);
      expect(analysis.samples[0].absoluteError).toBeCloseTo(1 / 600, 12);
      expect(analysis.samples[0].relativeError).toBeCloseTo(0.005, 10);
      expect(analysis.samples[3].absoluteError).toBeCloseTo(1 / 38400, 12);
    });

    it('fits error ≈ h²/6 with a perfect log-log line', () => {
      expect(analysis.fit?.logConstant).toBeCloseTo(Math.log(1 / 6), 6);
      expect(analysis.fit?.rSquared).toBeCloseTo(1, 6);
      expect(analysis.fit?.sampleCount).toBe(4);
    });

    it('reports a local order between consecutive samples', () => {
      expect(analysis.localOrders.map(o => [o.from, o.to])).toEqual([[10, 20], [20, 40], [40, 80]]);
      for (const local of analysis.localOrders) {
        expect(local.order).toBeCloseTo(2, 6);
      }
    });

    it('raises no warnings', () => {
      expect(analysis.warnings).toEqual([]);
      expect(analysis.errorFloor).toBe(1e-14);
      expect(analysis.reference).toBe(1 / 3);
    });
  });

  it('measures first order for the left Riemann sum', () => {
    const analysis = convergence('left-riemann', Math.exp, unit, [8, 16, 32, 64], Math.E - 1);
    expect(Math.abs((analysis.order ?? 0) - 1)).toBeLessThan(0.1);
  });

  it("measures fourth order for Simpson's rule", () => {
    const analysis = convergence('simpson', Math.exp, unit, [4, 8, 16, 32], Math.E - 1);
    expect(Math.abs((analysis.order ?? 0) - 4)).toBeLessThan(0.1);
    expect(analysis.expectedOrder).toBe(4);
  });

  it('accepts a numerical reference value object', () => {
    const interval = createInterval(0, Math.PI);
    const ref = reference(Math.sin, interval);
    const analysis = convergence('midpoint-riemann', Math.sin, interval, [8, 16, 32, 64], ref);
    expect(analysis.reference).toBe(ref.value);
    expect(Math.abs((analysis.order ?? 0) - 2)).toBeLessThan(0.3);
  });

  it('reports an undefined order when the rule is already exact', () => {
    const analysis = convergence('gaussian', x => x ** 3, unit, [2, 3, 4], 0.25);
    expect(analysis.order).toBeNull();
    expect(analysis.fit).toBeNull();
    expect(analysis.localOrders).toEqual([]);
    expect(analysis.expectedOrder).toBeNull();
    expect(analysis.samples).toHaveLength(3);
    expect(analysis.warnings).toEqual([
      'Excluded 3 of 3 samples with error below 1e-14 from the order fit',
      'Fewer than 2 samples above the error floor; convergence order is undefined'
    ]);
  });

  it('honours a custom error floor', () => {
    const analysis = convergence('trapezoidal', square, unit, [10, 20, 40], 1 / 3, { errorFloor: 1e-3 });
    expect(analysis.order).toBeNull();
    expect(analysis.errorFloor).toBe(0.001);
    expect(analysis.warnings[0]).toBe('Excluded 2 of 3 samples with error below 0.001 from the order fit');
  });

  it('warns when the observed order departs from the theoretical one', () => {
    // sin vanishes at both ends of [0, π], so the left sum coincides with the trapezoidal rule
    const analysis = convergence('left-riemann', Math.sin, createInterval(0, Math.PI), [8, 16, 32, 64], 2);
    expect(Math.abs((analysis.order ?? 0) - 2)).toBeLessThan(0.1);
    expect(analysis.warnings.some(w => w.includes('differs from the expected order 1'))).toBe(true);
  });

  describe('failures', () => {
    const invalidSequences: Array<[string, number[]]> = [
      ['an empty sequence', []],
      ['a repeated count', [10, 10]],
      ['a decreasing sequence', [20, 10]],
      ['a zero count', [0, 10]]
    ];

    it.each(invalidSequences)('rejects %s with InvalidPartitionCount', (_label, sequence) => {
      const error = captureError(() => convergence('trapezoidal', square, unit, sequence, 1 / 3));
      expect(isQuadratureError(error, 'InvalidPartitionCount')).toBe(true);
    });

    it("rejects odd counts for Simpson's rule", () => {
      const error = captureError(() => convergence('simpson', square, unit, [10, 15], 1 / 3));
      expect(isQuadratureError(error, 'InvalidPartitionCount')).toBe(true);
    });

    it('rejects an invalid interval', () => {
      const error = captureError(() => convergence('trapezoidal', square, { a: 5, b: 2 }, [10], 0));
      expect(isQuadratureError(error, 'InvalidDomain')).toBe(true);
    });

    it.each([Number.NaN, Number.POSITIVE_INFINITY])('rejects a reference of %s with NumericDomainError', value => {
      const error = captureError(() => convergence('trapezoidal', square, unit, [10, 20, 40], value));
      expect(isQuadratureError(error, 'NumericDomainError')).toBe(true);
      if (isQuadratureError(error)) {
        expect(error.details).toEqual({ reference: value });
      }
    });

    it('rejects a non-finite value inside a reference object', () => {
      const ref: ReferenceValue = {
        value: Number.NaN,
        source: 'numerical',
        method: 'gaussian',
        partitionCount: 64,
        warnings: []
      };
      const error = captureError(() => convergence('trapezoidal', square, unit, [10, 20], ref));
      expect(isQuadratureError(error, 'NumericDomainError')).toBe(true);
    });
  });
});

describe('estimateConvergenceOrder', () => {
  const sample = (partitionCount: number, absoluteError: number): ErrorSample => ({
    partitionCount,
    stepSize: 1 / partitionCount,
    approximation: 0,
    absoluteError,
    relativeError: null
  });

  it('returns the log-log slope', () => {
    const fit = estimateConvergenceOrder([sample(10, 0.01), sample(20, 0.0025)]);
    expect(fit.order).toBeCloseTo(2, 12);
    expect(fit.sampleCount).toBe(2);
  });

  it('skips samples below the floor', () => {
    const fit = estimateConvergenceOrder([sample(10, 0.01), sample(20, 0.0025), sample(40, 0)]);
    expect(fit.sampleCount).toBe(2);
  });

  it('fails with InsufficientSamples when fewer than two samples clear the floor', () => {
    const error = captureError(() => estimateConvergenceOrder([sample(10, 0.01), sample(20, 1e-16)]));
    expect(isQuadratureError(error, 'InsufficientSamples')).toBe(true);
    if (isQuadratureError(error)) {
      expect(error.details).toEqual({ validSamples: 1, errorFloor: 1e-14 });
    }
  });
});

describe('computeErrorMetrics', () => {
  it('returns absolute and relative error', () => {
    const { absoluteError, relativeError } = computeErrorMetrics(0.335, 1 / 3);
    expect(absoluteError).toBeCloseTo(1 / 600, 12);
    expect(relativeError).toBeCloseTo(0.005, 10);
  });

  it('leaves the relative error undefined for a zero reference', () => {
    expect(computeErrorMetrics(-0.5, 0)).toEqual({ absoluteError: 0.5, relativeError: null });
  });
});
