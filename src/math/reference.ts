import { resolveReferenceConfig } from '../lib/config';
import { assertInterval } from './domain';
import { nonFiniteReference } from './errors';
import { evaluate } from './integration';
import type { Integrand, Interval, ReferenceConfig, ReferenceValue } from '../types';

/**
 * Ground-truth value of ∫ₐᵇ f for error measurement.
 *
 * A caller-supplied exact value always wins and is reported as
 * source 'exact'. Without one, the configured high-order rule is run
 * (64-point Gauss-Legendre unless overridden) and the result is
 * reported as source 'numerical'.
 */
export const reference = (
  integrand: Integrand,
  interval: Interval,
  exactValue?: number,
  config: Partial<ReferenceConfig> = {}
): ReferenceValue => {
  assertInterval(interval);
  const warnings: string[] = [];

  if (exactValue !== undefined) {
    if (!Number.isFinite(exactValue)) {
      throw nonFiniteReference(exactValue);
    }
    return { value: exactValue, source: 'exact', method: null, partitionCount: null, warnings };
  }

  const { method, partitionCount } = resolveReferenceConfig(config);
  const result = evaluate(method, integrand, interval, partitionCount);

  if (method === 'gaussian' && partitionCount < 16) {
    warnings.push(
      `Reference uses only ${partitionCount} Gauss nodes; errors of high-order rules may be dominated by the reference itself`
    );
  }
  if (method === 'simpson' && partitionCount < 1000) {
    warnings.push(
      `Reference uses Simpson's rule with ${partitionCount} subintervals; its own truncation error may not be negligible`
    );
  }

  return {
    value: result.value,
    source: 'numerical',
    method,
    partitionCount,
    warnings
  };
};
