import { z } from 'zod';
import { invalidPartitionCount } from '../math/errors';
import type { ConvergenceConfig, QuadratureMethod, ReferenceConfig } from '../types';

export const QuadratureMethodSchema = z.enum([
  'left-riemann',
  'right-riemann',
  'midpoint-riemann',
  'trapezoidal',
  'simpson',
  'gaussian'
]);

export const ReferenceConfigSchema = z.object({
  method: z.enum(['gaussian', 'simpson']).default('gaussian'),
  partitionCount: z.number().int().positive().default(64)
});

export const ConvergenceConfigSchema = z.object({
  errorFloor: z.number().finite().nonnegative().default(1e-14)
});

export const createDefaultReferenceConfig = (): ReferenceConfig => ReferenceConfigSchema.parse({});

export const createDefaultConvergenceConfig = (): ConvergenceConfig => ConvergenceConfigSchema.parse({});

/**
 * Merges a partial override over the defaults. A bad partition count fails
 * with InvalidPartitionCount like any other; other bad settings throw ZodError.
 */
export const resolveReferenceConfig = (overrides: Partial<ReferenceConfig> = {}): ReferenceConfig => {
  const result = ReferenceConfigSchema.safeParse(overrides);
  if (result.success) return result.data;

  const issue = result.error.issues.find(i => i.path[0] === 'partitionCount');
  if (issue) {
    throw invalidPartitionCount(overrides.partitionCount ?? Number.NaN, issue.message, {
      setting: 'reference.partitionCount'
    });
  }
  throw result.error;
};

export const resolveConvergenceConfig = (overrides: Partial<ConvergenceConfig> = {}): ConvergenceConfig =>
  ConvergenceConfigSchema.parse(overrides);

/**
 * Validates a method identifier coming from outside the type system (a select box, a URL).
 * Returns null for anything that is not one of the six methods.
 */
export const parseMethod = (input: unknown): QuadratureMethod | null => {
  const result = QuadratureMethodSchema.safeParse(input);
  return result.success ? result.data : null;
};
