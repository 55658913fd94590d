/**
 * Public surface of the quadrature core.
 *
 * Presentation code should only call through here: evaluate, reference,
 * convergence and compare, plus the helpers that build their inputs.
 */

export { evaluate, QUADRATURE_METHODS, type QuadratureMethodInfo } from './math/integration';
export { reference } from './math/reference';
export { convergence, estimateConvergenceOrder, computeErrorMetrics } from './math/convergence';
export { compare } from './math/comparison';
export { createInterval } from './math/domain';
export { getGaussLegendreRule, type GaussLegendreRule } from './math/gauss-legendre';
export {
  QuadratureError,
  isQuadratureError,
  type QuadratureErrorKind
} from './math/errors';
export {
  createDefaultConvergenceConfig,
  createDefaultReferenceConfig,
  parseMethod
} from './lib/config';
export { parseIntegrand, exactIntegral, type ExpressionParseResult } from './lib/expression-parser';
export { doublingSequence, linearSequence } from './lib/sequences';
export type * from './types';
