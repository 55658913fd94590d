/** Real-valued function of one real variable. */
export type Integrand = (x: number) => number;

export interface Interval {
  readonly a: number;         // Lower bound
  readonly b: number;         // Upper bound, strictly greater than a
}

export type QuadratureMethod =
  | 'left-riemann'
  | 'right-riemann'
  | 'midpoint-riemann'
  | 'trapezoidal'
  | 'simpson'
  | 'gaussian';

export interface DataPoint2D {
  x: number;
  y: number;
}

export interface QuadratureResult {
  readonly value: number;                  // Approximate integral
  readonly method: QuadratureMethod;
  readonly partitionCount: number;         // Subintervals, or nodes for 'gaussian'
  readonly interval: Interval;
  readonly evaluations: number;            // Integrand calls made for this result
  readonly nodes: readonly DataPoint2D[];  // Sample points in evaluation order (for plotting)
}

export interface ReferenceValue {
  value: number;
  source: 'exact' | 'numerical';   // 'exact' only when the caller supplied the value
  method: QuadratureMethod | null; // Rule used for a numerical reference
  partitionCount: number | null;
  warnings: string[];
}

export interface ErrorSample {
  partitionCount: number;
  stepSize: number;               // h = (b − a) / n
  approximation: number;
  absoluteError: number;          // |approximation − reference|
  relativeError: number | null;   // absoluteError / |reference|, null when reference is 0
}

export interface ConvergenceFit {
  order: number;          // p in error ≈ C·hᵖ
  logConstant: number;    // ln C
  rSquared: number;       // Goodness of the log-log fit (1 when the points are collinear)
  sampleCount: number;    // Samples above the error floor used in the fit
}

export interface LocalOrder {
  from: number;           // Partition count of the coarser sample
  to: number;             // Partition count of the finer sample
  order: number;
}

export interface ConvergenceAnalysis {
  method: QuadratureMethod;
  reference: number;
  samples: ErrorSample[];        // Ordered by ascending partition count
  order: number | null;          // null when fewer than 2 samples clear the floor
  fit: ConvergenceFit | null;
  localOrders: LocalOrder[];
  expectedOrder: number | null;  // Theoretical order of the rule, null for Gaussian
  errorFloor: number;
  warnings: string[];
}

export interface QuadratureComparison {
  first: QuadratureResult;
  second: QuadratureResult;
  difference: number;            // second.value − first.value
}

export interface ReferenceConfig {
  method: 'gaussian' | 'simpson';  // Rule used when no exact value is supplied
  partitionCount: number;          // Nodes (gaussian) or subintervals (simpson, must be even)
}

export interface ConvergenceConfig {
  errorFloor: number;              // Errors below this are excluded from the order fit (default 1e-14)
}
