/**
 * Error taxonomy for the quadrature core.
 *
 * Every failure carries a `kind` and a `details` record naming the
 * offending input.
 */

export type QuadratureErrorKind =
  | 'InvalidDomain'
  | 'InvalidPartitionCount'
  | 'NumericDomainError'
  | 'InsufficientSamples';

export class QuadratureError extends Error {
  readonly kind: QuadratureErrorKind;
  readonly details: Record<string, unknown>;

  constructor(
    kind: QuadratureErrorKind,
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'QuadratureError';
    this.kind = kind;
    this.details = details;
  }
}

export const isQuadratureError = (
  error: unknown,
  kind?: QuadratureErrorKind
): error is QuadratureError =>
  error instanceof QuadratureError && (kind === undefined || error.kind === kind);

export const invalidDomain = (a: number, b: number): QuadratureError =>
  new QuadratureError(
    'InvalidDomain',
    `Invalid interval [${a}, ${b}]: bounds must be finite with a < b`,
    { a, b }
  );

export const invalidPartitionCount = (
  n: number,
  reason: string,
  details: Record<string, unknown> = {}
): QuadratureError =>
  new QuadratureError(
    'InvalidPartitionCount',
    `Invalid partition count ${n}: ${reason}`,
    { n, ...details }
  );

export const numericDomainError = (
  x: number,
  value: number | null,
  cause?: unknown
): QuadratureError => {
  const reason = value === null
    ? `integrand threw${cause instanceof Error ? `: ${cause.message}` : ''}`
    : `integrand returned ${value}`;
  return new QuadratureError(
    'NumericDomainError',
    `Integrand is undefined at x = ${x} (${reason})`,
    { x, value },
    cause === undefined ? undefined : { cause }
  );
};

export const insufficientSamples = (validSamples: number, errorFloor: number): QuadratureError =>
  new QuadratureError(
    'InsufficientSamples',
    `Need at least 2 error samples above ${errorFloor} to estimate an order, got ${validSamples}`,
    { validSamples, errorFloor }
  );

export const nonFiniteReference = (reference: number): QuadratureError =>
  new QuadratureError(
    'NumericDomainError',
    `Reference value must be finite, got ${reference}`,
    { reference }
  );

export const sumOverflow = (method: string, n: number, value: number): QuadratureError =>
  new QuadratureError(
    'NumericDomainError',
    `Quadrature sum overflowed to ${value} (${method}, n = ${n}) although every sample was finite`,
    { method, n, value }
  );
