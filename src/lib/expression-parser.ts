import nerdamer from 'nerdamer';
import 'nerdamer/Algebra.js';
import 'nerdamer/Calculus.js';
import { assertInterval } from '../math/domain';
import type { Integrand, Interval } from '../types';

export interface ExpressionParseResult {
  integrand: Integrand | null;
  expression: string;                       // Right-hand side as typed
  antiderivative: Integrand | null;         // F with F′ = f, when a closed form exists
  antiderivativeExpression: string | null;  // F as text, e.g. "(1/3)*x^3"
  error: string | null;
  warnings: string[];
}

const VARIABLE = 'x';

const failure = (expression: string, error: string, warnings: string[]): ExpressionParseResult => ({
  integrand: null,
  expression,
  antiderivative: null,
  antiderivativeExpression: null,
  error,
  warnings
});

const integrateSymbolically = (
  parsed: nerdamer.Expression,
  warnings: string[]
): { antiderivative: Integrand | null; antiderivativeExpression: string | null } => {
  try {
    const primitive = nerdamer.integrate(parsed, VARIABLE);
    const text = primitive.text();
    // nerdamer hands back the integral unevaluated when it finds no closed form
    if (text.includes('integrate')) {
      warnings.push('No closed-form antiderivative; use a numerical reference');
      return { antiderivative: null, antiderivativeExpression: null };
    }
    return { antiderivative: primitive.buildFunction([VARIABLE]), antiderivativeExpression: text };
  } catch (error) {
    if (!(error instanceof Error)) throw error;
    warnings.push(`No closed-form antiderivative (${error.message}); use a numerical reference`);
    return { antiderivative: null, antiderivativeExpression: null };
  }
};

/**
 * Parses a typed formula such as "x^2", "f(x) = sin(x) * exp(-x)" or
 * "x**3 - 2*x" into an integrand, and integrates it symbolically where
 * possible. Syntax problems come back in `error`; nothing is thrown for
 * bad input.
 */
export const parseIntegrand = (source: string): ExpressionParseResult => {
  const warnings: string[] = [];
  let expression = source.trim();

  // Accept an "f(x) =" / "y =" prefix
  const equalsIndex = expression.indexOf('=');
  if (equalsIndex !== -1) {
    const prefix = expression.slice(0, equalsIndex).trim();
    expression = expression.slice(equalsIndex + 1).trim();
    if (prefix) {
      warnings.push(`Ignored left-hand side '${prefix}'`);
    }
  }

  if (!expression) {
    return failure(expression, 'Expression is empty', warnings);
  }

  let parsed: nerdamer.Expression;
  try {
    parsed = nerdamer(expression.replace(/\*\*/g, '^'));
  } catch (error) {
    if (!(error instanceof Error)) throw error;
    return failure(expression, error.message, warnings);
  }

  const variables = parsed.variables();
  const unknown = variables.filter(v => v !== VARIABLE);
  if (unknown.length > 0) {
    return failure(expression, `Unknown variable '${unknown[0]}'; only ${VARIABLE} is allowed`, warnings);
  }
  if (variables.length === 0) {
    warnings.push('Expression does not depend on x; integrand is constant');
  }

  return {
    integrand: parsed.buildFunction([VARIABLE]),
    expression,
    ...integrateSymbolically(parsed, warnings),
    error: null,
    warnings
  };
};

/**
 * F(b) − F(a) from the parsed antiderivative, ready to pass to `reference`
 * as its exact value. Null when no closed form was found.
 */
export const exactIntegral = (parsed: ExpressionParseResult, interval: Interval): number | null => {
  assertInterval(interval);
  if (!parsed.antiderivative) return null;
  return parsed.antiderivative(interval.b) - parsed.antiderivative(interval.a);
};
