import { createInterval } from '../domain';
import type { Interval } from '../../types';

export const unit: Interval = createInterval(0, 1);

/**
 * Runs fn and returns whatever it threw, or undefined when it returned normally.
 */
export const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};
