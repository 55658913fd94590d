import * as d3 from 'd3';
import { invalidPartitionCount } from '../math/errors';

const assertPositiveInteger = (value: number, name: string): void => {
  if (!Number.isInteger(value) || value < 1) {
    throw invalidPartitionCount(value, `${name} must be a positive integer`);
  }
};

/**
 * start, 2·start, 4·start, … (count terms). An even start keeps every
 * term valid for Simpson's rule.
 */
export const doublingSequence = (start: number, count: number): number[] => {
  assertPositiveInteger(start, 'start');
  assertPositiveInteger(count, 'count');
  return d3.range(count).map(k => start * 2 ** k);
};

/**
 * Inclusive arithmetic sequence start, start + step, … ≤ stop.
 * Drives "auto-play" style sweeps where n grows by a fixed step.
 */
export const linearSequence = (start: number, stop: number, step: number = 1): number[] => {
  assertPositiveInteger(start, 'start');
  assertPositiveInteger(stop, 'stop');
  assertPositiveInteger(step, 'step');
  if (stop < start) {
    throw invalidPartitionCount(stop, `stop must not be below start (${start})`);
  }
  return d3.range(start, stop + 1, step);
};
