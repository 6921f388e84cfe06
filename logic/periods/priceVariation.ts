import type { SmoothedInterval } from './types';
import { PERIOD_MAX_CV } from './constants';

/**
 * Round to a fixed number of decimals
 * @param value - Value to round
 * @param decimals - Number of decimals
 * @returns Rounded value
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Coefficient of variation (sample standard deviation over |mean|)
 * @param values - Prices
 * @returns CV in percent, rounded to one decimal; 0 for fewer than two values or a zero mean
 */
export function calculateCoefficientOfVariation(values: ReadonlyArray<number>): number {
  if (values.length < 2) {
    return 0;
  }
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  if (mean === 0) {
    return 0;
  }
  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (values.length - 1);
  return roundTo((Math.sqrt(variance) / Math.abs(mean)) * 100, 1);
}

/**
 * Quality gate for united and cross-day periods
 * @param intervals - Window intervals
 * @param startIndex - First index
 * @param endIndex - Last index (inclusive)
 * @returns True when the original prices vary by at most 25 %
 */
export function isWithinVariationLimit(
  intervals: ReadonlyArray<SmoothedInterval>,
  startIndex: number,
  endIndex: number,
): boolean {
  const prices = intervals.slice(startIndex, endIndex + 1).map((interval) => interval.price);
  return calculateCoefficientOfVariation(prices) <= PERIOD_MAX_CV;
}
