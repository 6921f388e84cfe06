import type { PriceInterval, SmoothedInterval, SmoothingOptions } from './types';
import { DEFAULT_SMOOTHING_OPTIONS } from './constants';

/**
 * Outlier Smoothing
 *
 * Replaces isolated price spikes with a trend prediction so that a single
 * bad interval does not split an otherwise valid period.
 * - Works on one day at a time; intervals without a full neighbourhood on
 *   both sides are never touched.
 * - Pass 1 looks at single intervals: the neighbourhood is fitted with a
 *   least-squares line and the interval is an outlier when it lies outside
 *   the tolerance band, differs from both direct neighbours and the
 *   neighbourhood is symmetric (a ramp is a trend, not a spike).
 * - Pass 2 looks at short zigzag clusters that pass 1 cannot see because the
 *   members mask each other.
 * - Only `smoothedPrice` changes; the original `price` is kept as-is.
 */

interface LineFit {
  slope: number;
  intercept: number;
  /** Population std of the residuals around the fitted line */
  residualStd: number;
}

/**
 * Least-squares line through a set of points
 * @param xs - Positions
 * @param ys - Values
 * @returns Fitted line and residual spread
 */
export function fitLine(xs: ReadonlyArray<number>, ys: ReadonlyArray<number>): LineFit {
  const n = xs.length;
  const xMean = xs.reduce((sum, x) => sum + x, 0) / n;
  const yMean = ys.reduce((sum, y) => sum + y, 0) / n;

  let sxy = 0;
  let sxx = 0;
  for (let i = 0; i < n; i++) {
    sxy += (xs[i] - xMean) * (ys[i] - yMean);
    sxx += (xs[i] - xMean) ** 2;
  }
  const slope = sxx === 0 ? 0 : sxy / sxx;
  const intercept = yMean - slope * xMean;

  let squared = 0;
  for (let i = 0; i < n; i++) {
    squared += (ys[i] - (intercept + slope * xs[i])) ** 2;
  }

  return { slope, intercept, residualStd: Math.sqrt(squared / n) };
}

function populationStd(values: ReadonlyArray<number>): number {
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  return Math.sqrt(values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length);
}

function average(values: ReadonlyArray<number>): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Symmetry check: the level before and after must not differ by more than
 * `threshold` standard deviations of the surrounding prices.
 */
function isSymmetric(before: Array<number>, after: Array<number>, threshold: number): boolean {
  const std = populationStd([...before, ...after]);
  return Math.abs(average(after) - average(before)) <= threshold * std;
}

/**
 * Decide whether a single interval is an isolated spike
 * @param prices - Prices of the day
 * @param index - Interval to test (must have full context on both sides)
 * @param options - Smoothing options
 * @returns Predicted price when the interval is an outlier, otherwise null
 */
function detectSpike(prices: ReadonlyArray<number>, index: number, options: SmoothingOptions): number | null {
  const ctx = options.minContextSize;
  const xs: Array<number> = [];
  const ys: Array<number> = [];
  for (let offset = -ctx; offset <= ctx; offset++) {
    if (offset !== 0) {
      xs.push(offset);
      ys.push(prices[index + offset]);
    }
  }

  const fit = fitLine(xs, ys);
  const predicted = fit.intercept;
  const actual = prices[index];
  const tolerance = Math.max(
    options.confidenceLevel * fit.residualStd,
    options.minRelativeDeviation * Math.abs(predicted),
  );

  if (Math.abs(actual - predicted) <= tolerance) {
    return null;
  }

  const isolated = Math.abs(actual - prices[index - 1]) > tolerance
    && Math.abs(actual - prices[index + 1]) > tolerance;
  if (!isolated) {
    return null;
  }

  return isSymmetric(ys.slice(0, ctx), ys.slice(ctx), options.symmetryThreshold) ? predicted : null;
}

/**
 * Decide whether a window of consecutive intervals forms a zigzag cluster
 * @param values - Working prices of the day (after pass 1)
 * @param start - First index of the window
 * @param size - Window length
 * @param options - Smoothing options
 * @returns Predictions for the window when it is a cluster, otherwise null
 */
function detectZigzag(
  values: ReadonlyArray<number>,
  start: number,
  size: number,
  options: SmoothingOptions,
): Array<number> | null {
  const ctx = options.minContextSize;
  const end = start + size - 1;

  const xs: Array<number> = [];
  const ys: Array<number> = [];
  for (let i = start - ctx; i < start; i++) {
    xs.push(i);
    ys.push(values[i]);
  }
  for (let i = end + 1; i <= end + ctx; i++) {
    xs.push(i);
    ys.push(values[i]);
  }

  const floor = options.minRelativeDeviation * Math.abs(average(ys));

  const sequence = values.slice(start - 1, end + 2);
  const diffs = sequence.slice(1).map((value, i) => value - sequence[i]);
  if (diffs.some((diff) => Math.abs(diff) <= floor)) {
    return null;
  }
  for (let i = 1; i < diffs.length; i++) {
    if (Math.sign(diffs[i]) === Math.sign(diffs[i - 1])) {
      return null;
    }
  }

  const fit = fitLine(xs, ys);
  const predictions: Array<number> = [];
  let squared = 0;
  for (let i = start; i <= end; i++) {
    const predicted = fit.intercept + fit.slope * i;
    predictions.push(predicted);
    squared += (values[i] - predicted) ** 2;
  }
  const rms = Math.sqrt(squared / size);

  if (rms <= options.relativeVolatilityThreshold * fit.residualStd || rms <= floor) {
    return null;
  }

  return isSymmetric(ys.slice(0, ctx), ys.slice(ctx), options.symmetryThreshold) ? predictions : null;
}

/**
 * Smooth the outliers of one day
 * @param intervals - Intervals of a single day, in order
 * @param options - Smoothing options (defaults: context 3, confidence 2.0, symmetry 1.5)
 * @returns New interval objects; the input is not modified
 */
export function smoothOutliers(
  intervals: ReadonlyArray<PriceInterval>,
  options: SmoothingOptions = DEFAULT_SMOOTHING_OPTIONS,
): Array<SmoothedInterval> {
  const prices = intervals.map((interval) => interval.price);
  const working = [...prices];
  const smoothed: Array<boolean> = prices.map(() => false);
  const ctx = options.minContextSize;
  const n = prices.length;

  for (let i = ctx; i < n - ctx; i++) {
    const predicted = detectSpike(prices, i, options);
    if (predicted !== null) {
      working[i] = predicted;
      smoothed[i] = true;
    }
  }

  let start = ctx;
  while (start < n - ctx) {
    let matched = 0;
    for (let size = Math.min(options.maxClusterSize, n - ctx - start); size >= 2; size--) {
      const window = smoothed.slice(start, start + size);
      if (window.some(Boolean)) {
        continue;
      }
      const predictions = detectZigzag(working, start, size, options);
      if (predictions) {
        predictions.forEach((value, offset) => {
          working[start + offset] = value;
          smoothed[start + offset] = true;
        });
        matched = size;
        break;
      }
    }
    start += matched > 0 ? matched : 1;
  }

  return intervals.map((interval, i) => ({
    ...interval,
    smoothedPrice: working[i],
    smoothed: smoothed[i],
  }));
}
