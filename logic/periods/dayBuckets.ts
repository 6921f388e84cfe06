import type { DayBucket, DayStats, PriceInterval } from './types';
import { DEGENERATE_SPREAD_EPSILON } from './constants';
import { getLocalDateKey, MILLISECONDS_PER_MINUTE } from '../utils/dateUtils';
import { InputError } from '../utils/errorUtils';

/**
 * Day Buckets
 *
 * Groups an interval series by local calendar date and computes the daily
 * statistics the criteria are measured against. Statistics always use the
 * original prices.
 */

/**
 * Validate that a series is ordered, contiguous and uses one fixed duration
 * @param intervals - Interval series
 * @returns Interval duration in minutes (0 for an empty series)
 * @throws InputError when the series violates the contract
 */
export function validateIntervalSeries(intervals: ReadonlyArray<PriceInterval>): number {
  if (intervals.length === 0) {
    return 0;
  }

  const durationMs = intervals[0].end - intervals[0].start;
  if (!(durationMs > 0) || durationMs % MILLISECONDS_PER_MINUTE !== 0) {
    throw new InputError(`Interval at ${new Date(intervals[0].start).toISOString()} has invalid duration`);
  }

  intervals.forEach((interval, index) => {
    if (!Number.isFinite(interval.price)) {
      throw new InputError(`Interval at ${new Date(interval.start).toISOString()} has a non-finite price`);
    }
    if (interval.end - interval.start !== durationMs) {
      throw new InputError(`Interval at ${new Date(interval.start).toISOString()} has a different duration`);
    }
    if (index > 0 && interval.start !== intervals[index - 1].end) {
      throw new InputError(
        `Interval series is not contiguous at ${new Date(interval.start).toISOString()}`,
      );
    }
  });

  return durationMs / MILLISECONDS_PER_MINUTE;
}

/**
 * Compute min, max and average of the original prices
 * @param intervals - Non-empty interval list
 * @returns Day statistics
 */
export function calculateDayStats(intervals: ReadonlyArray<PriceInterval>): DayStats {
  let min = Infinity;
  let max = -Infinity;
  let sum = 0;
  for (const { price } of intervals) {
    min = Math.min(min, price);
    max = Math.max(max, price);
    sum += price;
  }
  return { min, max, avg: sum / intervals.length };
}

/**
 * Check whether the day's prices are effectively flat
 * @param stats - Day statistics
 * @returns True when max - min is negligible relative to the average
 */
export function isDegenerateDay(stats: DayStats): boolean {
  return stats.max - stats.min <= DEGENERATE_SPREAD_EPSILON * Math.max(1, Math.abs(stats.avg));
}

/**
 * Group a validated interval series into day buckets
 * @param intervals - Ordered, contiguous interval series
 * @param timezone - IANA time zone defining the calendar day
 * @returns Buckets in chronological order
 */
export function groupIntervalsByDay(
  intervals: ReadonlyArray<PriceInterval>,
  timezone: string,
): Array<DayBucket> {
  const byDate = new Map<string, Array<PriceInterval>>();
  for (const interval of intervals) {
    const date = getLocalDateKey(interval.start, timezone);
    const list = byDate.get(date);
    if (list) {
      list.push(interval);
    } else {
      byDate.set(date, [interval]);
    }
  }

  return [...byDate.entries()].map(([date, dayIntervals]) => {
    const stats = calculateDayStats(dayIntervals);
    return {
      date,
      intervals: dayIntervals,
      stats,
      degenerate: isDegenerateDay(stats),
    };
  });
}
