import type { DayStats, PeriodDirection } from './types';
import {
  DISTANCE_SCALING_FACTOR,
  DISTANCE_SCALING_MIN,
  DISTANCE_SCALING_THRESHOLD,
} from './constants';

/**
 * Interval Criteria
 *
 * Per-interval acceptance test against the statistics of the reference day.
 * All comparisons use absolute values of the reference prices so that
 * negative prices widen the band in the right direction.
 */

export interface IntervalCriteriaInput {
  direction: PeriodDirection;
  /** Signed flex fraction */
  flex: number;
  /** Minimum distance from average, in percent */
  minDistanceFromAvg: number;
}

export interface CriteriaResult {
  inFlex: boolean;
  meetsDistance: boolean;
  accepted: boolean;
}

/**
 * Price bound of the flex band
 * @param stats - Reference day statistics
 * @param direction - Best (bound above the minimum) or peak (bound below the maximum)
 * @param flex - Signed flex fraction
 * @returns Highest accepted price for best, lowest accepted price for peak
 */
export function getFlexThreshold(stats: DayStats, direction: PeriodDirection, flex: number): number {
  if (direction === 'best') {
    return stats.min + Math.abs(stats.min) * Math.abs(flex);
  }
  return stats.max - Math.abs(stats.max) * Math.abs(flex);
}

/**
 * Price bound of the distance-from-average requirement
 * @param stats - Reference day statistics
 * @param direction - Best or peak
 * @param minDistanceFromAvg - Distance in percent
 * @returns Highest accepted price for best, lowest accepted price for peak
 */
export function getDistanceThreshold(
  stats: DayStats,
  direction: PeriodDirection,
  minDistanceFromAvg: number,
): number {
  const offset = Math.abs(stats.avg) * (Math.abs(minDistanceFromAvg) / 100);
  return direction === 'best' ? stats.avg - offset : stats.avg + offset;
}

/**
 * Evaluate one price against the criteria
 * @param price - Smoothed price of the interval
 * @param stats - Statistics of the day the period starts in
 * @param criteria - Direction, flex and distance to apply
 * @returns Individual and combined results
 */
export function evaluateIntervalCriteria(
  price: number,
  stats: DayStats,
  criteria: IntervalCriteriaInput,
): CriteriaResult {
  const flexThreshold = getFlexThreshold(stats, criteria.direction, criteria.flex);
  const distanceThreshold = getDistanceThreshold(stats, criteria.direction, criteria.minDistanceFromAvg);

  const inFlex = criteria.direction === 'best' ? price <= flexThreshold : price >= flexThreshold;
  const meetsDistance = criteria.direction === 'best' ? price <= distanceThreshold : price >= distanceThreshold;

  return { inFlex, meetsDistance, accepted: inFlex && meetsDistance };
}

/**
 * Scale the minimum distance down once flex grows beyond 20%
 * (factor 1 - (|flex| - 0.2) * 2.5, never below 0.25).
 * @param flex - Signed flex fraction
 * @param minDistanceFromAvg - Configured distance in percent
 * @returns Effective distance in percent
 */
export function scaleMinDistance(flex: number, minDistanceFromAvg: number): number {
  const absFlex = Math.abs(flex);
  if (absFlex <= DISTANCE_SCALING_THRESHOLD) {
    return minDistanceFromAvg;
  }
  const factor = Math.max(
    DISTANCE_SCALING_MIN,
    1 - (absFlex - DISTANCE_SCALING_THRESHOLD) * DISTANCE_SCALING_FACTOR,
  );
  return minDistanceFromAvg * factor;
}
