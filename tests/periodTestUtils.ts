/**
 * Shared builders for period engine tests
 */

import type { PeriodCriteria, PriceInterval, PriceLevel } from '../logic/periods/types';
import { MILLISECONDS_PER_HOUR, MILLISECONDS_PER_MINUTE } from '../logic/utils/dateUtils';

/** 2025-03-10T00:00:00Z */
export const DAY_START = Date.UTC(2025, 2, 10);

/**
 * Timestamp of a (fractional) hour on the test day
 */
export function at(hour: number, dayStart: number = DAY_START): number {
  return dayStart + hour * MILLISECONDS_PER_HOUR;
}

/**
 * Build a contiguous interval series from prices
 */
export function buildIntervals(
  prices: Array<number>,
  options: { start?: number; minutes?: number; levels?: Array<PriceLevel> | PriceLevel } = {},
): Array<PriceInterval> {
  const start = options.start ?? DAY_START;
  const durationMs = (options.minutes ?? 60) * MILLISECONDS_PER_MINUTE;
  const levels = options.levels ?? 'NORMAL';

  return prices.map((price, i) => ({
    start: start + i * durationMs,
    end: start + (i + 1) * durationMs,
    price,
    level: typeof levels === 'string' ? levels : levels[i],
  }));
}

/**
 * Best-price criteria without level filter, gaps or relaxation
 */
export function bestCriteria(overrides: Partial<PeriodCriteria> = {}): PeriodCriteria {
  return {
    direction: 'best',
    flex: 0.15,
    minDistanceFromAvg: 2,
    minPeriodMinutes: 60,
    levelFilter: 'any',
    gapTolerance: 0,
    enableRelaxation: false,
    minPeriods: 1,
    maxRelaxationAttempts: 11,
    ...overrides,
  };
}

/**
 * Peak-price criteria without level filter, gaps or relaxation
 */
export function peakCriteria(overrides: Partial<PeriodCriteria> = {}): PeriodCriteria {
  return bestCriteria({ direction: 'peak', flex: -0.2, ...overrides });
}

/** Hourly prices of a day with a cheap night and a cheap evening */
export const SCENARIO_A_PRICES = [
  18, 19, 20, 28, 29, 30, 35, 34, 33, 32, 30, 28,
  25, 24, 26, 28, 30, 32, 31, 22, 21, 20, 19, 18,
];

/** Flat day: alternating 20.0 / 20.2 */
export const FLAT_DAY_PRICES = Array.from({ length: 24 }, (_, i) => (i % 2 === 0 ? 20 : 20.2));

/** Cheap morning with a single spike at 06:00 */
export const SPIKE_DAY_PRICES = [
  28, 28, 27, 20.4, 20.6, 20.8, 35, 20.6, 20.8, 21, 27, 28,
  30, 30, 30, 30, 30, 30, 30, 30, 30, 30, 30, 30,
];
