import type { LevelFilter, PeriodCriteria } from './types';
import {
  MAX_DISTANCE_PERCENT,
  MAX_FLEX,
  MAX_GAP_TOLERANCE,
  MAX_MIN_PERIODS,
  MAX_RELAXATION_ATTEMPTS,
  PRICE_LEVELS,
} from './constants';
import { ConfigurationError } from '../utils/errorUtils';

/**
 * Criteria normalization
 *
 * Criteria normally arrive pre-validated from the settings layer, but the
 * engine re-clamps them so that a bad value can never widen the search
 * beyond its documented bounds.
 */

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function requireFinite(field: string, value: number): number {
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(field, `expected a finite number, got ${String(value)}`);
  }
  return value;
}

/**
 * Check whether a value is a valid level filter
 * @param value - Value to check
 * @returns True for `any` or one of the five price levels
 */
export function isLevelFilter(value: unknown): value is LevelFilter {
  return value === 'any' || PRICE_LEVELS.some((level) => level === value);
}

/**
 * Clamp criteria to their bounds and force the sign of flex to match the direction.
 * @param criteria - Criteria as configured
 * @returns New, normalized criteria object
 * @throws ConfigurationError when a numeric field is not finite or the level filter is unknown
 */
export function normalizeCriteria(criteria: PeriodCriteria): PeriodCriteria {
  const flex = requireFinite('flex', criteria.flex);
  const distance = requireFinite('minDistanceFromAvg', criteria.minDistanceFromAvg);
  const minPeriodMinutes = requireFinite('minPeriodMinutes', criteria.minPeriodMinutes);
  const gapTolerance = requireFinite('gapTolerance', criteria.gapTolerance);
  const minPeriods = requireFinite('minPeriods', criteria.minPeriods);
  const attempts = requireFinite('maxRelaxationAttempts', criteria.maxRelaxationAttempts);

  if (!isLevelFilter(criteria.levelFilter)) {
    throw new ConfigurationError('levelFilter', `unknown level "${String(criteria.levelFilter)}"`);
  }
  if (minPeriodMinutes <= 0) {
    throw new ConfigurationError('minPeriodMinutes', 'must be greater than zero');
  }

  const absFlex = Math.min(Math.abs(flex), MAX_FLEX);

  return {
    direction: criteria.direction,
    flex: criteria.direction === 'best' ? absFlex : -absFlex,
    minDistanceFromAvg: clamp(Math.abs(distance), 0, MAX_DISTANCE_PERCENT),
    minPeriodMinutes,
    levelFilter: criteria.levelFilter,
    gapTolerance: clamp(Math.floor(gapTolerance), 0, MAX_GAP_TOLERANCE),
    enableRelaxation: criteria.enableRelaxation,
    minPeriods: clamp(Math.floor(minPeriods), 1, MAX_MIN_PERIODS),
    maxRelaxationAttempts: clamp(Math.floor(attempts), 1, MAX_RELAXATION_ATTEMPTS),
  };
}
